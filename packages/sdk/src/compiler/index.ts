/**
 * Approval expression compiler.
 *
 * compile() turns expression text into a postfix token sequence, or
 * reports why it cannot; evaluate() runs that sequence against a set of
 * approvers.
 *
 * @module compiler
 *
 * @example
 * ```typescript
 * import { compile, evaluate } from 'ownergate/compiler';
 *
 * const compiled = compile('(@acme/web OR @acme/api) AND @alice');
 * if (compiled.ok) {
 *   const approved = await evaluate(compiled.postfix, new Set(['alice']), resolver);
 * }
 * ```
 */

export { tokenize, isOperator, isTeamOperand } from './lexer.js';
export type { Token, TokenType, OperatorType, InvalidExpression, LexResult } from './lexer.js';

export { toPostfix, precedence, associativity, ParseError, ParseErrorCode } from './parser.js';
export type { Associativity } from './parser.js';

export { evaluate, teamSlug, username, EvaluationError } from './evaluator.js';
export type { EvaluateOptions } from './evaluator.js';

export { Stack, StackUnderflowError } from './stack.js';

import { tokenize } from './lexer.js';
import type { InvalidExpression, Token } from './lexer.js';
import { toPostfix, ParseError } from './parser.js';

export type CompileResult =
  | { ok: true; postfix: Token[] }
  | { ok: false; error: InvalidExpression };

/**
 * Number of values a postfix sequence leaves behind, or -1 when an
 * operator runs out of operands.
 */
function stackDepthAfter(postfix: Token[]): number {
  let depth = 0;
  for (const tok of postfix) {
    if (tok.type === 'OPERAND') {
      depth++;
    } else {
      if (depth < 2) return -1;
      depth--;
    }
  }
  return depth;
}

export function compile(expression: string): CompileResult {
  const lexed = tokenize(expression);
  if (!lexed.ok) return lexed;

  if (lexed.tokens.length === 0) {
    return { ok: false, error: { expression, reason: 'empty expression' } };
  }

  let postfix: Token[];
  try {
    postfix = toPostfix(lexed.tokens);
  } catch (error) {
    if (error instanceof ParseError) {
      return { ok: false, error: { expression, reason: error.message } };
    }
    throw error;
  }

  if (stackDepthAfter(postfix) !== 1) {
    return { ok: false, error: { expression, reason: 'operator and operand count do not match' } };
  }

  return { ok: true, postfix };
}
