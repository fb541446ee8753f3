/**
 * Infix to postfix conversion (shunting-yard) for approval expressions.
 *
 * Operates on tokens that already passed the lexer's checks; the
 * parenthesis check below only guards against misuse.
 *
 * @module compiler/parser
 */

import type { OperatorType, Token } from './lexer.js';
import { Stack } from './stack.js';

export type Associativity = 'left' | 'right';

export const ParseErrorCode = {
  MISMATCHED_PARENTHESES: 'MISMATCHED_PARENTHESES',
} as const;

export type ParseErrorCode = (typeof ParseErrorCode)[keyof typeof ParseErrorCode];

export class ParseError extends Error {
  constructor(
    message: string,
    public readonly code: ParseErrorCode,
    public readonly pos: number,
  ) {
    super(`${message} at position ${pos}`);
    this.name = 'ParseError';
  }
}

const PRECEDENCES: Record<OperatorType, number> = {
  OR: 1,
  AND: 2,
};

const ASSOCIATIVITIES: Record<OperatorType, Associativity> = {
  OR: 'left',
  AND: 'left',
};

function isKnownOperator(op: string): op is OperatorType {
  return Object.hasOwn(PRECEDENCES, op);
}

export function precedence(op: string): number {
  return isKnownOperator(op) ? PRECEDENCES[op] : -1;
}

export function associativity(op: string): Associativity {
  return isKnownOperator(op) ? ASSOCIATIVITIES[op] : 'left';
}

function assertNestedParentheses(tokens: Token[]): void {
  let depth = 0;
  for (const tok of tokens) {
    if (tok.type === 'LPAREN') depth++;
    if (tok.type === 'RPAREN') depth--;
    if (depth < 0) {
      throw new ParseError('Unexpected closing parenthesis', ParseErrorCode.MISMATCHED_PARENTHESES, tok.pos);
    }
  }
  if (depth !== 0) {
    const last = tokens[tokens.length - 1];
    throw new ParseError('Unclosed parenthesis', ParseErrorCode.MISMATCHED_PARENTHESES, last ? last.pos : 0);
  }
}

/**
 * Reorder an infix token sequence into postfix order. The result never
 * contains parenthesis tokens.
 */
export function toPostfix(tokens: Token[]): Token[] {
  assertNestedParentheses(tokens);

  const output: Token[] = [];
  const stack = new Stack<Token>();

  for (const tok of tokens) {
    switch (tok.type) {
      case 'OPERAND':
        output.push(tok);
        break;

      case 'LPAREN':
        stack.push(tok);
        break;

      case 'RPAREN':
        while (!stack.isEmpty() && stack.peek().type !== 'LPAREN') {
          output.push(stack.pop());
        }
        stack.pop();
        break;

      case 'AND':
      case 'OR': {
        const prec = precedence(tok.value);
        while (!stack.isEmpty() && stack.peek().type !== 'LPAREN') {
          const top = stack.peek();
          const topPrec = precedence(top.value);
          if (topPrec > prec || (topPrec === prec && associativity(tok.value) === 'left')) {
            output.push(stack.pop());
          } else {
            break;
          }
        }
        stack.push(tok);
        break;
      }
    }
  }

  while (!stack.isEmpty()) {
    output.push(stack.pop());
  }

  return output;
}
