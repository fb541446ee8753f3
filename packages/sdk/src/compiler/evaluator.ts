/**
 * Stack evaluator for postfix approval expressions.
 *
 * Every operand is resolved, including team lookups whose result could
 * not change the outcome. Lookups for one expression run concurrently;
 * the stack pass afterwards follows postfix order.
 *
 * @module compiler/evaluator
 */

import type { Token } from './lexer.js';
import { isTeamOperand } from './lexer.js';
import { Stack, StackUnderflowError } from './stack.js';
import type { ApproverSet, Diagnostic, TeamResolver } from '../codeowners/types.js';

export class EvaluationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EvaluationError';
  }
}

export interface EvaluateOptions {
  /** Receives non-fatal findings such as unknown teams. */
  onDiagnostic?: (diagnostic: Diagnostic) => void;
}

/**
 * The `org/team` operand `@acme/web-core` resolves by its slug `web-core`.
 */
export function teamSlug(operand: string): string {
  return operand.slice(operand.lastIndexOf('/') + 1);
}

export function username(operand: string): string {
  return operand.startsWith('@') ? operand.slice(1) : operand;
}

async function resolveOperand(
  token: Token,
  approvers: ApproverSet,
  resolver: TeamResolver,
  options: EvaluateOptions,
): Promise<boolean> {
  if (!isTeamOperand(token)) {
    return approvers.has(username(token.value));
  }

  const slug = teamSlug(token.value);
  const members = await resolver.resolve(slug);
  if (members === null) {
    options.onDiagnostic?.({
      code: 'TEAM_NOT_FOUND',
      message: `Team '${slug}' not found; treating it as an empty group`,
      team: slug,
    });
    return false;
  }
  return members.some((member) => approvers.has(member));
}

export async function evaluate(
  postfix: Token[],
  approvers: ApproverSet,
  resolver: TeamResolver,
  options: EvaluateOptions = {},
): Promise<boolean> {
  const values = await Promise.all(
    postfix.map((tok) =>
      tok.type === 'OPERAND' ? resolveOperand(tok, approvers, resolver, options) : null,
    ),
  );

  const stack = new Stack<boolean>();
  try {
    postfix.forEach((tok, i) => {
      switch (tok.type) {
        case 'OPERAND':
          stack.push(values[i] === true);
          break;
        case 'AND': {
          const right = stack.pop();
          const left = stack.pop();
          stack.push(left && right);
          break;
        }
        case 'OR': {
          const right = stack.pop();
          const left = stack.pop();
          stack.push(left || right);
          break;
        }
        default:
          throw new EvaluationError(`Unexpected ${tok.type} token in postfix expression`);
      }
    });
  } catch (error) {
    if (error instanceof StackUnderflowError) {
      throw new EvaluationError('Malformed postfix expression: operator is missing an operand');
    }
    throw error;
  }

  if (stack.size !== 1) {
    throw new EvaluationError(`Malformed postfix expression: ${stack.size} values left on the stack`);
  }
  return stack.pop();
}
