/**
 * Tokenizer for approval expressions.
 *
 * Tokens are extracted by pattern rather than by consuming the whole
 * input, so characters that belong to no token (a stray `&`, commas)
 * are dropped instead of rejected.
 *
 * @module compiler/lexer
 */

export type OperatorType = 'AND' | 'OR';

export type TokenType = OperatorType | 'LPAREN' | 'RPAREN' | 'OPERAND';

export interface Token {
  type: TokenType;
  value: string;
  pos: number;
}

export interface InvalidExpression {
  expression: string;
  reason: string;
}

export type LexResult =
  | { ok: true; tokens: Token[] }
  | { ok: false; error: InvalidExpression };

const TOKEN_PATTERN = /\(|\)|AND|OR|@[\w-]+(?:\/[\w-]+)?/g;

const OPERAND_PATTERN = /^@[\w-]+(?:\/[\w-]+)?$/;

export function isOperator(token: Token): boolean {
  return token.type === 'AND' || token.type === 'OR';
}

/**
 * True when the operand names a team (`@org/team`) rather than a user.
 */
export function isTeamOperand(token: Token): boolean {
  return token.type === 'OPERAND' && token.value.includes('/');
}

function classify(value: string): TokenType | null {
  switch (value) {
    case '(':
      return 'LPAREN';
    case ')':
      return 'RPAREN';
    case 'AND':
    case 'OR':
      return value;
    default:
      return OPERAND_PATTERN.test(value) ? 'OPERAND' : null;
  }
}

function countOf(input: string, ch: string): number {
  let n = 0;
  for (const c of input) {
    if (c === ch) n++;
  }
  return n;
}

export function tokenize(expression: string): LexResult {
  const invalid = (reason: string): LexResult => ({
    ok: false,
    error: { expression, reason },
  });

  if (countOf(expression, '(') !== countOf(expression, ')')) {
    return invalid('unbalanced parentheses');
  }

  const tokens: Token[] = [];
  for (const m of expression.matchAll(TOKEN_PATTERN)) {
    const type = classify(m[0]);
    if (type === null) {
      return invalid(`invalid token '${m[0]}'`);
    }

    const token: Token = { type, value: m[0], pos: m.index ?? 0 };
    const prev = tokens[tokens.length - 1];
    if (prev && isOperator(prev) && isOperator(token)) {
      return invalid(`consecutive operators '${prev.value} ${token.value}'`);
    }
    tokens.push(token);
  }

  return { ok: true, tokens };
}
