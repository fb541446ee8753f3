import { describe, it, expect } from 'vitest';
import { compile } from '../../src/compiler/index.js';

describe('compile', () => {
  it('should produce postfix tokens for a valid expression', () => {
    const result = compile('(@acme/web OR @acme/api) AND @alice');
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.postfix.map((t) => t.value)).toEqual(['@acme/web', '@acme/api', 'OR', '@alice', 'AND']);
  });

  it('should pass lexer failures through', () => {
    expect(compile('(@a AND @b')).toEqual({
      ok: false,
      error: { expression: '(@a AND @b', reason: 'unbalanced parentheses' },
    });
  });

  it('should reject an expression with no tokens', () => {
    expect(compile('')).toEqual({ ok: false, error: { expression: '', reason: 'empty expression' } });
    expect(compile('& |')).toEqual({ ok: false, error: { expression: '& |', reason: 'empty expression' } });
  });

  it('should reject parentheses that balance in count but not in order', () => {
    const result = compile(')@a(');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.reason).toBe('Unexpected closing parenthesis at position 0');
  });

  it('should reject empty groups', () => {
    expect(compile('()')).toEqual({
      ok: false,
      error: { expression: '()', reason: 'operator and operand count do not match' },
    });
  });

  it('should reject a dangling operator', () => {
    expect(compile('@a AND').ok).toBe(false);
    expect(compile('OR @a').ok).toBe(false);
  });

  it('should reject operands without an operator between them', () => {
    expect(compile('@a @b').ok).toBe(false);
  });
});
