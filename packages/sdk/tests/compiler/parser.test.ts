import { describe, it, expect } from 'vitest';
import { toPostfix, precedence, associativity, ParseError } from '../../src/compiler/parser.js';
import { tokenize } from '../../src/compiler/lexer.js';
import type { Token } from '../../src/compiler/lexer.js';
import { Stack, StackUnderflowError } from '../../src/compiler/stack.js';

function tok(value: string): Token {
  switch (value) {
    case '(':
      return { type: 'LPAREN', value, pos: 0 };
    case ')':
      return { type: 'RPAREN', value, pos: 0 };
    case 'AND':
    case 'OR':
      return { type: value, value, pos: 0 };
    default:
      return { type: 'OPERAND', value, pos: 0 };
  }
}

function postfix(values: string[]): string[] {
  return toPostfix(values.map(tok)).map((t) => t.value);
}

function postfixOf(expression: string): string[] {
  const result = tokenize(expression);
  if (!result.ok) throw new Error(result.error.reason);
  return toPostfix(result.tokens).map((t) => t.value);
}

describe('Parser', () => {
  describe('operator table', () => {
    it('should rank AND above OR', () => {
      expect(precedence('AND')).toBe(2);
      expect(precedence('OR')).toBe(1);
    });

    it('should default unknown operators to -1 and left associativity', () => {
      expect(precedence('XOR')).toBe(-1);
      expect(associativity('XOR')).toBe('left');
    });

    it('should treat both operators as left associative', () => {
      expect(associativity('AND')).toBe('left');
      expect(associativity('OR')).toBe('left');
    });
  });

  describe('toPostfix', () => {
    it('should convert a simple conjunction', () => {
      expect(postfix(['user@example.com', 'AND', 'admin@example.com'])).toEqual([
        'user@example.com', 'admin@example.com', 'AND',
      ]);
    });

    it('should bind AND tighter than OR', () => {
      expect(postfix(['a@b.com', 'OR', 'c@d.com', 'AND', 'e@f.com'])).toEqual([
        'a@b.com', 'c@d.com', 'e@f.com', 'AND', 'OR',
      ]);
    });

    it('should honour parentheses', () => {
      expect(postfix(['(', 'x@y.com', 'AND', 'p@q.com', ')', 'OR', 'm@n.com'])).toEqual([
        'x@y.com', 'p@q.com', 'AND', 'm@n.com', 'OR',
      ]);
    });

    it('should move a grouped disjunction under AND', () => {
      expect(postfix(['user@team', 'AND', '(', 'admin@team', 'OR', 'mod@team', ')'])).toEqual([
        'user@team', 'admin@team', 'mod@team', 'OR', 'AND',
      ]);
    });

    it('should associate equal operators to the left', () => {
      expect(postfixOf('@a OR @b OR @c')).toEqual(['@a', '@b', 'OR', '@c', 'OR']);
      expect(postfixOf('@a AND @b AND @c')).toEqual(['@a', '@b', 'AND', '@c', 'AND']);
    });

    it('should handle a lower precedence operator after a higher one', () => {
      expect(postfixOf('@a AND @b OR @c')).toEqual(['@a', '@b', 'AND', '@c', 'OR']);
    });

    it('should handle nested groups', () => {
      expect(postfixOf('((@a OR @b) AND (@c OR @d)) OR @e')).toEqual([
        '@a', '@b', 'OR', '@c', '@d', 'OR', 'AND', '@e', 'OR',
      ]);
    });

    it('should never emit parentheses', () => {
      const out = toPostfix(['(', '(', '@a', ')', ')'].map(tok));
      expect(out.map((t) => t.type)).toEqual(['OPERAND']);
    });

    it('should return an empty sequence for empty input', () => {
      expect(toPostfix([])).toEqual([]);
    });

    it('should not modify its input', () => {
      const input = ['@a', 'AND', '@b'].map(tok);
      const copy = input.map((t) => ({ ...t }));
      toPostfix(input);
      expect(input).toEqual(copy);
    });

    it('should throw ParseError on unclosed parentheses', () => {
      expect(() => toPostfix(['(', '@a'].map(tok))).toThrow(ParseError);
    });

    it('should throw ParseError on a closing parenthesis without an opener', () => {
      expect(() => toPostfix([')', '@a', '('].map(tok))).toThrow(ParseError);
      try {
        toPostfix([')', '@a', '('].map(tok));
      } catch (e) {
        expect(e).toBeInstanceOf(ParseError);
        if (e instanceof ParseError) expect(e.code).toBe('MISMATCHED_PARENTHESES');
      }
    });
  });
});

describe('Stack', () => {
  it('should pop in LIFO order', () => {
    const stack = new Stack<number>();
    stack.push(1);
    stack.push(2);
    expect(stack.peek()).toBe(2);
    expect(stack.pop()).toBe(2);
    expect(stack.pop()).toBe(1);
    expect(stack.isEmpty()).toBe(true);
  });

  it('should report its size', () => {
    const stack = new Stack<string>();
    stack.push('a');
    expect(stack.size).toBe(1);
  });

  it('should keep falsy values', () => {
    const stack = new Stack<boolean>();
    stack.push(false);
    expect(stack.pop()).toBe(false);
  });

  it('should throw on underflow', () => {
    const stack = new Stack<number>();
    expect(() => stack.pop()).toThrow(StackUnderflowError);
    expect(() => stack.peek()).toThrow('Cannot peek from an empty stack');
  });
});
