import { describe, it, expect } from 'vitest';
import { ExpressionError } from '../src/engine/errors';
import { evaluate, formatValue, isTruthy, toNumber } from '../src/engine/expression';

describe('evaluate', () => {
  describe('arithmetic', () => {
    it('should respect precedence', () => {
      expect(evaluate('2 + 3 * 4')).toBe(14);
      expect(evaluate('(1 + 2) * 3')).toBe(9);
      expect(evaluate('7 % 3')).toBe(1);
      expect(evaluate('7 / 2')).toBe(3.5);
    });

    it('should make ** right-associative and bind tighter than unary minus', () => {
      expect(evaluate('2 ** 3 ** 2')).toBe(512);
      expect(evaluate('-2 ** 2')).toBe(-4);
    });

    it('should refuse division and modulo by zero', () => {
      expect(() => evaluate('1 / 0')).toThrow(new ExpressionError('division by zero'));
      expect(() => evaluate('5 % 0')).toThrow('modulo by zero');
    });
  });

  describe('strings and comparisons', () => {
    it('should concatenate non-numeric strings and add numeric ones', () => {
      expect(evaluate('"ab" + "cd"')).toBe('abcd');
      expect(evaluate("'1' + '2'")).toBe(3);
    });

    it('should compare numerically when both sides are numbers', () => {
      expect(evaluate('10 > 9')).toBe(true);
      expect(evaluate('"10" > "9"')).toBe(true);
      expect(evaluate('"apple" < "banana"')).toBe(true);
    });

    it('should combine with and, or and not', () => {
      expect(evaluate('3 > 2 and 1 == 1')).toBe(true);
      expect(evaluate('0 || 0')).toBe(false);
      expect(evaluate('not 0')).toBe(true);
    });
  });

  describe('scope', () => {
    it('should read fields and variables', () => {
      expect(evaluate('$2 > 10', { fields: ['a 12', 'a', '12'] })).toBe(true);
      expect(evaluate('$5', { fields: ['x', 'x'] })).toBe('');
      expect(evaluate('NF * 2', { variables: { NF: 3 } })).toBe(6);
    });

    it('should reject unknown names', () => {
      expect(() => evaluate('foo + 1')).toThrow("unknown name 'foo'");
    });
  });

  describe('syntax errors', () => {
    it.each([
      ['', 'empty expression'],
      ['1 +', 'unexpected end of expression'],
      ['1 2', "unexpected '2'"],
      ['(1', "missing ')'"],
      ['@', "unexpected character '@' at column 1"],
      ["'abc", 'unterminated string starting at column 1'],
      ['$x', "expected field number after '$' at column 1"],
    ])('should reject %j', (source, message) => {
      expect(() => evaluate(source)).toThrow(message);
    });
  });
});

describe('value helpers', () => {
  it('should convert to numbers', () => {
    expect(toNumber(' 42 ')).toBe(42);
    expect(toNumber(true)).toBe(1);
    expect(() => toNumber('x')).toThrow("not a number: 'x'");
  });

  it('should decide truthiness by type', () => {
    expect(isTruthy('')).toBe(false);
    expect(isTruthy('0')).toBe(true);
    expect(isTruthy(0)).toBe(false);
  });

  it('should print booleans as 1 and 0', () => {
    expect(formatValue(true)).toBe('1');
    expect(formatValue(false)).toBe('0');
    expect(formatValue(2.5)).toBe('2.5');
  });
});
