/**
 * @fileoverview Arithmetic and comparison expression evaluator.
 *
 * Backs `expr`, `bc` and `awk`. Input is parsed by a small recursive-descent
 * parser and evaluated over plain values; nothing is ever handed to a host
 * interpreter.
 *
 * Grammar, loosest binding first:
 *
 *   or         := and (('or' | '||') and)*
 *   and        := not (('and' | '&&') not)*
 *   not        := ('not' | '!') not | comparison
 *   comparison := additive (('==' | '!=' | '<' | '<=' | '>' | '>=') additive)?
 *   additive   := term (('+' | '-') term)*
 *   term       := unary (('*' | '/' | '%') unary)*
 *   unary      := ('-' | '+') unary | power
 *   power      := primary ('**' unary)?
 *   primary    := number | string | identifier | '$' digits | '(' or ')'
 *
 * @module engine/expression
 */

import { ExpressionError } from './errors';

export type Value = number | string | boolean;

/**
 * Names visible to an expression.
 *
 * @property variables - Identifiers such as `NF` and `NR`
 * @property fields - `$0` is the whole record, `$1` the first field
 */
export interface Scope {
  variables?: Readonly<Record<string, Value>>;
  fields?: readonly string[];
}

type Token =
  | { kind: 'number'; value: number }
  | { kind: 'string'; value: string }
  | { kind: 'ident'; value: string }
  | { kind: 'field'; value: number }
  | { kind: 'op'; value: string };

const OPERATORS = ['**', '==', '!=', '<=', '>=', '&&', '||', '<', '>', '+', '-', '*', '/', '%', '!', '(', ')'];

function lex(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const ch = source[i];

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    const numberMatch = /^(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?/.exec(source.slice(i));
    if (numberMatch) {
      tokens.push({ kind: 'number', value: Number(numberMatch[0]) });
      i += numberMatch[0].length;
      continue;
    }

    if (ch === '"' || ch === "'") {
      const end = source.indexOf(ch, i + 1);
      if (end === -1) {
        throw new ExpressionError(`unterminated string starting at column ${i + 1}`);
      }
      tokens.push({ kind: 'string', value: source.slice(i + 1, end) });
      i = end + 1;
      continue;
    }

    if (ch === '$') {
      const digits = /^\d+/.exec(source.slice(i + 1));
      if (!digits) {
        throw new ExpressionError(`expected field number after '$' at column ${i + 1}`);
      }
      tokens.push({ kind: 'field', value: Number(digits[0]) });
      i += 1 + digits[0].length;
      continue;
    }

    const identMatch = /^[A-Za-z_][A-Za-z0-9_]*/.exec(source.slice(i));
    if (identMatch) {
      tokens.push({ kind: 'ident', value: identMatch[0] });
      i += identMatch[0].length;
      continue;
    }

    const op = OPERATORS.find(candidate => source.startsWith(candidate, i));
    if (op) {
      tokens.push({ kind: 'op', value: op });
      i += op.length;
      continue;
    }

    throw new ExpressionError(`unexpected character '${ch}' at column ${i + 1}`);
  }

  return tokens;
}

const NUMERIC = /^\s*[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?\s*$/;

function isNumeric(value: Value): boolean {
  return typeof value !== 'string' || NUMERIC.test(value);
}

/**
 * Numeric view of a value. Booleans count as 1 and 0.
 *
 * @throws ExpressionError for a non-numeric string
 */
export function toNumber(value: Value): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (!NUMERIC.test(value)) {
    throw new ExpressionError(`not a number: '${value}'`);
  }
  return Number(value);
}

export function isTruthy(value: Value): boolean {
  if (typeof value === 'string') return value.length > 0;
  if (typeof value === 'number') return value !== 0;
  return value;
}

/**
 * Render a value the way the shell prints results. Booleans print as 1/0.
 */
export function formatValue(value: Value): string {
  if (typeof value === 'boolean') return value ? '1' : '0';
  return String(value);
}

class Parser {
  private pos = 0;

  constructor(private readonly tokens: Token[], private readonly scope: Scope) {}

  parse(): Value {
    if (this.tokens.length === 0) {
      throw new ExpressionError('empty expression');
    }
    const value = this.or();
    const extra = this.tokens[this.pos];
    if (extra) {
      throw new ExpressionError(`unexpected '${String(extra.value)}'`);
    }
    return value;
  }

  private peekOp(...ops: string[]): string | null {
    const token = this.tokens[this.pos];
    if (!token) return null;
    if (token.kind === 'op' && ops.includes(token.value)) return token.value;
    if (token.kind === 'ident' && ops.includes(token.value)) return token.value;
    return null;
  }

  private or(): Value {
    let left = this.and();
    while (this.peekOp('or', '||')) {
      this.pos++;
      const right = this.and();
      left = isTruthy(left) || isTruthy(right);
    }
    return left;
  }

  private and(): Value {
    let left = this.not();
    while (this.peekOp('and', '&&')) {
      this.pos++;
      const right = this.not();
      left = isTruthy(left) && isTruthy(right);
    }
    return left;
  }

  private not(): Value {
    if (this.peekOp('not', '!')) {
      this.pos++;
      return !isTruthy(this.not());
    }
    return this.comparison();
  }

  private comparison(): Value {
    const left = this.additive();
    const op = this.peekOp('==', '!=', '<', '<=', '>', '>=');
    if (!op) return left;
    this.pos++;
    const right = this.additive();
    return compare(left, op, right);
  }

  private additive(): Value {
    let left = this.term();
    for (let op = this.peekOp('+', '-'); op; op = this.peekOp('+', '-')) {
      this.pos++;
      const right = this.term();
      if (op === '+' && typeof left === 'string' && typeof right === 'string' &&
          !(isNumeric(left) && isNumeric(right))) {
        left = left + right;
      } else {
        left = op === '+' ? toNumber(left) + toNumber(right) : toNumber(left) - toNumber(right);
      }
    }
    return left;
  }

  private term(): Value {
    let left = this.unary();
    for (let op = this.peekOp('*', '/', '%'); op; op = this.peekOp('*', '/', '%')) {
      this.pos++;
      const a = toNumber(left);
      const b = toNumber(this.unary());
      if (op === '*') {
        left = a * b;
      } else if (b === 0) {
        throw new ExpressionError(op === '/' ? 'division by zero' : 'modulo by zero');
      } else {
        left = op === '/' ? a / b : a % b;
      }
    }
    return left;
  }

  private unary(): Value {
    const op = this.peekOp('-', '+');
    if (op) {
      this.pos++;
      const operand = toNumber(this.unary());
      return op === '-' ? -operand : operand;
    }
    return this.power();
  }

  private power(): Value {
    const base = this.primary();
    if (this.peekOp('**')) {
      this.pos++;
      return toNumber(base) ** toNumber(this.unary());
    }
    return base;
  }

  private primary(): Value {
    const token = this.tokens[this.pos];
    if (!token) {
      throw new ExpressionError('unexpected end of expression');
    }
    this.pos++;

    switch (token.kind) {
      case 'number':
      case 'string':
        return token.value;
      case 'field': {
        const field = this.scope.fields?.[token.value];
        return field ?? '';
      }
      case 'ident': {
        const variables = this.scope.variables ?? {};
        if (!Object.hasOwn(variables, token.value)) {
          throw new ExpressionError(`unknown name '${token.value}'`);
        }
        return variables[token.value];
      }
      case 'op':
        if (token.value === '(') {
          const inner = this.or();
          if (!this.peekOp(')')) {
            throw new ExpressionError("missing ')'");
          }
          this.pos++;
          return inner;
        }
        throw new ExpressionError(`unexpected '${token.value}'`);
    }
  }
}

function compare(left: Value, op: string, right: Value): boolean {
  let sign: number;
  if (isNumeric(left) && isNumeric(right)) {
    sign = Math.sign(toNumber(left) - toNumber(right));
  } else {
    const a = formatValue(left);
    const b = formatValue(right);
    sign = a < b ? -1 : a > b ? 1 : 0;
  }

  switch (op) {
    case '==': return sign === 0;
    case '!=': return sign !== 0;
    case '<': return sign < 0;
    case '<=': return sign <= 0;
    case '>': return sign > 0;
    default: return sign >= 0;
  }
}

/**
 * Evaluate an expression.
 *
 * @throws ExpressionError on a syntax error, an unknown name, a type
 *   mismatch, or division or modulo by zero
 *
 * @example
 * evaluate('2 + 3 * 4')                          // 14
 * evaluate('$2 > 10', { fields: ['a 12', 'a', '12'] })  // true
 */
export function evaluate(source: string, scope: Scope = {}): Value {
  return new Parser(lex(source), scope).parse();
}
