/**
 * @fileoverview Arithmetic, comparison and number formatting commands.
 *
 * `expr`, `bc` and `test` go through the expression evaluator; nothing here
 * evaluates host code.
 *
 * @module engine/builtins/math
 */

import { ExpressionError, UsageError } from '../errors';
import { usageOf } from '../docs';
import { evaluate, formatValue, toNumber } from '../expression';
import { divisors, formatNumber, formatPrintf, parseDecimal, parseInteger, seqRange } from '../text/numbers';
import { ok, type BuiltinCommand, type CommandResult, type ExecutionContext } from '../types';
import { expectArgs, integerArg, resolveArg } from './helpers';

/**
 * factor - List every divisor of a number
 * Usage: factor <n>
 *
 * @example
 * factor 12  // 1 2 3 4 6 12
 */
export const factor: BuiltinCommand = async (args) => {
  expectArgs('factor', args, 1);
  return ok(divisors(integerArg('factor', args[0], 1)).join(' '));
};

/**
 * seq - Print a sequence of integers
 * Usage: seq [start [step]] <end>
 */
export const seq: BuiltinCommand = async (args) => {
  expectArgs('seq', args, 1, 3);
  const numbers = args.map(arg => integerArg('seq', arg));

  let values: number[];
  if (numbers.length === 1) {
    values = seqRange(1, 1, numbers[0]);
  } else if (numbers.length === 2) {
    values = seqRange(numbers[0], 1, numbers[1]);
  } else {
    values = seqRange(numbers[0], numbers[1], numbers[2]);
  }
  return ok(values.join('\n'));
};

/**
 * expr - Evaluate an expression
 * Usage: expr <expression...>
 */
export const expr: BuiltinCommand = async (args) => {
  if (args.length === 0) {
    throw new UsageError(usageOf('expr'));
  }
  return ok(formatValue(evaluate(args.join(' '))));
};

/**
 * bc - Calculator; the result must be a number
 * Usage: bc <expression...>
 */
export const bc: BuiltinCommand = async (args) => {
  if (args.length === 0) {
    throw new UsageError(usageOf('bc'));
  }
  return ok(formatValue(toNumber(evaluate(args.join(' ')))));
};

const INTEGER_TESTS: Record<string, (a: number, b: number) => boolean> = {
  '-eq': (a, b) => a === b,
  '-ne': (a, b) => a !== b,
  '-lt': (a, b) => a < b,
  '-le': (a, b) => a <= b,
  '-gt': (a, b) => a > b,
  '-ge': (a, b) => a >= b,
};

function integerOperand(text: string): number {
  const value = parseInteger(text);
  if (value === null) {
    throw new ExpressionError(`integer expression expected: ${text}`);
  }
  return value;
}

function verdict(passed: boolean): CommandResult {
  return { stdout: passed ? 'true' : 'false', stderr: '', exitCode: passed ? 0 : 1 };
}

function fileTest(operator: string, operand: string, context: ExecutionContext): boolean | null {
  const target = resolveArg(context, operand);
  switch (operator) {
    case '-e': return context.fs.exists(target);
    case '-f': return context.fs.isFile(target);
    case '-d': return context.fs.isDirectory(target);
    case '-z': return operand.length === 0;
    case '-n': return operand.length > 0;
    default: return null;
  }
}

/**
 * test - Evaluate a condition
 * Usage: test <a> <op> <b> | test <-e|-f|-d|-z|-n> <operand>
 *
 * Prints `true` or `false`; the exit status is 0 or 1 to match.
 */
export const test: BuiltinCommand = async (args, context) => {
  if (args.length === 2) {
    const result = fileTest(args[0], args[1], context);
    if (result === null) {
      throw new ExpressionError(`unknown unary operator '${args[0]}'`);
    }
    return verdict(result);
  }

  expectArgs('test', args, 3);
  const [left, operator, right] = args;

  if (operator === '=' || operator === '==') return verdict(left === right);
  if (operator === '!=') return verdict(left !== right);
  if (!Object.hasOwn(INTEGER_TESTS, operator)) {
    throw new ExpressionError(`unknown binary operator '${operator}'`);
  }
  return verdict(INTEGER_TESTS[operator](integerOperand(left), integerOperand(right)));
};

/**
 * printf - Formatted output
 * Usage: printf <format> [args...]
 */
export const printf: BuiltinCommand = async (args) => {
  if (args.length === 0) {
    throw new UsageError(usageOf('printf'));
  }
  const text = formatPrintf(args[0], args.slice(1));
  return ok(text.endsWith('\n') ? text.slice(0, -1) : text);
};

/**
 * numfmt - Format a number with a `{}` template
 * Usage: numfmt <format> <number>
 *
 * @example
 * numfmt {:,.2f} 1234.5  // 1,234.50
 */
export const numfmt: BuiltinCommand = async (args) => {
  expectArgs('numfmt', args, 2);
  const value = parseDecimal(args[1]);
  if (value === null) {
    throw new ExpressionError(`invalid number: '${args[1]}'`);
  }
  return ok(formatNumber(args[0], value));
};
