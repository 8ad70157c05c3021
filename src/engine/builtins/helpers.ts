/**
 * @fileoverview Argument handling shared by the builtins.
 *
 * @module engine/builtins/helpers
 */

import { UsageError } from '../errors';
import { usageOf } from '../docs';
import { splitLines } from '../text/lines';
import { parseInteger } from '../text/numbers';
import type { ExecutionContext } from '../types';
import { resolvePath } from '../../vfs/path';

/**
 * Check the argument count, throwing the command's usage line otherwise.
 */
export function expectArgs(name: string, args: readonly string[], min: number, max = min): void {
  if (args.length < min || args.length > max) {
    throw new UsageError(usageOf(name));
  }
}

/**
 * Parse an integer argument or fail with the command's usage line.
 */
export function integerArg(name: string, value: string, min = Number.MIN_SAFE_INTEGER): number {
  const parsed = parseInteger(value);
  if (parsed === null || parsed < min) {
    throw new UsageError(usageOf(name));
  }
  return parsed;
}

/**
 * Resolve a user path against the current directory.
 */
export function resolveArg(context: ExecutionContext, userPath: string): string {
  return resolvePath(context.cwd, userPath);
}

export function readTextArg(context: ExecutionContext, userPath: string): string {
  return context.fs.readText(resolveArg(context, userPath));
}

export function readLinesArg(context: ExecutionContext, userPath: string): string[] {
  return splitLines(readTextArg(context, userPath));
}

/**
 * Pull a `-flag value` pair out of an argument list.
 *
 * @returns The flag value (or undefined) and the remaining arguments
 */
export function takeOption(
  name: string,
  args: readonly string[],
  flag: string
): { value: string | undefined; rest: string[] } {
  const index = args.indexOf(flag);
  if (index === -1) return { value: undefined, rest: [...args] };
  const value = args[index + 1];
  if (value === undefined) {
    throw new UsageError(usageOf(name));
  }
  return { value, rest: [...args.slice(0, index), ...args.slice(index + 2)] };
}
