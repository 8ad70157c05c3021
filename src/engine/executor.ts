/**
 * @fileoverview Command dispatch for the Burrow shell.
 *
 * Turns one input line into one CommandResult:
 * 1. tokenize
 * 2. expand the leading alias
 * 3. look the command up in the registry (case-insensitive)
 * 4. run the handler inside a failure boundary
 *
 * Nothing thrown by a handler escapes `dispatch`. Failures become stderr text
 * and an exit code, and are written to the log with the command line.
 *
 * @module engine/executor
 */

import { AliasCycleError, ShellError, errorMessage, isAbortError } from './errors';
import { expandAliasChain, tokenize } from './parser';
import type { CommandRegistry } from './registry';
import { ok, type CommandResult, type ExecutionContext } from './types';

const SOURCE = 'engine/executor';

export const EXIT_NOT_FOUND = 127;
export const EXIT_INTERRUPTED = 130;

/**
 * Options for a single dispatch.
 *
 * @property registry - Command table
 * @property aliasDepth - Alias substitution limit
 */
export interface DispatchOptions {
  registry: CommandRegistry;
  aliasDepth: number;
}

/**
 * Execute one command line.
 *
 * @param line - Raw input line
 * @param context - Execution context; handlers may record requests on it
 * @returns Result of the command, or of the failure that stopped it
 *
 * @example
 * const result = await dispatch('seq 3', context, { registry, aliasDepth: 64 });
 * // { stdout: '1\n2\n3', stderr: '', exitCode: 0 }
 */
export async function dispatch(
  line: string,
  context: ExecutionContext,
  options: DispatchOptions
): Promise<CommandResult> {
  const tokens = tokenize(line);
  if (tokens.length === 0) {
    return ok();
  }

  let words: string[];
  try {
    const expanded = expandAliasChain(
      tokens,
      context.aliases,
      options.aliasDepth,
      name => options.registry.has(name),
      context.expandedAliases
    );
    words = expanded.words;
    // Nested lines run by this command inherit the chain
    context.expandedAliases = expanded.chain;
  } catch (error) {
    if (error instanceof AliasCycleError) {
      context.logger.warn(SOURCE, `${line}: ${error.message}`);
      return { stdout: '', stderr: error.message, exitCode: error.exitCode };
    }
    throw error;
  }

  if (words.length === 0) {
    return ok();
  }

  const [name, ...args] = words;
  const spec = options.registry.get(name);
  if (!spec) {
    return {
      stdout: '',
      stderr: `${name}: command not found`,
      exitCode: EXIT_NOT_FOUND,
    };
  }

  try {
    return await spec.handler(args, context);
  } catch (error) {
    return failureResult(spec.name, line, error, context);
  }
}

/**
 * Convert anything a handler threw into a result, and log it.
 */
function failureResult(
  command: string,
  line: string,
  error: unknown,
  context: ExecutionContext
): CommandResult {
  if (isAbortError(error) || context.signal.aborted) {
    context.logger.info(SOURCE, `${line}: interrupted`);
    return { stdout: '', stderr: `${command}: interrupted`, exitCode: EXIT_INTERRUPTED };
  }

  const message = errorMessage(error);
  context.logger.error(SOURCE, `${line}: ${message}`, error);

  return {
    stdout: '',
    stderr: `${command}: ${message}`,
    exitCode: error instanceof ShellError ? error.exitCode : 1,
  };
}
