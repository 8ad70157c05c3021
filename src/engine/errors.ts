/**
 * @fileoverview Error taxonomy for the Burrow shell.
 *
 * Handlers throw these errors; the dispatcher's failure boundary turns them
 * into a one-line message on stderr plus an exit code, and the REPL never
 * sees them. Only {@link FatalError} is allowed to end the process, and only
 * during startup.
 *
 * @module engine/errors
 */

export type ShellErrorKind =
  | 'usage'
  | 'not-found'
  | 'io'
  | 'expression'
  | 'alias-cycle'
  | 'interrupted'
  | 'fatal';

/**
 * Base class for every error the shell knows how to report.
 *
 * @property kind - Discriminator used by the failure boundary
 * @property exitCode - Exit status reported for the failed command
 */
export abstract class ShellError extends Error {
  abstract readonly kind: ShellErrorKind;
  abstract readonly exitCode: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Wrong argument count or shape. The message is the usage line.
 *
 * @example
 * throw new UsageError('cut -f <field> [-d <delim>] <file>');
 * // reported as "usage: cut -f <field> [-d <delim>] <file>"
 */
export class UsageError extends ShellError {
  readonly kind = 'usage';
  readonly exitCode = 2;

  constructor(readonly usage: string) {
    super(`usage: ${usage}`);
  }
}

/** Missing file, directory, alias, help topic or command. */
export class NotFoundError extends ShellError {
  readonly kind = 'not-found';
  readonly exitCode = 1;
}

/**
 * OS-level failure surfaced by the file store. The message carries the
 * underlying error code (EACCES, ENOSPC, ...).
 */
export class IOError extends ShellError {
  readonly kind = 'io';
  readonly exitCode = 1;
}

/** Malformed arithmetic, format string or pattern. */
export class ExpressionError extends ShellError {
  readonly kind = 'expression';
  readonly exitCode = 1;
}

/**
 * Alias expansion revisited a name or went deeper than the configured limit.
 *
 * @property chain - Alias names in the order they were expanded
 */
export class AliasCycleError extends ShellError {
  readonly kind = 'alias-cycle';
  readonly exitCode = 1;

  constructor(readonly chain: string[]) {
    super(`alias cycle detected: ${chain.join(' -> ')}`);
  }
}

/** A running command was unwound by a user interrupt. */
export class InterruptedError extends ShellError {
  readonly kind = 'interrupted';
  readonly exitCode = 130;

  constructor() {
    super('interrupted');
  }
}

/** Startup failure; the CLI logs it and exits with status 1. */
export class FatalError extends ShellError {
  readonly kind = 'fatal';
  readonly exitCode = 1;
}

/**
 * Check whether an unknown thrown value is an abort triggered through an
 * AbortSignal (either our own InterruptedError or the DOMException Node
 * raises from timers and streams).
 */
export function isAbortError(error: unknown): boolean {
  if (error instanceof InterruptedError) return true;
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Render any thrown value as a single line of text.
 */
export function errorMessage(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return message.split('\n')[0];
}
