/**
 * @fileoverview Core type definitions for the Burrow shell engine.
 *
 * This module defines the fundamental types used throughout the shell:
 * - Command execution context and results
 * - The handler signature every builtin implements
 * - Registry entries and their documentation
 *
 * @module engine/types
 */

import type { Logger } from '../logging/logger';
import type { TerminalAPI } from '../terminal/api';
import type { FileStore } from '../vfs/store';
import type { CommandRegistry } from './registry';

/**
 * Result returned from command execution.
 *
 * @property stdout - Standard output produced by the command
 * @property stderr - Standard error output (error messages)
 * @property exitCode - Exit code (0 for success, non-zero for failure)
 * @property directOutput - Set when stdout was already written to the terminal
 *
 * @example
 * // Successful command
 * { stdout: 'file1.txt\nfile2.txt', stderr: '', exitCode: 0 }
 *
 * @example
 * // Failed command
 * { stdout: '', stderr: 'cat: /file.txt: No such file or directory', exitCode: 1 }
 */
export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  directOutput?: boolean;
}

export type AliasRequest =
  | { action: 'add'; name: string; command: string }
  | { action: 'remove'; name: string };

export interface ExportRequest {
  key: string;
  value: string;
}

/**
 * Execution context passed to commands during execution.
 *
 * Snapshots (`env`, `aliases`, `history`) are copies: a handler that wants
 * to change shell state records a request instead, and the shell applies it
 * after the handler returns. That keeps a handler that fails half-way from
 * leaving the session in a mixed state.
 *
 * @property env - Environment variables as key-value pairs
 * @property aliases - Alias table snapshot
 * @property history - Command history, oldest first
 * @property cwd - Current virtual directory
 * @property fs - File store rooted at the shell root
 * @property logger - Event log
 * @property terminal - Terminal, for commands that stream output
 * @property signal - Aborted when the user interrupts the running command
 * @property execute - Run a nested command line (used by `time` and `watch`)
 * @property commands - Command table, for `help`, `man` and `which`
 * @property expandedAliases - Aliases already expanded by this line and the
 *   lines that nest it; a nested line may not expand them again
 */
export interface ExecutionContext {
  env: Record<string, string>;
  aliases: ReadonlyMap<string, string>;
  history: readonly string[];
  cwd: string;
  fs: FileStore;
  logger: Logger;
  terminal: TerminalAPI;
  signal: AbortSignal;
  execute: (line: string) => Promise<CommandResult>;
  commands: CommandRegistry;
  expandedAliases?: readonly string[];
  /** Time the session started, for `uptime` and `ps` */
  startedAt: Date;

  requestedCd?: string;
  aliasRequests?: AliasRequest[];
  exportRequests?: ExportRequest[];
  unsetRequests?: string[];
}

/**
 * Function signature for builtin shell commands.
 *
 * @example
 * const pwd: BuiltinCommand = async (_args, ctx) => {
 *   return { stdout: ctx.cwd, stderr: '', exitCode: 0 };
 * };
 */
export type BuiltinCommand = (args: string[], context: ExecutionContext) => Promise<CommandResult>;

/**
 * Documentation kept for every registered command.
 */
export interface CommandDoc {
  usage: string;
  description: string;
  manual: string;
}

/**
 * A registry entry: the handler plus its documentation.
 */
export interface CommandSpec extends CommandDoc {
  name: string;
  handler: BuiltinCommand;
}

/**
 * Build a successful result.
 */
export function ok(stdout = ''): CommandResult {
  return { stdout, stderr: '', exitCode: 0 };
}

/**
 * Build a failed result without throwing.
 */
export function fail(stderr: string, exitCode = 1): CommandResult {
  return { stdout: '', stderr, exitCode };
}
