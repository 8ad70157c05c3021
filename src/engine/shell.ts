/**
 * @fileoverview Shell engine providing the interactive command loop.
 *
 * The ShellEngine owns the session state and the REPL:
 * - Prompting and reading lines through the TerminalAPI
 * - Command history (every executed line, recorded before it runs)
 * - Session state (aliases, environment, working directory)
 * - Interrupts: Ctrl+C aborts the running command, or ends the session when
 *   pressed at the prompt
 *
 * Commands never change session state directly. They record requests on
 * their ExecutionContext and the engine applies them once the handler
 * returns.
 *
 * @module engine/shell
 */

import pc from 'picocolors';
import type { TerminalAPI } from '../terminal/api';
import type { Logger } from '../logging/logger';
import type { FileStore } from '../vfs/store';
import { WorkingDirectory } from '../vfs/path';
import { BUILTIN_COMMANDS } from './builtins';
import { COMMAND_DOCS } from './docs';
import { InterruptedError, errorMessage } from './errors';
import { EXIT_INTERRUPTED, dispatch } from './executor';
import { DEFAULT_ALIAS_DEPTH, tokenize } from './parser';
import { buildRegistry, type CommandRegistry } from './registry';
import type { CommandResult, ExecutionContext } from './types';

const SOURCE = 'engine/shell';

/**
 * Configuration options for creating a ShellEngine instance.
 *
 * @property fs - File store rooted at the shell root
 * @property logger - Event log shared with every command
 * @property registry - Command table (defaults to every builtin)
 * @property aliasDepth - Alias substitution limit
 * @property env - Initial environment variables
 */
export interface ShellEngineOptions {
  fs: FileStore;
  logger: Logger;
  registry?: CommandRegistry;
  aliasDepth?: number;
  env?: Record<string, string>;
}

/**
 * Interactive shell engine.
 *
 * @example
 * const shell = new ShellEngine(createNodeTerminalAPI(), {
 *   fs: new HostFileStore('/srv/sandbox'),
 *   logger,
 * });
 * process.exitCode = await shell.run();
 */
export class ShellEngine {
  private readonly term: TerminalAPI;
  private readonly fs: FileStore;
  private readonly logger: Logger;
  private readonly registry: CommandRegistry;
  private readonly aliasDepth: number;
  private readonly workingDirectory: WorkingDirectory;
  private readonly startedAt = new Date();
  private history: string[] = [];
  private env: Record<string, string>;
  private aliases = new Map<string, string>();

  /**
   * Create a new ShellEngine instance.
   *
   * @throws FatalError when the command table and its documentation disagree
   */
  constructor(term: TerminalAPI, options: ShellEngineOptions) {
    this.term = term;
    this.fs = options.fs;
    this.logger = options.logger;
    this.registry = options.registry ?? buildRegistry(BUILTIN_COMMANDS, COMMAND_DOCS);
    this.aliasDepth = options.aliasDepth ?? DEFAULT_ALIAS_DEPTH;
    this.env = { ...options.env };
    this.workingDirectory = new WorkingDirectory(this.fs);
  }

  get cwd(): string {
    return this.workingDirectory.current;
  }

  getHistory(): readonly string[] {
    return [...this.history];
  }

  getAliases(): ReadonlyMap<string, string> {
    return new Map(this.aliases);
  }

  getEnv(): Readonly<Record<string, string>> {
    return { ...this.env };
  }

  private getPrompt(): string {
    return `${this.cwd}$ `;
  }

  /**
   * Run the command loop until `exit`, end of input, or an interrupt at the
   * prompt.
   *
   * @returns The process exit code: 0, or 130 after an interrupt at the prompt
   */
  public async run(): Promise<number> {
    this.logger.info(SOURCE, `session started in ${this.cwd} with ${this.registry.size} commands`);

    for (;;) {
      let line: string | null;
      try {
        line = await this.term.readLine(this.getPrompt());
      } catch (error) {
        if (error instanceof InterruptedError) {
          this.term.writeln('^C');
          this.term.writeln('Interrupted. Leaving the shell.');
          return this.shutdown('interrupt at prompt', EXIT_INTERRUPTED);
        }
        this.logger.error(SOURCE, `terminal read failed: ${errorMessage(error)}`, error);
        return this.shutdown('terminal failure', 1);
      }

      if (line === null) {
        this.term.writeln('exit');
        return this.shutdown('end of input', 0);
      }

      const trimmed = line.trim();
      if (trimmed === '') continue;

      this.history.push(trimmed);
      if (tokenize(trimmed)[0].toLowerCase() === 'exit') {
        return this.shutdown('exit command', 0);
      }

      await this.runInteractive(trimmed);
    }
  }

  private shutdown(reason: string, exitCode: number): number {
    this.logger.info(SOURCE, `session ended (${reason}, exit ${exitCode})`);
    return exitCode;
  }

  /**
   * Run one line with Ctrl+C wired to its AbortSignal, then print the result.
   */
  private async runInteractive(line: string): Promise<void> {
    const controller = new AbortController();
    const subscription = this.term.onInterrupt(() => {
      if (controller.signal.aborted) return;
      this.term.writeln('^C');
      controller.abort();
    });

    try {
      this.print(await this.execute(line, controller.signal));
    } catch (error) {
      // Second boundary: anything that escaped dispatch or request handling
      this.logger.error(SOURCE, `${line}: ${errorMessage(error)}`, error);
      this.term.writeln(pc.red(`burrow: ${errorMessage(error)}`));
    } finally {
      subscription.dispose();
    }
  }

  private print(result: CommandResult): void {
    if (result.stdout && !result.directOutput) {
      this.term.writeln(result.stdout);
    }
    if (result.stderr) {
      this.term.writeln(pc.red(result.stderr));
    }
  }

  /**
   * Execute a line without printing its result. Requests recorded by the
   * command are applied unless it was interrupted.
   *
   * @param line - Command line; it is not added to history
   * @param signal - Abort signal for the command (a fresh one by default)
   * @param expandedAliases - Alias chain of the line that runs this one
   */
  public async execute(
    line: string,
    signal: AbortSignal = new AbortController().signal,
    expandedAliases: readonly string[] = []
  ): Promise<CommandResult> {
    this.recoverWorkingDirectory();
    const context: ExecutionContext = {
      env: { ...this.env },
      aliases: new Map(this.aliases),
      history: [...this.history],
      cwd: this.cwd,
      fs: this.fs,
      logger: this.logger,
      terminal: this.term,
      signal,
      execute: nested => this.execute(nested, signal, context.expandedAliases),
      commands: this.registry,
      expandedAliases,
      startedAt: this.startedAt,
    };

    const result = await dispatch(line, context, {
      registry: this.registry,
      aliasDepth: this.aliasDepth,
    });

    if (!signal.aborted) {
      this.applyRequests(context);
    } else if (result.exitCode !== EXIT_INTERRUPTED) {
      this.logger.debug(SOURCE, `${line}: finished after interrupt, requests dropped`);
    }

    this.recoverWorkingDirectory();
    return result;
  }

  /**
   * Keep the current directory pointing at a directory that exists, even if
   * it was removed from the host behind the shell's back.
   */
  private recoverWorkingDirectory(): void {
    const lost = this.workingDirectory.recover();
    if (lost !== null) {
      this.logger.warn(SOURCE, `${lost} no longer exists, moved to ${this.cwd}`);
    }
  }

  private applyRequests(context: ExecutionContext): void {
    for (const { key, value } of context.exportRequests ?? []) {
      this.env[key] = value;
    }

    for (const key of context.unsetRequests ?? []) {
      delete this.env[key];
    }

    for (const request of context.aliasRequests ?? []) {
      if (request.action === 'add') {
        this.aliases.set(request.name, request.command);
      } else {
        this.aliases.delete(request.name);
      }
    }

    if (context.requestedCd !== undefined) {
      this.workingDirectory.changeDirectory(context.requestedCd);
    }
  }
}
