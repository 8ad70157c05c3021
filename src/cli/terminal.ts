/**
 * @fileoverview Node.js Terminal API adapter for CLI mode.
 *
 * Line input comes from `node:readline`, which supplies line editing and
 * in-session history recall. Output goes straight to stdout. Lines that
 * arrive before the shell asks for them (piped input) are queued.
 *
 * A command that blocks the event loop delays its own Ctrl+C until after it
 * has returned and the next prompt is up. An interrupt that reaches an idle
 * prompt within INTERRUPT_GRACE_MS of a command finishing is therefore
 * dropped instead of ending the session.
 *
 * @module cli/terminal
 */

import * as readline from 'node:readline';
import { InterruptedError } from '../engine/errors';
import type { Disposable, TerminalAPI } from '../terminal/api';

/** Interrupts this soon after a command finished still belong to it */
export const INTERRUPT_GRACE_MS = 250;

export interface NodeTerminalOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream & { columns?: number; rows?: number };
  /** Emitter of `SIGINT` (defaults to the process) */
  signals?: NodeJS.EventEmitter;
  /** Monotonic clock in milliseconds */
  now?: () => number;
}

interface PendingRead {
  resolve: (line: string | null) => void;
  reject: (error: Error) => void;
}

/**
 * Create a TerminalAPI implementation for a Node.js process.
 *
 * @example
 * const terminal = createNodeTerminalAPI();
 * const shell = new ShellEngine(terminal, { fs: new HostFileStore(root), logger });
 * const code = await shell.run();
 */
export const createNodeTerminalAPI = (options: NodeTerminalOptions = {}): TerminalAPI => {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;
  const signals = options.signals ?? process;
  const now = options.now ?? (() => performance.now());

  const rl = readline.createInterface({ input, output, historySize: 1000 });

  const queued: string[] = [];
  const interruptHandlers = new Set<() => void>();
  let pending: PendingRead | null = null;
  let closed = false;
  let commandEndedAt = Number.NEGATIVE_INFINITY;

  rl.on('line', (line: string) => {
    if (pending) {
      const { resolve } = pending;
      pending = null;
      resolve(line);
    } else {
      queued.push(line);
    }
  });

  rl.on('close', () => {
    closed = true;
    if (pending) {
      const { resolve } = pending;
      pending = null;
      resolve(null);
    }
  });

  // A running command gets the interrupt; otherwise it ends the prompt.
  const onSigint = () => {
    if (interruptHandlers.size > 0) {
      for (const handler of [...interruptHandlers]) handler();
      return;
    }
    if (now() - commandEndedAt < INTERRUPT_GRACE_MS) {
      return;
    }
    if (pending) {
      const { reject } = pending;
      pending = null;
      reject(new InterruptedError());
    }
  };
  rl.on('SIGINT', onSigint);
  signals.on('SIGINT', onSigint);

  return {
    write: (data: string) => {
      output.write(data);
    },

    writeln: (data: string) => {
      output.write(data + '\n');
    },

    clear: () => {
      // Clear screen and move cursor home
      output.write('\x1b[2J\x1b[H');
    },

    getSize: () => ({
      cols: output.columns || 80,
      rows: output.rows || 24,
    }),

    readLine: (prompt: string) => {
      const next = queued.shift();
      if (next !== undefined) {
        output.write(prompt + next + '\n');
        return Promise.resolve(next);
      }
      if (closed) return Promise.resolve(null);

      return new Promise<string | null>((resolve, reject) => {
        pending = { resolve, reject };
        rl.setPrompt(prompt);
        rl.prompt();
      });
    },

    onInterrupt: (callback: () => void): Disposable => {
      interruptHandlers.add(callback);
      return {
        dispose: () => {
          if (interruptHandlers.delete(callback) && interruptHandlers.size === 0) {
            commandEndedAt = now();
          }
        },
      };
    },

    dispose: () => {
      signals.off('SIGINT', onSigint);
      interruptHandlers.clear();
      rl.close();
    },
  };
};
