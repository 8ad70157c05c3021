import { InterruptedError } from '../../src/engine/errors';
import type { Disposable, TerminalAPI } from '../../src/terminal/api';

/** Scripted input entry that simulates Ctrl+C at the prompt */
export const INTERRUPT = Symbol('interrupt');

export type ScriptedInput = string | typeof INTERRUPT;

export interface MockTerminal extends TerminalAPI {
  /** Every chunk written, in order */
  output: string[];
  /** Prompts shown by readLine */
  prompts: string[];
  getOutput: () => string;
  /** Output split into lines, without the trailing empty line */
  getLines: () => string[];
  /** Fire the registered interrupt handlers, as Ctrl+C during a command does */
  interrupt: () => void;
  /** Number of interrupt handlers currently registered */
  interruptHandlerCount: () => number;
  /** Number of times clear() was called */
  clears: number;
}

/**
 * Creates a mock terminal for testing purposes.
 * Records all writes and serves `input` line by line; once the script runs
 * out, readLine reports end of input.
 */
export function createMockTerminal(input: ScriptedInput[] = []): MockTerminal {
  const output: string[] = [];
  const prompts: string[] = [];
  const queue = [...input];
  const handlers = new Set<() => void>();

  const terminal: MockTerminal = {
    output,
    prompts,
    clears: 0,
    getOutput: () => output.join(''),
    getLines: () => {
      const lines = output.join('').split('\n');
      if (lines[lines.length - 1] === '') lines.pop();
      return lines;
    },
    write: (data: string) => {
      output.push(data);
    },
    writeln: (data: string) => {
      output.push(data + '\n');
    },
    clear: () => {
      terminal.clears++;
    },
    getSize: () => ({ cols: 80, rows: 24 }),
    readLine: async (prompt: string) => {
      prompts.push(prompt);
      const next = queue.shift();
      if (next === undefined) return null;
      if (next === INTERRUPT) throw new InterruptedError();
      return next;
    },
    onInterrupt: (callback: () => void): Disposable => {
      handlers.add(callback);
      return { dispose: () => handlers.delete(callback) };
    },
    interrupt: () => {
      for (const handler of [...handlers]) handler();
    },
    interruptHandlerCount: () => handlers.size,
    dispose: () => {
      handlers.clear();
    },
  };

  return terminal;
}
