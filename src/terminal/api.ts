/**
 * @fileoverview Terminal API abstraction.
 *
 * The shell engine talks to its terminal only through this interface. The
 * CLI provides a readline-backed implementation (see {@link module:cli/terminal});
 * tests provide a scripted one.
 *
 * @module terminal/api
 */

/**
 * Handle returned by listener registrations.
 */
export interface Disposable {
  dispose(): void;
}

/**
 * High-level terminal API interface.
 *
 * Provides methods for:
 * - Output: write(), writeln(), clear()
 * - Input: readLine(), onInterrupt()
 * - Lifecycle: dispose()
 */
export interface TerminalAPI {
  /** Write text to the terminal (no newline) */
  write: (data: string) => void;
  /** Write text followed by a newline */
  writeln: (data: string) => void;
  /** Clear the entire terminal screen */
  clear: () => void;
  /** Get terminal size in columns and rows */
  getSize: () => { cols: number; rows: number };
  /**
   * Show `prompt` and wait for one line of input. Resolves with null at end
   * of input. Rejects with InterruptedError when the user interrupts while
   * the prompt is showing.
   */
  readLine: (prompt: string) => Promise<string | null>;
  /** Register an interrupt (Ctrl+C) handler used while a command runs */
  onInterrupt: (callback: () => void) => Disposable;
  /** Release the underlying input stream */
  dispose: () => void;
}
