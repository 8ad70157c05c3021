/**
 * @fileoverview Append-only event log.
 *
 * A single Logger is created by the CLI at startup and handed to the shell,
 * which passes it to every command through the execution context. Each event
 * is written as one line:
 *
 *   2026-10-19 14:03:11 - ERROR - engine/executor - cat missing.txt: not found
 *
 * @module logging/logger
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR';

const LEVEL_RANK: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARNING: 30,
  ERROR: 40,
};

export const LOG_LEVELS: LogLevel[] = ['DEBUG', 'INFO', 'WARNING', 'ERROR'];

/**
 * Destination for formatted log lines.
 */
export interface LogSink {
  write(line: string): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Clock used for timestamps; tests pass a fixed one */
  now?: () => Date;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_RANK, value);
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Format a date as local `YYYY-MM-DD HH:MM:SS`.
 */
export function formatTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * Fold a multi-line message (stack traces) onto one line.
 */
function singleLine(text: string): string {
  return text
    .split('\n')
    .map(part => part.trim())
    .filter(part => part.length > 0)
    .join(' | ');
}

export class Logger {
  private readonly sink: LogSink;
  private readonly threshold: number;
  private readonly now: () => Date;

  constructor(sink: LogSink, options: LoggerOptions = {}) {
    this.sink = sink;
    this.threshold = LEVEL_RANK[options.level ?? 'DEBUG'];
    this.now = options.now ?? (() => new Date());
  }

  debug(source: string, message: string) {
    this.log('DEBUG', source, message);
  }

  info(source: string, message: string) {
    this.log('INFO', source, message);
  }

  warn(source: string, message: string) {
    this.log('WARNING', source, message);
  }

  /**
   * Log an error. When `error` carries a stack it is appended so the failure
   * can be diagnosed from the log alone.
   */
  error(source: string, message: string, error?: unknown) {
    const trace = error instanceof Error && error.stack ? ` :: ${error.stack}` : '';
    this.log('ERROR', source, `${message}${trace}`);
  }

  log(level: LogLevel, source: string, message: string) {
    if (LEVEL_RANK[level] < this.threshold) return;
    this.sink.write(`${formatTimestamp(this.now())} - ${level} - ${source} - ${singleLine(message)}`);
  }
}

/**
 * Sink that appends to a file, creating it (and its directory) if absent.
 * Every write opens and closes the file, so nothing is held open between
 * commands.
 */
export class FileLogSink implements LogSink {
  constructor(readonly file: string) {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.closeSync(fs.openSync(file, 'a'));
  }

  write(line: string) {
    fs.appendFileSync(this.file, line + '\n', 'utf8');
  }
}

/**
 * Sink that keeps lines in memory. Used by tests and by embedders that do not
 * want a log file.
 */
export class MemoryLogSink implements LogSink {
  readonly lines: string[] = [];

  write(line: string) {
    this.lines.push(line);
  }
}

export function createFileLogger(file: string, options?: LoggerOptions): Logger {
  return new Logger(new FileLogSink(file), options);
}
