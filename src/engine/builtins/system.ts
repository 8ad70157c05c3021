import os from 'node:os';
import pc from 'picocolors';
import { ExpressionError, UsageError, errorMessage } from '../errors';
import { usageOf } from '../docs';
import { monthCalendar, yearCalendar } from '../text/calendar';
import { humanSize, parseDecimal } from '../text/numbers';
import { pause } from '../timing';
import { ok, type BuiltinCommand, type CommandResult } from '../types';
import { formatTimestamp } from '../../logging/logger';
import { SYSTEM_NAME, VERSION, VERSION_STRING } from '../../version';
import { expectArgs, integerArg } from './helpers';

const WATCH_INTERVAL_MS = 2000;
const YES_INTERVAL_MS = 100;

/**
 * Uptime as `up D days, H hours, M minutes`.
 */
export function formatUptime(elapsedMs: number): string {
  const totalMinutes = Math.floor(Math.max(0, elapsedMs) / 60000);
  const days = Math.floor(totalMinutes / 1440);
  const hours = Math.floor((totalMinutes % 1440) / 60);
  const minutes = totalMinutes % 60;
  return `up ${days} days, ${hours} hours, ${minutes} minutes`;
}

function writeResult(result: CommandResult, write: (line: string) => void): void {
  if (result.stdout) write(result.stdout);
  if (result.stderr) write(pc.red(result.stderr));
}

export const about: BuiltinCommand = async () => {
  return ok([
    VERSION_STRING,
    'A sandboxed command-line shell over a single directory tree.',
    `Type 'help' to list the commands.`,
  ].join('\n'));
};

export const clear: BuiltinCommand = async (_args, context) => {
  context.terminal.clear();
  return ok();
};

export const date: BuiltinCommand = async () => {
  return ok(formatTimestamp(new Date()));
};

/**
 * cal - Display a calendar
 * Usage: cal [[month] year]
 * With no arguments, shows the current month; with a year, the whole year.
 */
export const cal: BuiltinCommand = async (args) => {
  expectArgs('cal', args, 0, 2);

  if (args.length === 0) {
    const now = new Date();
    return ok(monthCalendar(now.getFullYear(), now.getMonth() + 1).join('\n'));
  }
  if (args.length === 1) {
    return ok(yearCalendar(integerArg('cal', args[0], 1)).join('\n'));
  }
  const month = integerArg('cal', args[0], 1);
  const year = integerArg('cal', args[1], 1);
  return ok(monthCalendar(year, month).join('\n'));
};

/**
 * uname - Print system information
 * Usage: uname [-a]
 */
export const uname: BuiltinCommand = async (args) => {
  if (args.length === 0) return ok(SYSTEM_NAME);
  if (args.length === 1 && args[0] === '-a') {
    return ok(`${SYSTEM_NAME} ${VERSION} ${os.type()} ${os.release()} ${os.arch()}`);
  }
  throw new UsageError(usageOf('uname'));
};

export const uptime: BuiltinCommand = async (_args, context) => {
  return ok(formatUptime(Date.now() - context.startedAt.getTime()));
};

/**
 * ps - Report the (simulated) process table
 * Usage: ps
 */
export const ps: BuiltinCommand = async (_args, context) => {
  const rows = [
    ['PID', 'NAME', 'STATUS', 'STARTED'],
    ['1', 'init', 'running', formatTimestamp(context.startedAt)],
    [String(process.pid), SYSTEM_NAME.toLowerCase(), 'running', formatTimestamp(context.startedAt)],
  ];
  const widths = rows[0].map((_cell, index) => Math.max(...rows.map(row => row[index].length)));
  return ok(rows.map(row => row.map((cell, index) => cell.padEnd(widths[index])).join('  ').trimEnd()).join('\n'));
};

/**
 * top - One snapshot of load and memory
 * Usage: top
 */
export const top: BuiltinCommand = async (_args, context) => {
  const [one, five, fifteen] = os.loadavg();
  const total = os.totalmem();
  const free = os.freemem();
  return ok([
    `${SYSTEM_NAME} ${formatUptime(Date.now() - context.startedAt.getTime())}`,
    `Tasks: 2 total, 2 running`,
    `Load average: ${one.toFixed(2)} ${five.toFixed(2)} ${fifteen.toFixed(2)}`,
    `CPUs: ${os.cpus().length}`,
    `Mem: ${humanSize(total)} total, ${humanSize(total - free)} used, ${humanSize(free)} free`,
  ].join('\n'));
};

/**
 * kill - Send a signal to a process (simulated; nothing is signalled)
 * Usage: kill <pid>
 */
export const kill: BuiltinCommand = async (args, context) => {
  expectArgs('kill', args, 1);
  const pid = integerArg('kill', args[0], 1);
  context.logger.info('builtins/kill', `simulated SIGTERM to ${pid}`);
  return ok(`Sent SIGTERM to process ${pid} (simulated)`);
};

export const whoami: BuiltinCommand = async (_args, context) => {
  try {
    return ok(os.userInfo().username);
  } catch (error) {
    // No passwd entry for the uid, common in containers
    context.logger.debug('builtins/whoami', errorMessage(error));
    return ok(process.env.USER ?? 'user');
  }
};

/**
 * sleep - Pause for a number of seconds
 * Usage: sleep <seconds>
 */
export const sleep: BuiltinCommand = async (args, context) => {
  expectArgs('sleep', args, 1);
  const seconds = parseDecimal(args[0]);
  if (seconds === null || seconds < 0) {
    throw new ExpressionError(`invalid time interval '${args[0]}'`);
  }
  await pause(seconds * 1000, context.signal);
  return ok();
};

/**
 * time - Run a command and report how long it took
 * Usage: time <command...>
 */
export const time: BuiltinCommand = async (args, context) => {
  if (args.length === 0) {
    throw new UsageError(usageOf('time'));
  }

  const start = performance.now();
  const result = await context.execute(args.join(' '));
  const seconds = (performance.now() - start) / 1000;

  const report = `real ${seconds.toFixed(3)}s`;
  return {
    stdout: result.stdout ? `${result.stdout}\n${report}` : report,
    stderr: result.stderr,
    exitCode: result.exitCode,
  };
};

/**
 * watch - Run a command every two seconds until interrupted
 * Usage: watch <command...>
 */
export const watch: BuiltinCommand = async (args, context) => {
  if (args.length === 0) {
    throw new UsageError(usageOf('watch'));
  }
  const line = args.join(' ');

  for (;;) {
    context.signal.throwIfAborted();
    context.terminal.writeln(`Every ${(WATCH_INTERVAL_MS / 1000).toFixed(1)}s: ${line}`);
    writeResult(await context.execute(line), text => context.terminal.writeln(text));
    await pause(WATCH_INTERVAL_MS, context.signal);
  }
};

/**
 * yes - Print a line repeatedly until interrupted
 * Usage: yes [text...]
 */
export const yes: BuiltinCommand = async (args, context) => {
  const text = args.length > 0 ? args.join(' ') : 'y';

  for (;;) {
    context.signal.throwIfAborted();
    context.terminal.writeln(text);
    await pause(YES_INTERVAL_MS, context.signal);
  }
};

/**
 * history - Show command history
 * Usage: history [count]
 */
export const history: BuiltinCommand = async (args, context) => {
  expectArgs('history', args, 0, 1);
  const entries = context.history;
  const count = args.length === 0 ? entries.length : integerArg('history', args[0], 0);

  const startIndex = Math.max(0, entries.length - count);
  const output = entries
    .slice(startIndex)
    .map((command, i) => `${(startIndex + i + 1).toString().padStart(6)}  ${command}`);

  return ok(output.join('\n'));
};
