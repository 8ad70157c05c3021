import { NotFoundError } from '../errors';
import type { CommandRegistry } from '../registry';
import type { BuiltinCommand } from '../types';
import { SYSTEM_NAME } from '../../version';

// Default terminal width if not available
const DEFAULT_TERMINAL_WIDTH = 80;
// Minimum width before descriptions go on their own line
const NARROW_SCREEN_THRESHOLD = 60;

/**
 * Lay out `name  description` rows, aligning descriptions in one column.
 * Narrow terminals get the description indented under the name instead.
 */
function formatCommandList(commands: CommandRegistry, termWidth: number): string[] {
  const names = commands.list();
  const nameWidth = Math.max(...names.map(name => name.length));

  return names.flatMap(name => {
    const description = commands.get(name)?.description ?? '';
    if (termWidth < NARROW_SCREEN_THRESHOLD) {
      return [`  ${name}`, `      ${description}`];
    }
    return [`  ${name.padEnd(nameWidth)}  ${description}`];
  });
}

/**
 * help - Display help for shell commands
 * Usage: help [command]
 * Without arguments: lists every command with its description
 * With a command name: displays the description and usage line
 */
export const help: BuiltinCommand = async (args, context) => {
  if (args.length === 0) {
    const termWidth = context.terminal.getSize().cols || DEFAULT_TERMINAL_WIDTH;
    const header = `${SYSTEM_NAME} Shell - Available Commands`;

    const output = [
      header,
      '='.repeat(header.length),
      '',
      ...formatCommandList(context.commands, termWidth),
      '',
      'Type "help <command>" for usage or "man <command>" for the manual page.',
    ];

    return {
      stdout: output.join('\n'),
      stderr: '',
      exitCode: 0
    };
  }

  const spec = context.commands.get(args[0]);
  if (!spec) {
    throw new NotFoundError(`no help topics match '${args[0]}'`);
  }

  return {
    stdout: [`${spec.name}: ${spec.description}`, `Usage: ${spec.usage}`].join('\n'),
    stderr: '',
    exitCode: 0
  };
};
