import pc from 'picocolors';
import { NotFoundError } from '../errors';
import type { BuiltinCommand, CommandDoc } from '../types';

/** Body text is indented like a printed man page */
const INDENT = '       ';

/**
 * Format a man page: a title line, then NAME, SYNOPSIS and DESCRIPTION with
 * bold headings.
 */
function formatManPage(name: string, doc: CommandDoc): string {
  const title = `${name.toUpperCase()}(1)`;
  const output = [
    `${pc.bold(title)}${' '.repeat(20)}User Commands${' '.repeat(20)}${pc.bold(title)}`,
    '',
    pc.bold('NAME'),
    `${INDENT}${name} - ${doc.description}`,
    '',
    pc.bold('SYNOPSIS'),
    `${INDENT}${doc.usage}`,
    '',
    pc.bold('DESCRIPTION'),
    ...doc.manual.split('\n').map(line => (line === '' ? '' : `${INDENT}${line}`)),
  ];

  return output.join('\n');
}

/**
 * man - Display manual pages for commands
 * Usage: man <command>
 * Without arguments: displays usage information
 */
export const man: BuiltinCommand = async (args, context) => {
  if (args.length === 0) {
    return {
      stdout: ['What manual page do you want?', `Usage: ${context.commands.get('man')?.usage ?? 'man <command>'}`].join('\n'),
      stderr: '',
      exitCode: 0
    };
  }

  const spec = context.commands.get(args[0]);
  if (!spec) {
    throw new NotFoundError(`No manual entry for ${args[0]}`);
  }

  return {
    stdout: formatManPage(spec.name, spec),
    stderr: '',
    exitCode: 0
  };
};
