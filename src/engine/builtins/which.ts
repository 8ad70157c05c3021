import type { BuiltinCommand, ExecutionContext } from '../types';
import { UsageError } from '../errors';
import { usageOf } from '../docs';

function isRegistered(context: ExecutionContext, name: string): boolean {
  return context.commands.has(name);
}

/**
 * which - Show where a command comes from
 * Usage: which <command> [command...]
 * - For aliases: displays the aliased command
 * - For builtins: displays a conventional path (/usr/bin/<command>)
 */
export const which: BuiltinCommand = async (args, context) => {
  if (args.length === 0) {
    throw new UsageError(usageOf('which'));
  }

  const outputs: string[] = [];
  const errors: string[] = [];

  for (const cmd of args) {
    // Aliases shadow commands, as in dispatch
    const aliasValue = context.aliases.get(cmd);
    if (aliasValue !== undefined) {
      outputs.push(`${cmd}: aliased to ${aliasValue}`);
      continue;
    }

    if (isRegistered(context, cmd)) {
      outputs.push(`/usr/bin/${cmd.toLowerCase()}`);
      continue;
    }

    errors.push(`which: ${cmd}: not found`);
  }

  return {
    stdout: outputs.join('\n'),
    stderr: errors.join('\n'),
    exitCode: errors.length > 0 ? 1 : 0
  };
};

/**
 * whereis - Locate the binary, source and manual page of a command
 * Usage: whereis <command> [command...]
 */
export const whereis: BuiltinCommand = async (args, context) => {
  if (args.length === 0) {
    throw new UsageError(usageOf('whereis'));
  }

  const outputs: string[] = [];
  const errors: string[] = [];

  for (const cmd of args) {
    if (!isRegistered(context, cmd)) {
      errors.push(`whereis: ${cmd}: not found`);
      continue;
    }
    const name = cmd.toLowerCase();
    outputs.push(`${name}: /usr/bin/${name} /usr/src/${name} /usr/share/man/man1/${name}.1`);
  }

  return {
    stdout: outputs.join('\n'),
    stderr: errors.join('\n'),
    exitCode: errors.length > 0 ? 1 : 0
  };
};
