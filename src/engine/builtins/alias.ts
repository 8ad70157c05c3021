import { UsageError } from '../errors';
import { usageOf } from '../docs';
import type { AliasRequest, BuiltinCommand } from '../types';

function isValidAliasName(name: string): boolean {
  // Only the name=value separator and whitespace clash with the tokenizer
  return name.length > 0 && !/[=\s]/.test(name);
}

function stripQuotes(value: string): string {
  if (value.length >= 2 &&
      ((value.startsWith("'") && value.endsWith("'")) ||
       (value.startsWith('"') && value.endsWith('"')))) {
    return value.slice(1, -1);
  }
  return value;
}

function formatAlias(name: string, command: string): string {
  return `alias ${name}='${command}'`;
}

/**
 * alias - Define or display aliases
 * Usage: alias                    Lists all aliases
 *        alias name               Shows definition of alias 'name'
 *        alias name value...      Defines alias 'name'
 *        alias name=value...      Same as above (quotes optional)
 */
export const alias: BuiltinCommand = async (args, context) => {
  const { aliases } = context;

  if (args.length === 0) {
    const output = Array.from(aliases.entries())
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([name, command]) => formatAlias(name, command))
      .join('\n');

    return {
      stdout: output,
      stderr: '',
      exitCode: 0
    };
  }

  const [first, ...rest] = args;
  const equalIndex = first.indexOf('=');

  if (equalIndex === -1 && rest.length === 0) {
    const command = aliases.get(first);
    if (command === undefined) {
      return {
        stdout: '',
        stderr: `alias: ${first}: not found`,
        exitCode: 1
      };
    }
    return {
      stdout: formatAlias(first, command),
      stderr: '',
      exitCode: 0
    };
  }

  const name = equalIndex === -1 ? first : first.slice(0, equalIndex);
  const words = equalIndex === -1 ? rest : [first.slice(equalIndex + 1), ...rest];
  const command = stripQuotes(words.join(' ').trim());

  if (!isValidAliasName(name)) {
    return {
      stdout: '',
      stderr: `alias: '${name}': invalid alias name`,
      exitCode: 1
    };
  }
  if (command === '') {
    return {
      stdout: '',
      stderr: `alias: ${name}: empty alias value`,
      exitCode: 1
    };
  }

  // The shell applies the request after the handler returns
  context.aliasRequests = [...(context.aliasRequests ?? []), { action: 'add', name, command }];

  return {
    stdout: '',
    stderr: '',
    exitCode: 0
  };
};

/**
 * unalias - Remove alias definitions
 * Usage: unalias name [name2 ...]
 */
export const unalias: BuiltinCommand = async (args, context) => {
  if (args.length === 0) {
    throw new UsageError(usageOf('unalias'));
  }

  const errors: string[] = [];
  const requests: AliasRequest[] = [];

  for (const name of args) {
    if (!context.aliases.has(name)) {
      errors.push(`unalias: ${name}: not found`);
      continue;
    }
    requests.push({ action: 'remove', name });
  }

  if (requests.length > 0) {
    context.aliasRequests = [...(context.aliasRequests ?? []), ...requests];
  }

  return {
    stdout: '',
    stderr: errors.join('\n'),
    exitCode: errors.length > 0 ? 1 : 0
  };
};
