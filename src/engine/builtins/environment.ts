import type { BuiltinCommand, ExportRequest } from '../types';

const IDENTIFIER = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

function sortedEntries(env: Record<string, string>): Array<[string, string]> {
  return Object.entries(env).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

function formatDeclaration(key: string, value: string): string {
  return `declare -x ${key}="${value}"`;
}

/**
 * env - Display all environment variables
 * Usage: env
 * Lists all environment variables in KEY=value format
 */
export const env: BuiltinCommand = async (_args, context) => {
  const output = sortedEntries(context.env)
    .map(([key, value]) => `${key}=${value}`)
    .join('\n');

  return {
    stdout: output,
    stderr: '',
    exitCode: 0
  };
};

/**
 * export - Set an environment variable
 * Usage: export KEY=value
 *        export KEY value
 *        export KEY (displays its declaration)
 *        export (lists all exported variables)
 */
export const exportCmd: BuiltinCommand = async (args, context) => {
  if (args.length === 0) {
    return {
      stdout: sortedEntries(context.env)
        .map(([key, value]) => formatDeclaration(key, value))
        .join('\n'),
      stderr: '',
      exitCode: 0
    };
  }

  const [first, ...rest] = args;
  const equalIndex = first.indexOf('=');

  if (equalIndex === -1 && rest.length === 0) {
    const value = context.env[first];
    if (value === undefined) {
      return {
        stdout: '',
        stderr: `export: ${first}: not set`,
        exitCode: 1
      };
    }
    return {
      stdout: formatDeclaration(first, value),
      stderr: '',
      exitCode: 0
    };
  }

  const request: ExportRequest = equalIndex === -1
    ? { key: first, value: rest.join(' ') }
    : { key: first.slice(0, equalIndex), value: [first.slice(equalIndex + 1), ...rest].join(' ') };

  if (!IDENTIFIER.test(request.key)) {
    return {
      stdout: '',
      stderr: `export: '${request.key}': not a valid identifier`,
      exitCode: 1
    };
  }

  // Store the export request in context for the shell to process
  context.exportRequests = [...(context.exportRequests ?? []), request];

  return {
    stdout: '',
    stderr: '',
    exitCode: 0
  };
};

/**
 * unset - Remove an environment variable
 * Usage: unset KEY [KEY2 ...]
 */
export const unset: BuiltinCommand = async (args, context) => {
  const errors: string[] = [];
  const keys: string[] = [];

  for (const key of args) {
    if (!IDENTIFIER.test(key)) {
      errors.push(`unset: '${key}': not a valid identifier`);
      continue;
    }
    keys.push(key);
  }

  if (keys.length > 0) {
    context.unsetRequests = [...(context.unsetRequests ?? []), ...keys];
  }

  return {
    stdout: '',
    stderr: errors.join('\n'),
    exitCode: errors.length > 0 ? 1 : 0
  };
};
