/**
 * @fileoverview Startup configuration.
 *
 * Every setting is resolved once, in this order: command-line flag,
 * environment variable, default.
 *
 * | Setting     | Flag            | Environment          | Default            |
 * |-------------|-----------------|----------------------|--------------------|
 * | root        | --root          | BURROW_ROOT          | current directory  |
 * | log file    | --log-file      | BURROW_LOG_FILE      | <root>/burrow.log  |
 * | alias depth | --alias-depth   | BURROW_ALIAS_DEPTH   | 64                 |
 * | log level   | --log-level     | BURROW_LOG_LEVEL     | DEBUG              |
 *
 * @module config
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { FatalError } from './engine/errors';
import { DEFAULT_ALIAS_DEPTH } from './engine/parser';
import { parseInteger } from './engine/text/numbers';
import { LOG_LEVELS, isLogLevel, type LogLevel } from './logging/logger';

export const LOG_FILE_NAME = 'burrow.log';

/**
 * Raw values as commander hands them over.
 */
export interface ConfigFlags {
  root?: string;
  logFile?: string;
  aliasDepth?: string;
  logLevel?: string;
}

export interface ShellConfig {
  root: string;
  logFile: string;
  aliasDepth: number;
  logLevel: LogLevel;
}

function pick(flag: string | undefined, envValue: string | undefined): string | undefined {
  if (flag !== undefined) return flag;
  return envValue !== undefined && envValue !== '' ? envValue : undefined;
}

function resolveRoot(value: string | undefined, cwd: string): string {
  const root = path.resolve(cwd, value ?? '.');
  let stat: fs.Stats | undefined;
  try {
    stat = fs.statSync(root, { throwIfNoEntry: false });
  } catch (error) {
    throw new FatalError(`cannot access root ${root}`, { cause: error });
  }
  if (!stat?.isDirectory()) {
    throw new FatalError(`root is not a directory: ${root}`);
  }
  return root;
}

function resolveAliasDepth(value: string | undefined): number {
  if (value === undefined) return DEFAULT_ALIAS_DEPTH;
  const depth = parseInteger(value);
  if (depth === null || depth < 1) {
    throw new FatalError(`invalid alias depth '${value}' (expected a positive integer)`);
  }
  return depth;
}

function resolveLogLevel(value: string | undefined): LogLevel {
  if (value === undefined) return 'DEBUG';
  const level = value.toUpperCase();
  if (!isLogLevel(level)) {
    throw new FatalError(`invalid log level '${value}' (expected one of ${LOG_LEVELS.join(', ')})`);
  }
  return level;
}

/**
 * Resolve the configuration.
 *
 * @param flags - Parsed command-line options
 * @param env - Environment to read `BURROW_*` variables from
 * @param cwd - Directory relative paths are resolved against
 * @throws FatalError for an unusable root or a malformed value
 */
export function resolveConfig(
  flags: ConfigFlags,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): ShellConfig {
  const root = resolveRoot(pick(flags.root, env.BURROW_ROOT), cwd);
  const logFileValue = pick(flags.logFile, env.BURROW_LOG_FILE);

  return {
    root,
    logFile: logFileValue === undefined ? path.join(root, LOG_FILE_NAME) : path.resolve(cwd, logFileValue),
    aliasDepth: resolveAliasDepth(pick(flags.aliasDepth, env.BURROW_ALIAS_DEPTH)),
    logLevel: resolveLogLevel(pick(flags.logLevel, env.BURROW_LOG_LEVEL)),
  };
}
