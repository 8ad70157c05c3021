/**
 * @fileoverview Help and manual text for every command.
 *
 * The table lives in `src/data/commands.json` so it can be edited without
 * touching code. The registry refuses to start if it and the handler table
 * disagree.
 *
 * @module engine/docs
 */

import commands from '../data/commands.json';
import type { CommandDoc } from './types';

export const COMMAND_DOCS: Readonly<Record<string, CommandDoc>> = commands;

/**
 * Usage line for a command, without the leading `usage: `.
 */
export function usageOf(name: string): string {
  return Object.hasOwn(COMMAND_DOCS, name) ? COMMAND_DOCS[name].usage : name;
}
