/**
 * @fileoverview Command registry.
 *
 * Built once at startup from the handler table and the documentation table,
 * then frozen. Lookups are case-insensitive.
 *
 * @module engine/registry
 */

import { FatalError } from './errors';
import type { BuiltinCommand, CommandDoc, CommandSpec } from './types';

/**
 * Read-only table of every command the shell knows.
 */
export class CommandRegistry {
  private readonly commands: ReadonlyMap<string, CommandSpec>;

  constructor(specs: CommandSpec[]) {
    const commands = new Map<string, CommandSpec>();
    for (const spec of specs) {
      commands.set(spec.name.toLowerCase(), Object.freeze({ ...spec }));
    }
    this.commands = commands;
    Object.freeze(this);
  }

  /**
   * Get a command by name, ignoring case.
   */
  get(name: string): CommandSpec | null {
    return this.commands.get(name.toLowerCase()) ?? null;
  }

  has(name: string): boolean {
    return this.commands.has(name.toLowerCase());
  }

  /**
   * List all registered command names, sorted
   */
  list(): string[] {
    return Array.from(this.commands.keys()).sort();
  }

  get size(): number {
    return this.commands.size;
  }
}

/**
 * Pair every handler with its documentation.
 *
 * @throws FatalError when a handler has no documentation or documentation
 *   names a command with no handler
 */
export function buildRegistry(
  handlers: Readonly<Record<string, BuiltinCommand>>,
  docs: Readonly<Record<string, CommandDoc>>
): CommandRegistry {
  const handlerNames = Object.keys(handlers).sort();
  const docNames = new Set(Object.keys(docs));

  const undocumented = handlerNames.filter(name => !docNames.has(name));
  const unimplemented = [...docNames].filter(name => !Object.hasOwn(handlers, name)).sort();

  if (undocumented.length > 0 || unimplemented.length > 0) {
    const problems: string[] = [];
    if (undocumented.length > 0) problems.push(`undocumented: ${undocumented.join(', ')}`);
    if (unimplemented.length > 0) problems.push(`no handler: ${unimplemented.join(', ')}`);
    throw new FatalError(`command table out of sync (${problems.join('; ')})`);
  }

  return new CommandRegistry(
    handlerNames.map(name => ({ name, handler: handlers[name], ...docs[name] }))
  );
}
