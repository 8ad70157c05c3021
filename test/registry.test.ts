import { describe, it, expect } from 'vitest';
import { BUILTIN_COMMANDS } from '../src/engine/builtins';
import { COMMAND_DOCS, usageOf } from '../src/engine/docs';
import { FatalError } from '../src/engine/errors';
import { buildRegistry } from '../src/engine/registry';
import { ok, type CommandDoc } from '../src/engine/types';

const doc: CommandDoc = { usage: 'x', description: 'x', manual: 'x' };
const noop = async () => ok();

describe('buildRegistry', () => {
  it('should pair every builtin with its documentation', () => {
    const registry = buildRegistry(BUILTIN_COMMANDS, COMMAND_DOCS);
    expect(registry.size).toBe(Object.keys(BUILTIN_COMMANDS).length);
    expect(registry.size).toBe(100);
    expect(registry.list()).toEqual(Object.keys(COMMAND_DOCS).sort());
  });

  it('should document every command with a usage, description and manual text', () => {
    for (const [name, entry] of Object.entries(COMMAND_DOCS)) {
      expect(entry.usage.startsWith(name), name).toBe(true);
      expect(entry.description.length, name).toBeGreaterThan(0);
      expect(entry.manual.length, name).toBeGreaterThan(0);
    }
  });

  it('should look up names case-insensitively', () => {
    const registry = buildRegistry(BUILTIN_COMMANDS, COMMAND_DOCS);
    expect(registry.get('LS')?.name).toBe('ls');
    expect(registry.has('Export')).toBe(true);
    expect(registry.get('nope')).toBeNull();
  });

  it('should refuse a handler without documentation', () => {
    expect(() => buildRegistry({ alpha: noop, beta: noop }, { alpha: doc })).toThrow(
      new FatalError('command table out of sync (undocumented: beta)')
    );
  });

  it('should refuse documentation without a handler', () => {
    expect(() => buildRegistry({ alpha: noop }, { alpha: doc, gamma: doc, beta: doc })).toThrow(
      'command table out of sync (no handler: beta, gamma)'
    );
  });

  it('should freeze the table', () => {
    const registry = buildRegistry({ alpha: noop }, { alpha: doc });
    expect(Object.isFrozen(registry)).toBe(true);
    expect(Object.isFrozen(registry.get('alpha'))).toBe(true);
  });
});

describe('usageOf', () => {
  it('should return the documented usage line', () => {
    expect(usageOf('cat')).toBe('cat <file>');
    expect(usageOf('cut')).toBe('cut -f N [-d D] <file>');
  });
});
