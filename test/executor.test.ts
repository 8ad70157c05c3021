import { describe, it, expect } from 'vitest';
import { ExpressionError, NotFoundError, UsageError } from '../src/engine/errors';
import { EXIT_INTERRUPTED, EXIT_NOT_FOUND, dispatch } from '../src/engine/executor';
import { buildRegistry } from '../src/engine/registry';
import { pause } from '../src/engine/timing';
import { ok, type BuiltinCommand, type CommandDoc, type ExecutionContext } from '../src/engine/types';
import { Logger, MemoryLogSink } from '../src/logging/logger';
import { HostFileStore } from '../src/vfs/host';
import { createMockTerminal } from './helpers/terminal';

const doc = (usage: string): CommandDoc => ({ usage, description: usage, manual: usage });

const handlers: Record<string, BuiltinCommand> = {
  echoargs: async args => ok(args.join('|')),
  broken: async () => {
    throw new Error('disk on fire');
  },
  lookup: async () => {
    throw new NotFoundError('missing.txt: No such file or directory');
  },
  badexpr: async () => {
    throw new ExpressionError("not a number: 'x'");
  },
  needsargs: async () => {
    throw new UsageError('needsargs <file>');
  },
  wait: async (_args, context) => {
    await pause(10_000, context.signal);
    return ok('finished');
  },
};

const registry = buildRegistry(handlers, {
  echoargs: doc('echoargs <args...>'),
  broken: doc('broken'),
  lookup: doc('lookup'),
  badexpr: doc('badexpr'),
  needsargs: doc('needsargs <file>'),
  wait: doc('wait'),
});

function createContext(options: { aliases?: Map<string, string>; signal?: AbortSignal } = {}) {
  const sink = new MemoryLogSink();
  const context: ExecutionContext = {
    env: {},
    aliases: options.aliases ?? new Map(),
    history: [],
    cwd: '/',
    fs: new HostFileStore('.'),
    logger: new Logger(sink, { now: () => new Date(2026, 0, 1) }),
    terminal: createMockTerminal(),
    signal: options.signal ?? new AbortController().signal,
    execute: async () => ok(),
    commands: registry,
    startedAt: new Date(2026, 0, 1),
  };
  return { context, sink };
}

const run = (line: string, context: ExecutionContext, aliasDepth = 64) =>
  dispatch(line, context, { registry, aliasDepth });

describe('dispatch', () => {
  it('should pass positional arguments to the handler', async () => {
    const { context } = createContext();
    expect(await run('echoargs a  b c', context)).toEqual({ stdout: 'a|b|c', stderr: '', exitCode: 0 });
  });

  it('should do nothing for a blank line', async () => {
    const { context } = createContext();
    expect(await run('   ', context)).toEqual({ stdout: '', stderr: '', exitCode: 0 });
  });

  it('should match command names case-insensitively', async () => {
    const { context } = createContext();
    expect((await run('ECHOARGS x', context)).stdout).toBe('x');
  });

  it('should report unknown commands with exit 127', async () => {
    const { context } = createContext();
    expect(await run('frobnicate now', context)).toEqual({
      stdout: '',
      stderr: 'frobnicate: command not found',
      exitCode: EXIT_NOT_FOUND,
    });
  });

  it('should expand aliases before lookup', async () => {
    const { context } = createContext({ aliases: new Map([['e', 'echoargs one']]) });
    expect((await run('e two', context)).stdout).toBe('one|two');
  });

  it('should report an alias cycle and log a warning', async () => {
    const { context, sink } = createContext({ aliases: new Map([['a', 'b'], ['b', 'a']]) });
    expect(await run('a', context)).toEqual({
      stdout: '',
      stderr: 'alias cycle detected: a -> b -> a',
      exitCode: 1,
    });
    expect(sink.lines).toEqual([
      '2026-01-01 00:00:00 - WARNING - engine/executor - a: alias cycle detected: a -> b -> a',
    ]);
  });

  describe('failure boundary', () => {
    it('should prefix the command name to a handler error', async () => {
      const { context } = createContext();
      expect(await run('lookup', context)).toEqual({
        stdout: '',
        stderr: 'lookup: missing.txt: No such file or directory',
        exitCode: 1,
      });
      expect((await run('badexpr', context)).stderr).toBe("badexpr: not a number: 'x'");
    });

    it('should report usage errors with exit 2', async () => {
      const { context } = createContext();
      expect(await run('needsargs', context)).toEqual({
        stdout: '',
        stderr: 'needsargs: usage: needsargs <file>',
        exitCode: 2,
      });
    });

    it('should contain unexpected errors and log them with the command line', async () => {
      const { context, sink } = createContext();
      expect(await run('broken --now', context)).toEqual({
        stdout: '',
        stderr: 'broken: disk on fire',
        exitCode: 1,
      });
      expect(sink.lines).toHaveLength(1);
      expect(sink.lines[0]).toMatch(/^2026-01-01 00:00:00 - ERROR - engine\/executor - broken --now: disk on fire :: Error: disk on fire/);
    });

    it('should turn an interrupt into exit 130', async () => {
      const controller = new AbortController();
      const { context, sink } = createContext({ signal: controller.signal });
      const pending = run('wait', context);
      controller.abort();
      expect(await pending).toEqual({ stdout: '', stderr: 'wait: interrupted', exitCode: EXIT_INTERRUPTED });
      expect(sink.lines).toEqual(['2026-01-01 00:00:00 - INFO - engine/executor - wait: interrupted']);
    });
  });
});
