import { BUILTIN_COMMANDS } from '../../src/engine/builtins';
import { COMMAND_DOCS } from '../../src/engine/docs';
import { buildRegistry } from '../../src/engine/registry';
import { ok, type ExecutionContext } from '../../src/engine/types';
import { Logger, MemoryLogSink } from '../../src/logging/logger';
import { HostFileStore } from '../../src/vfs/host';
import { createMockTerminal } from './terminal';

/**
 * Execution context for calling a builtin directly. The file store is rooted
 * at the working directory of the test run and should not be written to.
 */
export function createTestContext(overrides: Partial<ExecutionContext> = {}): ExecutionContext {
  return {
    env: {},
    aliases: new Map(),
    history: [],
    cwd: '/',
    fs: new HostFileStore('.'),
    logger: new Logger(new MemoryLogSink()),
    terminal: createMockTerminal(),
    signal: new AbortController().signal,
    execute: async () => ok(),
    commands: buildRegistry(BUILTIN_COMMANDS, COMMAND_DOCS),
    startedAt: new Date(),
    ...overrides,
  };
}
