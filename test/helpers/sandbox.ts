import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { ShellEngine } from '../../src/engine/shell';
import type { CommandResult } from '../../src/engine/types';
import { Logger, MemoryLogSink } from '../../src/logging/logger';
import { HostFileStore } from '../../src/vfs/host';
import { createMockTerminal, type MockTerminal, type ScriptedInput } from './terminal';

export interface Sandbox {
  /** Host directory used as the shell root */
  root: string;
  store: HostFileStore;
  sink: MemoryLogSink;
  logger: Logger;
  terminal: MockTerminal;
  shell: ShellEngine;
  /** Run one command line through the shell without printing it */
  run: (line: string) => Promise<CommandResult>;
  /** Write a file under the root, creating parent directories */
  writeFile: (virtualPath: string, content: string | Buffer) => void;
  readFile: (virtualPath: string) => string;
  cleanup: () => void;
}

export const FIXED_NOW = new Date(2026, 1, 3, 4, 5, 6);

/**
 * Create a shell rooted at a fresh temporary directory.
 */
export function createSandbox(input: ScriptedInput[] = []): Sandbox {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), 'burrow-test-'));
  const store = new HostFileStore(root);
  const sink = new MemoryLogSink();
  const logger = new Logger(sink, { now: () => FIXED_NOW });
  const terminal = createMockTerminal(input);
  const shell = new ShellEngine(terminal, { fs: store, logger });

  const hostPath = (virtualPath: string) => path.join(store.root, ...virtualPath.split('/').filter(Boolean));

  return {
    root: store.root,
    store,
    sink,
    logger,
    terminal,
    shell,
    run: line => shell.execute(line),
    writeFile: (virtualPath, content) => {
      const target = hostPath(virtualPath);
      fs.mkdirSync(path.dirname(target), { recursive: true });
      fs.writeFileSync(target, content);
    },
    readFile: virtualPath => fs.readFileSync(hostPath(virtualPath), 'utf8'),
    cleanup: () => {
      fs.rmSync(store.root, { recursive: true, force: true });
    },
  };
}
