/**
 * @fileoverview Public API for embedding the Burrow shell.
 *
 * @module index
 */

export { ShellEngine, type ShellEngineOptions } from './engine/shell';
export { dispatch, EXIT_INTERRUPTED, EXIT_NOT_FOUND, type DispatchOptions } from './engine/executor';
export { CommandRegistry, buildRegistry } from './engine/registry';
export { BUILTIN_COMMANDS } from './engine/builtins';
export { COMMAND_DOCS } from './engine/docs';
export { tokenize, expandAliases, expandAliasChain, DEFAULT_ALIAS_DEPTH } from './engine/parser';
export { evaluate, type Scope, type Value } from './engine/expression';
export * from './engine/errors';
export type {
  AliasRequest,
  BuiltinCommand,
  CommandDoc,
  CommandResult,
  CommandSpec,
  ExecutionContext,
  ExportRequest,
} from './engine/types';
export { HostFileStore } from './vfs/host';
export type { FileStore, EntryStat, EntryType, DiskSpace, WalkEntry } from './vfs/store';
export { WorkingDirectory, normalizePath, resolvePath } from './vfs/path';
export { Logger, MemoryLogSink, FileLogSink, createFileLogger, type LogLevel, type LogSink } from './logging/logger';
export type { TerminalAPI, Disposable } from './terminal/api';
export { createNodeTerminalAPI } from './cli/terminal';
export { resolveConfig, type ShellConfig, type ConfigFlags } from './config';
export { VERSION, VERSION_STRING } from './version';
