/**
 * @fileoverview FileStore contract.
 *
 * Every path taken or returned here is a virtual absolute path (see
 * {@link module:vfs/path}). Implementations report missing entries with
 * NotFoundError and any other OS failure with IOError.
 *
 * @module vfs/store
 */

export type EntryType = 'file' | 'directory' | 'symlink' | 'other';

/**
 * Metadata for a single entry, as reported by `stat`.
 */
export interface EntryStat {
  name: string;
  type: EntryType;
  size: number;
  /** Permission bits only (e.g. 0o644) */
  mode: number;
  uid: number;
  gid: number;
  modifiedAt: Date;
  accessedAt: Date;
  createdAt: Date;
}

/**
 * Filesystem capacity, in bytes.
 */
export interface DiskSpace {
  total: number;
  used: number;
  free: number;
}

/**
 * One entry produced by `walk`.
 */
export interface WalkEntry {
  path: string;
  name: string;
  type: EntryType;
}

export interface FileStore {
  exists(path: string): boolean;
  isFile(path: string): boolean;
  isDirectory(path: string): boolean;

  /** Names of the entries in a directory, unsorted */
  list(path: string): string[];

  readText(path: string): string;
  readBytes(path: string): Buffer;
  /**
   * Read a file in chunks of at most `chunkSize` bytes. The handle is closed
   * before this returns, even when the file is unreadable part-way.
   */
  readChunks(path: string, chunkSize?: number): Buffer[];

  writeText(path: string, content: string): void;
  /** Create an empty file, or bump the timestamps of an existing one */
  createFile(path: string): void;
  /** Create a directory and any missing parents */
  mkdir(path: string): void;
  removeFile(path: string): void;
  /** Remove a directory and everything under it */
  removeDirectory(path: string): void;
  copyFile(src: string, dest: string): void;
  move(src: string, dest: string): void;

  /**
   * Create a symbolic link at `link`. The stored target is the host path of
   * `target`, so links keep working when followed from outside the shell.
   */
  symlink(target: string, link: string): void;
  link(existing: string, newPath: string): void;
  /**
   * Return the target of a symbolic link as a virtual path, or as the raw
   * host target when it lies outside Root.
   */
  readlink(path: string): string;
  realpath(path: string): string;

  truncate(path: string, size: number): void;
  stat(path: string): EntryStat;
  chmod(path: string, mode: number): void;
  chown(path: string, uid: number, gid: number): void;

  /** Total size in bytes of a file, or of every file under a directory */
  diskUsage(path: string): number;
  diskFree(): DiskSpace;

  /** Every entry under `path`, depth first, directories before their children */
  walk(path: string): WalkEntry[];

  /**
   * Create a new empty file in `directory`. Each `X` at the end of
   * `template` is replaced with a random character.
   *
   * @returns Virtual path of the created file
   */
  createTempFile(directory: string, template: string): string;

  /**
   * Map a host path back to a virtual one. Returns null when it lies outside
   * Root.
   */
  toVirtualPath(hostPath: string): string | null;
}
