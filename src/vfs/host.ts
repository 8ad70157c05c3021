/**
 * @fileoverview Host-backed FileStore.
 *
 * Maps virtual paths onto a fixed host directory (Root). The mapping is pure
 * path arithmetic: the virtual path is normalized first, so it cannot contain
 * `..`, and is then joined onto Root. Nothing outside Root is addressable
 * through a virtual path.
 *
 * All calls are synchronous; commands run one at a time and the files they
 * touch are local.
 *
 * @module vfs/host
 */

import * as fs from 'node:fs';
import * as nodePath from 'node:path';
import { randomBytes } from 'node:crypto';
import { FatalError, IOError, NotFoundError } from '../engine/errors';
import { basenameOf, normalizePath } from './path';
import type { DiskSpace, EntryStat, EntryType, FileStore, WalkEntry } from './store';

/** Default chunk size for `readChunks` */
export const CHUNK_SIZE = 64 * 1024;

const TEMP_ALPHABET = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

const ERRNO_TEXT: Record<string, string> = {
  EACCES: 'Permission denied',
  EPERM: 'Operation not permitted',
  EEXIST: 'File exists',
  EISDIR: 'Is a directory',
  ENOTEMPTY: 'Directory not empty',
  ENOSPC: 'No space left on device',
  EROFS: 'Read-only file system',
  EINVAL: 'Invalid argument',
};

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Translate a Node filesystem error into the shell's taxonomy. Host paths
 * never appear in the message.
 */
function translate(error: unknown, virtualPath: string): Error {
  if (error instanceof NotFoundError || error instanceof IOError) {
    return error;
  }
  const code = errnoCode(error);
  if (code === 'ENOENT' || code === 'ENOTDIR') {
    return new NotFoundError(`${virtualPath}: No such file or directory`, { cause: error });
  }
  const text = code ? (ERRNO_TEXT[code] ?? code) : 'I/O error';
  return new IOError(`${virtualPath}: ${text}${code ? ` (${code})` : ''}`, { cause: error });
}

function entryType(stats: fs.Stats | fs.Dirent): EntryType {
  if (stats.isSymbolicLink()) return 'symlink';
  if (stats.isDirectory()) return 'directory';
  if (stats.isFile()) return 'file';
  return 'other';
}

/**
 * FileStore rooted at a host directory.
 *
 * @example
 * const store = new HostFileStore('/srv/sandbox');
 * store.writeText('/notes/todo.txt', 'buy milk\n');
 * store.toHostPath('/notes/todo.txt'); // '/srv/sandbox/notes/todo.txt'
 */
export class HostFileStore implements FileStore {
  readonly root: string;

  /**
   * @param root - Host directory that becomes `/`. Must exist.
   * @throws FatalError when root is missing or not a directory
   */
  constructor(root: string) {
    let resolved: string;
    try {
      resolved = fs.realpathSync(nodePath.resolve(root));
    } catch (error) {
      throw new FatalError(`root directory does not exist: ${root}`, { cause: error });
    }
    if (!fs.statSync(resolved).isDirectory()) {
      throw new FatalError(`root is not a directory: ${root}`);
    }
    this.root = resolved;
  }

  /**
   * Convert a virtual path to the host path it denotes.
   */
  toHostPath(virtualPath: string): string {
    const segments = normalizePath(virtualPath).split('/').filter(Boolean);
    return nodePath.join(this.root, ...segments);
  }

  toVirtualPath(hostPath: string): string | null {
    const relative = nodePath.relative(this.root, nodePath.resolve(this.root, hostPath));
    if (relative === '') return '/';
    if (relative.startsWith('..') || nodePath.isAbsolute(relative)) return null;
    return '/' + relative.split(nodePath.sep).join('/');
  }

  private run<T>(virtualPath: string, operation: (hostPath: string) => T): T {
    try {
      return operation(this.toHostPath(virtualPath));
    } catch (error) {
      throw translate(error, virtualPath);
    }
  }

  exists(path: string): boolean {
    return fs.existsSync(this.toHostPath(path));
  }

  isFile(path: string): boolean {
    const stats = fs.statSync(this.toHostPath(path), { throwIfNoEntry: false });
    return stats?.isFile() ?? false;
  }

  isDirectory(path: string): boolean {
    const stats = fs.statSync(this.toHostPath(path), { throwIfNoEntry: false });
    return stats?.isDirectory() ?? false;
  }

  list(path: string): string[] {
    return this.run(path, host => fs.readdirSync(host));
  }

  readText(path: string): string {
    return this.run(path, host => fs.readFileSync(host, 'utf8'));
  }

  readBytes(path: string): Buffer {
    return this.run(path, host => fs.readFileSync(host));
  }

  readChunks(path: string, chunkSize = CHUNK_SIZE): Buffer[] {
    return this.run(path, host => {
      const chunks: Buffer[] = [];
      const fd = fs.openSync(host, 'r');
      try {
        for (;;) {
          const buffer = Buffer.alloc(chunkSize);
          const read = fs.readSync(fd, buffer, 0, chunkSize, null);
          if (read === 0) break;
          chunks.push(buffer.subarray(0, read));
        }
      } finally {
        fs.closeSync(fd);
      }
      return chunks;
    });
  }

  writeText(path: string, content: string): void {
    this.run(path, host => fs.writeFileSync(host, content, 'utf8'));
  }

  createFile(path: string): void {
    this.run(path, host => {
      const now = new Date();
      if (fs.existsSync(host)) {
        fs.utimesSync(host, now, now);
      } else {
        fs.closeSync(fs.openSync(host, 'a'));
      }
    });
  }

  mkdir(path: string): void {
    this.run(path, host => {
      fs.mkdirSync(host, { recursive: true });
    });
  }

  removeFile(path: string): void {
    this.run(path, host => fs.unlinkSync(host));
  }

  removeDirectory(path: string): void {
    if (normalizePath(path) === '/') {
      throw new IOError('/: cannot remove the root directory');
    }
    this.run(path, host => {
      if (!fs.statSync(host).isDirectory()) {
        throw new IOError(`${path}: Not a directory`);
      }
      fs.rmSync(host, { recursive: true });
    });
  }

  copyFile(src: string, dest: string): void {
    const from = this.run(src, host => host);
    this.run(dest, host => fs.copyFileSync(from, host));
  }

  move(src: string, dest: string): void {
    if (!this.exists(src)) {
      throw new NotFoundError(`${src}: No such file or directory`);
    }
    const from = this.toHostPath(src);
    this.run(dest, host => fs.renameSync(from, host));
  }

  symlink(target: string, link: string): void {
    const hostTarget = this.toHostPath(target);
    this.run(link, host => fs.symlinkSync(hostTarget, host));
  }

  link(existing: string, newPath: string): void {
    if (!this.exists(existing)) {
      throw new NotFoundError(`${existing}: No such file or directory`);
    }
    const from = this.toHostPath(existing);
    this.run(newPath, host => fs.linkSync(from, host));
  }

  readlink(path: string): string {
    return this.run(path, host => {
      const target = fs.readlinkSync(host);
      const absolute = nodePath.resolve(nodePath.dirname(host), target);
      return this.toVirtualPath(absolute) ?? target;
    });
  }

  realpath(path: string): string {
    return this.run(path, host => {
      const real = fs.realpathSync(host);
      const virtual = this.toVirtualPath(real);
      if (virtual === null) {
        throw new IOError(`${path}: resolves outside the shell root`);
      }
      return virtual;
    });
  }

  truncate(path: string, size: number): void {
    this.run(path, host => {
      if (!fs.existsSync(host)) {
        fs.closeSync(fs.openSync(host, 'a'));
      }
      fs.truncateSync(host, size);
    });
  }

  stat(path: string): EntryStat {
    return this.run(path, host => {
      const stats = fs.lstatSync(host);
      return {
        name: basenameOf(path),
        type: entryType(stats),
        size: stats.size,
        mode: stats.mode & 0o7777,
        uid: stats.uid,
        gid: stats.gid,
        modifiedAt: stats.mtime,
        accessedAt: stats.atime,
        createdAt: stats.birthtime,
      };
    });
  }

  chmod(path: string, mode: number): void {
    this.run(path, host => fs.chmodSync(host, mode));
  }

  chown(path: string, uid: number, gid: number): void {
    this.run(path, host => fs.chownSync(host, uid, gid));
  }

  diskUsage(path: string): number {
    return this.run(path, host => this.usageOf(host));
  }

  private usageOf(host: string): number {
    const stats = fs.lstatSync(host);
    if (!stats.isDirectory()) return stats.size;
    let total = 0;
    for (const name of fs.readdirSync(host)) {
      total += this.usageOf(nodePath.join(host, name));
    }
    return total;
  }

  diskFree(): DiskSpace {
    return this.run('/', host => {
      const stats = fs.statfsSync(host);
      const total = stats.blocks * stats.bsize;
      const free = stats.bavail * stats.bsize;
      return { total, used: total - stats.bfree * stats.bsize, free };
    });
  }

  walk(path: string): WalkEntry[] {
    const start = normalizePath(path);
    const entries: WalkEntry[] = [];

    const visit = (virtualDir: string) => {
      const dirents = this.run(virtualDir, host => fs.readdirSync(host, { withFileTypes: true }));
      dirents.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
      for (const dirent of dirents) {
        const childPath = virtualDir === '/' ? `/${dirent.name}` : `${virtualDir}/${dirent.name}`;
        const type = entryType(dirent);
        entries.push({ path: childPath, name: dirent.name, type });
        if (type === 'directory') visit(childPath);
      }
    };

    visit(start);
    return entries;
  }

  createTempFile(directory: string, template: string): string {
    const trailing = /X+$/.exec(template);
    const prefix = trailing ? template.slice(0, trailing.index) : template;
    const length = trailing ? trailing[0].length : 6;

    for (let attempt = 0; attempt < 16; attempt++) {
      const suffix = Array.from(randomBytes(length), byte => TEMP_ALPHABET[byte % TEMP_ALPHABET.length]).join('');
      const virtual = normalizePath(`${directory}/${prefix}${suffix}`);
      try {
        fs.closeSync(fs.openSync(this.toHostPath(virtual), 'wx'));
        return virtual;
      } catch (error) {
        if (errnoCode(error) !== 'EEXIST') throw translate(error, virtual);
      }
    }
    throw new IOError(`${directory}: could not create a unique temporary file`);
  }
}
