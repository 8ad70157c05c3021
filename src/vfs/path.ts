/**
 * @fileoverview Virtual path arithmetic and the shell's working directory.
 *
 * Virtual paths are POSIX-style absolute strings where `/` denotes Root.
 * Resolution is pure string manipulation: `..` above `/` is clamped, so a
 * resolved path can never name anything outside Root. The host process
 * working directory is never read or changed.
 *
 * @module vfs/path
 */

import { NotFoundError } from '../engine/errors';

/**
 * Collapse `.`, `..` and empty segments. Always returns an absolute path;
 * `..` at the top level stays at `/`.
 *
 * @example
 * normalizePath('/a/./b/../c')   // '/a/c'
 * normalizePath('/../../etc')    // '/etc'
 */
export function normalizePath(p: string): string {
  const resolved: string[] = [];

  for (const part of p.split('/')) {
    if (part === '' || part === '.') continue;
    if (part === '..') {
      resolved.pop();
    } else {
      resolved.push(part);
    }
  }

  return '/' + resolved.join('/');
}

/**
 * Resolve a user-supplied path against a virtual current directory.
 *
 * - `~` and `~/x` are relative to `/` (the shell's home is Root)
 * - absolute paths are taken relative to Root
 * - anything else is joined onto `cwd`
 *
 * @example
 * resolvePath('/docs', 'notes.txt')   // '/docs/notes.txt'
 * resolvePath('/docs', '../../..')    // '/'
 * resolvePath('/docs', '/tmp')        // '/tmp'
 */
export function resolvePath(cwd: string, userPath: string): string {
  if (userPath === '~') return '/';
  if (userPath.startsWith('~/')) return normalizePath(userPath.slice(1));
  if (userPath.startsWith('/')) return normalizePath(userPath);
  return normalizePath(`${cwd}/${userPath}`);
}

/**
 * Check whether `candidate` is `ancestor` itself or lies below it.
 */
export function isWithin(ancestor: string, candidate: string): boolean {
  if (ancestor === '/') return true;
  return candidate === ancestor || candidate.startsWith(ancestor + '/');
}

export function dirnameOf(p: string): string {
  const normalized = normalizePath(p);
  const lastSlash = normalized.lastIndexOf('/');
  return lastSlash <= 0 ? '/' : normalized.slice(0, lastSlash);
}

export function basenameOf(p: string): string {
  const normalized = normalizePath(p);
  return normalized === '/' ? '/' : normalized.slice(normalized.lastIndexOf('/') + 1);
}

/**
 * Minimal capability the working directory needs from the file store.
 */
export interface DirectoryProbe {
  isDirectory(virtualPath: string): boolean;
}

/**
 * The shell's notion of "where you are".
 *
 * Only {@link changeDirectory} mutates it, and only after the target has been
 * confirmed to be an existing directory.
 */
export class WorkingDirectory {
  private currentPath = '/';

  constructor(private readonly probe: DirectoryProbe, initial = '/') {
    const start = normalizePath(initial);
    if (probe.isDirectory(start)) {
      this.currentPath = start;
    }
  }

  get current(): string {
    return this.currentPath;
  }

  resolve(userPath: string): string {
    return resolvePath(this.currentPath, userPath);
  }

  /**
   * Move to `userPath`. Throws NotFoundError and leaves the current
   * directory untouched when the target is not an existing directory.
   *
   * @returns The new current directory
   */
  changeDirectory(userPath: string): string {
    const target = this.resolve(userPath);
    if (!this.probe.isDirectory(target)) {
      throw new NotFoundError(`${userPath}: No such directory`);
    }
    this.currentPath = target;
    return target;
  }

  /**
   * Climb to the nearest ancestor that is still a directory, for when the
   * current one disappeared underneath the shell.
   *
   * @returns The previous path when it had to move, otherwise null
   */
  recover(): string | null {
    if (this.probe.isDirectory(this.currentPath)) return null;
    const lost = this.currentPath;
    let candidate = dirnameOf(lost);
    while (candidate !== '/' && !this.probe.isDirectory(candidate)) {
      candidate = dirnameOf(candidate);
    }
    this.currentPath = candidate;
    return lost;
  }
}
