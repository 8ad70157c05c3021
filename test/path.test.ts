import { describe, it, expect } from 'vitest';
import { NotFoundError } from '../src/engine/errors';
import {
  WorkingDirectory,
  basenameOf,
  dirnameOf,
  isWithin,
  normalizePath,
  resolvePath,
} from '../src/vfs/path';
import { randomInt, seededRandom } from './helpers/random';

describe('normalizePath', () => {
  it('should collapse dot segments and duplicate slashes', () => {
    expect(normalizePath('/a/./b//c/')).toBe('/a/b/c');
    expect(normalizePath('/a/b/../c')).toBe('/a/c');
  });

  it('should clamp .. at the root', () => {
    expect(normalizePath('/../../etc/passwd')).toBe('/etc/passwd');
    expect(normalizePath('/a/../../..')).toBe('/');
  });

  it('should treat relative input as rooted', () => {
    expect(normalizePath('a/b')).toBe('/a/b');
    expect(normalizePath('')).toBe('/');
  });
});

describe('resolvePath', () => {
  it('should join relative paths onto the current directory', () => {
    expect(resolvePath('/docs', 'notes.txt')).toBe('/docs/notes.txt');
    expect(resolvePath('/docs/a', '../b')).toBe('/docs/b');
  });

  it('should take absolute paths relative to the root', () => {
    expect(resolvePath('/docs', '/tmp/x')).toBe('/tmp/x');
  });

  it('should treat ~ as the root', () => {
    expect(resolvePath('/docs', '~')).toBe('/');
    expect(resolvePath('/docs', '~/a')).toBe('/a');
  });

  it('should never escape the root however many .. are given', () => {
    expect(resolvePath('/a/b', '../../../../../../etc')).toBe('/etc');
    expect(resolvePath('/', '..')).toBe('/');
  });

  it('should stay a normalized rooted path for generated mixes of segments', () => {
    const random = seededRandom(11);
    const segments = ['..', '..', '.', 'a', 'b', '', '...', '~'];
    const pick = () => Array.from({ length: randomInt(random, 8) }, () => segments[randomInt(random, segments.length)]);

    for (let round = 0; round < 200; round++) {
      const cwd = normalizePath(pick().filter(segment => segment !== '..' && segment !== '.').join('/'));
      const userPath = (random() < 0.3 ? '/' : '') + pick().join('/');
      const resolved = resolvePath(cwd, userPath);

      expect(resolved.startsWith('/')).toBe(true);
      expect(isWithin('/', resolved)).toBe(true);
      expect(normalizePath(resolved)).toBe(resolved);
      const parts = resolved.split('/').slice(1);
      expect(parts.includes('..') || parts.includes('.')).toBe(false);
      expect(resolved === '/' || !parts.includes('')).toBe(true);
    }
  });
});

describe('dirnameOf / basenameOf / isWithin', () => {
  it('should split paths', () => {
    expect(dirnameOf('/a/b/c.txt')).toBe('/a/b');
    expect(dirnameOf('/a')).toBe('/');
    expect(dirnameOf('/')).toBe('/');
    expect(basenameOf('/a/b/c.txt')).toBe('c.txt');
    expect(basenameOf('/')).toBe('/');
  });

  it('should compare path prefixes on segment boundaries', () => {
    expect(isWithin('/a', '/a/b')).toBe(true);
    expect(isWithin('/a', '/a')).toBe(true);
    expect(isWithin('/a', '/ab')).toBe(false);
    expect(isWithin('/', '/anything')).toBe(true);
  });
});

describe('WorkingDirectory.recover', () => {
  it('should climb to the nearest directory that still exists', () => {
    const directories = new Set(['/', '/a', '/a/b/c']);
    const wd = new WorkingDirectory({ isDirectory: (p: string) => directories.has(p) }, '/a/b/c');
    directories.delete('/a/b/c');
    expect(wd.recover()).toBe('/a/b/c');
    expect(wd.current).toBe('/a');
  });

  it('should leave an existing directory alone', () => {
    const wd = new WorkingDirectory({ isDirectory: () => true }, '/a');
    expect(wd.recover()).toBeNull();
    expect(wd.current).toBe('/a');
  });
});

describe('WorkingDirectory', () => {
  const directories = new Set(['/', '/docs', '/docs/old']);
  const probe = { isDirectory: (p: string) => directories.has(p) };

  it('should start at the root', () => {
    expect(new WorkingDirectory(probe).current).toBe('/');
  });

  it('should change into existing directories', () => {
    const wd = new WorkingDirectory(probe);
    expect(wd.changeDirectory('docs')).toBe('/docs');
    expect(wd.changeDirectory('old')).toBe('/docs/old');
    expect(wd.changeDirectory('..')).toBe('/docs');
    expect(wd.current).toBe('/docs');
  });

  it('should throw NotFoundError and stay put for a missing directory', () => {
    const wd = new WorkingDirectory(probe, '/docs');
    expect(() => wd.changeDirectory('missing')).toThrow(NotFoundError);
    expect(() => wd.changeDirectory('missing')).toThrow('missing: No such directory');
    expect(wd.current).toBe('/docs');
  });

  it('should fall back to the root when the initial directory does not exist', () => {
    expect(new WorkingDirectory(probe, '/gone').current).toBe('/');
  });
});
