import picomatch from 'picomatch';
import { IOError, NotFoundError, UsageError, errorMessage } from '../errors';
import { usageOf } from '../docs';
import { detectFileType } from '../text/dump';
import { pieceName, splitChunks, splitOnPattern } from '../text/lines';
import { humanSize } from '../text/numbers';
import { ok, type BuiltinCommand, type CommandResult, type ExecutionContext } from '../types';
import { formatTimestamp } from '../../logging/logger';
import { basenameOf, dirnameOf, isWithin } from '../../vfs/path';
import mimeTypes from '../../data/mime-types.json';
import { expectArgs, integerArg, readTextArg, resolveArg } from './helpers';

const MIME_TYPES: Readonly<Record<string, string>> = mimeTypes;

/** Longest path component and whole path `pathchk` accepts */
const NAME_MAX = 255;
const PATH_MAX = 4096;

/**
 * Run `action` once per path, collecting failures the way multi-operand
 * Unix tools report them.
 */
function forEachPath(
  name: string,
  paths: readonly string[],
  context: ExecutionContext,
  action: (virtualPath: string, userPath: string) => void
): CommandResult {
  if (paths.length === 0) {
    throw new UsageError(usageOf(name));
  }

  const errors: string[] = [];
  for (const userPath of paths) {
    try {
      action(resolveArg(context, userPath), userPath);
    } catch (error) {
      context.logger.warn(`builtins/${name}`, `${userPath}: ${errorMessage(error)}`);
      errors.push(`${name}: ${errorMessage(error)}`);
    }
  }

  return {
    stdout: '',
    stderr: errors.join('\n'),
    exitCode: errors.length > 0 ? 1 : 0
  };
}

/**
 * When `dest` is an existing directory, the operand lands inside it.
 */
function targetFor(context: ExecutionContext, src: string, dest: string): string {
  return context.fs.isDirectory(dest) ? `${dest === '/' ? '' : dest}/${basenameOf(src)}` : dest;
}

/**
 * ls - List directory contents
 * Usage: ls [path]
 * Names are sorted; directories carry a trailing slash.
 */
export const ls: BuiltinCommand = async (args, context) => {
  expectArgs('ls', args, 0, 1);
  const target = resolveArg(context, args[0] ?? '.');

  if (!context.fs.exists(target)) {
    throw new NotFoundError(`${args[0] ?? target}: No such file or directory`);
  }
  if (!context.fs.isDirectory(target)) {
    return ok(basenameOf(target));
  }

  const entries = context.fs
    .list(target)
    .sort()
    .map(entry => {
      const child = target === '/' ? `/${entry}` : `${target}/${entry}`;
      return context.fs.isDirectory(child) ? `${entry}/` : entry;
    });

  return ok(entries.join('\n'));
};

/**
 * cd - Change the current directory
 * Usage: cd [dir]
 * With no argument, returns to /.
 */
export const cd: BuiltinCommand = async (args, context) => {
  expectArgs('cd', args, 0, 1);
  const requested = args[0] ?? '/';
  const target = resolveArg(context, requested);

  if (!context.fs.exists(target)) {
    throw new NotFoundError(`${requested}: No such file or directory`);
  }
  if (!context.fs.isDirectory(target)) {
    throw new NotFoundError(`${requested}: Not a directory`);
  }

  // The shell applies the change after the handler returns
  context.requestedCd = requested;
  return ok();
};

export const pwd: BuiltinCommand = async (_args, context) => {
  return ok(context.cwd);
};

export const mkdir: BuiltinCommand = async (args, context) => {
  return forEachPath('mkdir', args, context, (target, userPath) => {
    if (context.fs.exists(target)) {
      throw new IOError(`cannot create directory '${userPath}': File exists`);
    }
    context.fs.mkdir(target);
  });
};

/**
 * rmdir - Remove directories and their contents
 * Usage: rmdir <dir...>
 * The current directory and its ancestors are refused.
 */
export const rmdir: BuiltinCommand = async (args, context) => {
  return forEachPath('rmdir', args, context, (target, userPath) => {
    if (target !== '/' && isWithin(target, context.cwd)) {
      throw new IOError(`cannot remove '${userPath}': current directory is inside it`);
    }
    context.fs.removeDirectory(target);
  });
};

/**
 * rm - Remove files
 * Usage: rm <file...>
 * Directories are refused; use rmdir.
 */
export const rm: BuiltinCommand = async (args, context) => {
  return forEachPath('rm', args, context, (target, userPath) => {
    if (context.fs.isDirectory(target)) {
      throw new IOError(`cannot remove '${userPath}': Is a directory`);
    }
    context.fs.removeFile(target);
  });
};

export const touch: BuiltinCommand = async (args, context) => {
  return forEachPath('touch', args, context, target => {
    context.fs.createFile(target);
  });
};

export const unlink: BuiltinCommand = async (args, context) => {
  expectArgs('unlink', args, 1);
  context.fs.removeFile(resolveArg(context, args[0]));
  return ok();
};

export const cp: BuiltinCommand = async (args, context) => {
  expectArgs('cp', args, 2);
  const src = resolveArg(context, args[0]);
  if (context.fs.isDirectory(src)) {
    throw new IOError(`${args[0]}: Is a directory`);
  }
  context.fs.copyFile(src, targetFor(context, src, resolveArg(context, args[1])));
  return ok();
};

export const mv: BuiltinCommand = async (args, context) => {
  expectArgs('mv', args, 2);
  const src = resolveArg(context, args[0]);
  if (src === '/') {
    throw new IOError('cannot move the root directory');
  }
  if (isWithin(src, context.cwd)) {
    throw new IOError(`cannot move '${args[0]}': current directory is inside it`);
  }
  context.fs.move(src, targetFor(context, src, resolveArg(context, args[1])));
  return ok();
};

/**
 * cat - Print a file
 * Usage: cat <file>
 * One trailing newline is dropped; the shell adds its own.
 */
export const cat: BuiltinCommand = async (args, context) => {
  expectArgs('cat', args, 1);
  let content = readTextArg(context, args[0]);
  if (content.endsWith('\n')) {
    content = content.slice(0, -1);
  }
  return ok(content);
};

/**
 * echo - Write text to a file
 * Usage: echo <text...> [> file]
 *
 * Text goes to `output.txt` in the current directory unless a `> name` pair
 * names another file. A `>` with nothing after it is ignored.
 */
export const echo: BuiltinCommand = async (args, context) => {
  const words: string[] = [];
  let target = 'output.txt';

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '>') {
      if (i + 1 < args.length) {
        target = args[i + 1];
        i++;
      }
      continue;
    }
    words.push(args[i]);
  }

  if (words.length === 0) {
    throw new UsageError(usageOf('echo'));
  }

  context.fs.writeText(resolveArg(context, target), words.join(' ') + '\n');
  return ok(`Content written to '${target}'`);
};

/**
 * ln - Create a symbolic link
 * Usage: ln <target> <link>
 */
export const ln: BuiltinCommand = async (args, context) => {
  expectArgs('ln', args, 2);
  const target = resolveArg(context, args[0]);
  if (!context.fs.exists(target)) {
    throw new NotFoundError(`${args[0]}: No such file or directory`);
  }
  context.fs.symlink(target, resolveArg(context, args[1]));
  return ok();
};

export const link: BuiltinCommand = async (args, context) => {
  expectArgs('link', args, 2);
  context.fs.link(resolveArg(context, args[0]), resolveArg(context, args[1]));
  return ok();
};

export const readlink: BuiltinCommand = async (args, context) => {
  expectArgs('readlink', args, 1);
  const target = resolveArg(context, args[0]);
  if (context.fs.stat(target).type !== 'symlink') {
    throw new IOError(`${args[0]}: Not a symbolic link`);
  }
  return ok(context.fs.readlink(target));
};

export const realpath: BuiltinCommand = async (args, context) => {
  expectArgs('realpath', args, 1);
  return ok(context.fs.realpath(resolveArg(context, args[0])));
};

export const dirname: BuiltinCommand = async (args, context) => {
  expectArgs('dirname', args, 1);
  return ok(dirnameOf(resolveArg(context, args[0])));
};

export const basename: BuiltinCommand = async (args, context) => {
  expectArgs('basename', args, 1);
  return ok(basenameOf(resolveArg(context, args[0])));
};

/**
 * pathchk - Check that a path name is usable
 * Usage: pathchk <path>
 */
export const pathchk: BuiltinCommand = async (args, context) => {
  expectArgs('pathchk', args, 1);
  const [candidate] = args;
  const problems: string[] = [];

  if (candidate.includes('\0')) {
    problems.push('contains a NUL character');
  }
  if (candidate.length > PATH_MAX) {
    problems.push(`longer than ${PATH_MAX} characters`);
  }
  const longComponent = candidate.split('/').find(part => part.length > NAME_MAX);
  if (longComponent !== undefined) {
    problems.push(`component '${longComponent.slice(0, 16)}...' longer than ${NAME_MAX} characters`);
  }

  if (problems.length > 0) {
    return {
      stdout: '',
      stderr: problems.map(problem => `pathchk: ${candidate}: ${problem}`).join('\n'),
      exitCode: 1
    };
  }
  return ok(`'${candidate}' is a valid path name (${resolveArg(context, candidate)})`);
};

export const truncate: BuiltinCommand = async (args, context) => {
  expectArgs('truncate', args, 2);
  const size = integerArg('truncate', args[1], 0);
  context.fs.truncate(resolveArg(context, args[0]), size);
  return ok();
};

/**
 * split - Cut a file into 1 KiB pieces
 * Usage: split <file> <prefix>
 * Pieces are named prefix000, prefix001, ... in the current directory.
 */
export const split: BuiltinCommand = async (args, context) => {
  expectArgs('split', args, 2);
  const chunks = splitChunks(readTextArg(context, args[0]));
  const names = chunks.map((chunk, index) => {
    const name = pieceName(args[1], index);
    context.fs.writeText(resolveArg(context, name), chunk);
    return name;
  });
  return ok(names.join('\n'));
};

/**
 * csplit - Cut a file around a literal pattern
 * Usage: csplit <file> <pattern> <prefix>
 */
export const csplit: BuiltinCommand = async (args, context) => {
  expectArgs('csplit', args, 3);
  const parts = splitOnPattern(readTextArg(context, args[0]), args[1]);
  const sizes = parts.map((part, index) => {
    context.fs.writeText(resolveArg(context, pieceName(args[2], index)), part);
    return String(Buffer.byteLength(part));
  });
  return ok(sizes.join('\n'));
};

export const mktemp: BuiltinCommand = async (args, context) => {
  expectArgs('mktemp', args, 0, 1);
  return ok(context.fs.createTempFile(context.cwd, args[0] ?? 'tmp.XXXXXXXXXX'));
};

/**
 * stat - Show file metadata
 * Usage: stat <file>
 */
export const stat: BuiltinCommand = async (args, context) => {
  expectArgs('stat', args, 1);
  const info = context.fs.stat(resolveArg(context, args[0]));
  const lines = [
    `File: ${args[0]}`,
    `Type: ${info.type}`,
    `Size: ${info.size} bytes`,
    `Modified: ${formatTimestamp(info.modifiedAt)}`,
    `Accessed: ${formatTimestamp(info.accessedAt)}`,
    `Created: ${formatTimestamp(info.createdAt)}`,
    `Permissions: ${info.mode.toString(8).padStart(3, '0')}`,
    `Owner: ${info.uid}`,
    `Group: ${info.gid}`,
  ];
  return ok(lines.join('\n'));
};

/**
 * file - Guess a file's type from its first bytes
 * Usage: file <file>
 */
export const file: BuiltinCommand = async (args, context) => {
  expectArgs('file', args, 1);
  const target = resolveArg(context, args[0]);
  if (context.fs.isDirectory(target)) {
    return ok(`${args[0]}: directory`);
  }
  const head = context.fs.readChunks(target, 1024)[0] ?? Buffer.alloc(0);
  return ok(`${args[0]}: ${detectFileType(head)}`);
};

/**
 * mime - Look up a MIME type by file extension
 * Usage: mime <file>
 */
export const mime: BuiltinCommand = async (args, _context) => {
  expectArgs('mime', args, 1);
  const name = basenameOf(args[0]);
  const dot = name.lastIndexOf('.');
  const extension = dot > 0 ? name.slice(dot + 1).toLowerCase() : '';
  const type = Object.hasOwn(MIME_TYPES, extension) ? MIME_TYPES[extension] : 'unknown';
  return ok(`${args[0]}: ${type}`);
};

export const chmod: BuiltinCommand = async (args, context) => {
  expectArgs('chmod', args, 2);
  if (!/^[0-7]{1,4}$/.test(args[0])) {
    throw new UsageError(usageOf('chmod'));
  }
  context.fs.chmod(resolveArg(context, args[1]), parseInt(args[0], 8));
  return ok();
};

export const chown: BuiltinCommand = async (args, context) => {
  expectArgs('chown', args, 3);
  const uid = integerArg('chown', args[0], 0);
  const gid = integerArg('chown', args[1], 0);
  context.fs.chown(resolveArg(context, args[2]), uid, gid);
  return ok();
};

export const du: BuiltinCommand = async (args, context) => {
  expectArgs('du', args, 0, 1);
  const target = args[0] ?? '.';
  return ok(`${humanSize(context.fs.diskUsage(resolveArg(context, target)))}\t${target}`);
};

export const df: BuiltinCommand = async (args, context) => {
  expectArgs('df', args, 0);
  const { total, used, free } = context.fs.diskFree();
  const percent = total > 0 ? Math.round((used / total) * 100) : 0;
  const header = ['Filesystem', 'Size', 'Used', 'Avail', 'Use%', 'Mounted on'];
  const row = ['burrow', humanSize(total), humanSize(used), humanSize(free), `${percent}%`, '/'];
  const widths = header.map((cell, index) => Math.max(cell.length, row[index].length));
  const format = (cells: string[]) => cells.map((cell, index) => cell.padEnd(widths[index])).join('  ').trimEnd();
  return ok([format(header), format(row)].join('\n'));
};

/**
 * find - Search a directory tree by name
 * Usage: find <path> <pattern>
 * The pattern is a glob matched against each entry's name.
 */
export const find: BuiltinCommand = async (args, context) => {
  expectArgs('find', args, 2);
  const root = resolveArg(context, args[0]);
  if (!context.fs.isDirectory(root)) {
    throw new NotFoundError(`${args[0]}: No such directory`);
  }
  const matches = picomatch(args[1], { dot: true });
  const found = context.fs
    .walk(root)
    .filter(entry => matches(entry.name))
    .map(entry => entry.path);
  return ok(found.join('\n'));
};

