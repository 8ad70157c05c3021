/**
 * @fileoverview Line-oriented text commands.
 *
 * Every command here reads whole files through the FileStore and returns
 * its output joined with newlines. The algorithms live in `engine/text`.
 *
 * @module engine/builtins/text
 */

import { ExpressionError, UsageError } from '../errors';
import { usageOf } from '../docs';
import { evaluate, isTruthy } from '../expression';
import { cmpBytes } from '../text/dump';
import {
  columnize,
  commLines,
  cutField,
  diffLines,
  expandTabs,
  fieldsOf,
  fillParagraph,
  foldLine,
  joinOnField,
  numberLines,
  paginate,
  pasteColumns,
  removeColumns,
  reverseText,
  shuffleLines,
  sortLines,
  translate,
  underline,
  uniqueLines,
  unexpandLine,
  wordCount,
} from '../text/lines';
import { applyUnifiedPatch } from '../text/patch';
import { topologicalSort } from '../text/tsort';
import { ok, type BuiltinCommand } from '../types';
import { expectArgs, integerArg, readLinesArg, readTextArg, resolveArg, takeOption } from './helpers';

const DEFAULT_LINE_COUNT = 10;

/** Spaces `col` puts in place of a tab */
const COL_TAB = '    ';

/**
 * Build a handler that maps every line of one file.
 */
function perLine(name: string, transform: (lines: string[]) => string[]): BuiltinCommand {
  return async (args, context) => {
    expectArgs(name, args, 1);
    return ok(transform(readLinesArg(context, args[0])).join('\n'));
  };
}

function withoutTrailingNewline(text: string): string {
  return text.endsWith('\n') ? text.slice(0, -1) : text;
}

/**
 * Parse `[-n N] <file>` for head and tail.
 */
function lineCountArgs(name: string, args: string[]): { count: number; path: string } {
  const { value, rest } = takeOption(name, args, '-n');
  expectArgs(name, rest, 1);
  const count = value === undefined ? DEFAULT_LINE_COUNT : integerArg(name, value, 0);
  return { count, path: rest[0] };
}

function compileRegex(source: string, flags: string): RegExp {
  try {
    return new RegExp(source, flags);
  } catch (error) {
    throw new ExpressionError(`invalid pattern '${source}'`, { cause: error });
  }
}

export const sort = perLine('sort', sortLines);
export const uniq = perLine('uniq', uniqueLines);
export const nl = perLine('nl', numberLines);
export const rev = perLine('rev', reverseText);
export const tac = perLine('tac', lines => [...lines].reverse());
export const tsort = perLine('tsort', topologicalSort);
export const column = perLine('column', columnize);
export const expand = perLine('expand', lines => lines.map(line => expandTabs(line)));
export const unexpand = perLine('unexpand', lines => lines.map(line => unexpandLine(line)));
export const ul = perLine('ul', lines => lines.map(underline));
export const col = perLine('col', lines => lines.map(line => line.replace(/\t/g, COL_TAB)));
export const shuf = perLine('shuf', lines => shuffleLines(lines));

/**
 * head - Print the first lines of a file
 * Usage: head [-n N] <file>
 */
export const head: BuiltinCommand = async (args, context) => {
  const { count, path } = lineCountArgs('head', args);
  return ok(readLinesArg(context, path).slice(0, count).join('\n'));
};

/**
 * tail - Print the last lines of a file
 * Usage: tail [-n N] <file>
 */
export const tail: BuiltinCommand = async (args, context) => {
  const { count, path } = lineCountArgs('tail', args);
  const lines = readLinesArg(context, path);
  return ok(lines.slice(Math.max(0, lines.length - count)).join('\n'));
};

/**
 * wc - Count lines, words and characters
 * Usage: wc <file>
 */
export const wc: BuiltinCommand = async (args, context) => {
  expectArgs('wc', args, 1);
  const { lines, words, chars } = wordCount(readTextArg(context, args[0]));
  return ok(`${lines} ${words} ${chars} ${args[0]}`);
};

/**
 * cut - Select one field from each line
 * Usage: cut -f N [-d D] <file>
 * Lines with too few fields are skipped.
 */
export const cut: BuiltinCommand = async (args, context) => {
  const field = takeOption('cut', args, '-f');
  const delimiter = takeOption('cut', field.rest, '-d');
  if (field.value === undefined) {
    throw new UsageError(usageOf('cut'));
  }
  expectArgs('cut', delimiter.rest, 1);
  const index = integerArg('cut', field.value, 1);

  const selected: string[] = [];
  for (const line of readLinesArg(context, delimiter.rest[0])) {
    const value = cutField(line, index, delimiter.value);
    if (value !== null) selected.push(value);
  }
  return ok(selected.join('\n'));
};

export const paste: BuiltinCommand = async (args, context) => {
  if (args.length === 0) {
    throw new UsageError(usageOf('paste'));
  }
  return ok(pasteColumns(args.map(path => readLinesArg(context, path))).join('\n'));
};

/**
 * tr - Translate characters
 * Usage: tr <set1> <set2> <file>
 */
export const tr: BuiltinCommand = async (args, context) => {
  expectArgs('tr', args, 3);
  const [set1, set2, path] = args;
  return ok(withoutTrailingNewline(translate(readTextArg(context, path), set1, set2)));
};

/**
 * sed - Replace text
 * Usage: sed <pattern> <replacement> <file> | sed s/re/rep/[g] <file>
 *
 * The three-argument form replaces every literal occurrence. The
 * substitution form takes a regular expression and replaces the first match
 * on each line, or every match with `g`.
 */
export const sed: BuiltinCommand = async (args, context) => {
  if (args.length === 3) {
    const [pattern, replacement, path] = args;
    if (pattern === '') {
      throw new ExpressionError('empty pattern');
    }
    const content = readTextArg(context, path);
    return ok(withoutTrailingNewline(content.split(pattern).join(replacement)));
  }

  expectArgs('sed', args, 2);
  const command = /^s(.)(.*?)\1(.*?)\1(g?)$/.exec(args[0]);
  if (!command) {
    throw new UsageError(usageOf('sed'));
  }
  const [, , source, replacement, global] = command;
  const regex = compileRegex(source, global);
  return ok(
    readLinesArg(context, args[1])
      .map(line => line.replace(regex, replacement))
      .join('\n')
  );
};

/**
 * awk - Print the lines matching a condition
 * Usage: awk <condition> <file>
 *
 * The condition is an expression over `$0` (the line), `$1`...`$n` (its
 * whitespace-separated fields), `NF` and `NR`. Arguments are split on
 * whitespace, so the condition is written without spaces.
 *
 * @example
 * awk $2>10 prices.txt
 */
export const awk: BuiltinCommand = async (args, context) => {
  expectArgs('awk', args, 2);
  const [condition, path] = args;

  const matched = readLinesArg(context, path).filter((line, index) => {
    const fields = fieldsOf(line);
    const value = evaluate(condition, {
      fields: [line, ...fields],
      variables: { NF: fields.length, NR: index + 1 },
    });
    return isTruthy(value);
  });

  return ok(matched.join('\n'));
};

export const fold: BuiltinCommand = async (args, context) => {
  expectArgs('fold', args, 2);
  const width = integerArg('fold', args[1], 1);
  return ok(readLinesArg(context, args[0]).flatMap(line => foldLine(line, width)).join('\n'));
};

/**
 * join - Join two files on a common field
 * Usage: join <file1> <file2> <field>
 */
export const join: BuiltinCommand = async (args, context) => {
  expectArgs('join', args, 3);
  const field = integerArg('join', args[2], 1);
  return ok(joinOnField(readLinesArg(context, args[0]), readLinesArg(context, args[1]), field).join('\n'));
};

export const comm: BuiltinCommand = async (args, context) => {
  expectArgs('comm', args, 2);
  return ok(commLines(readLinesArg(context, args[0]), readLinesArg(context, args[1])).join('\n'));
};

/**
 * diff - Compare two files line by line
 * Usage: diff <file1> <file2>
 * Exits 1 when the files differ.
 */
export const diff: BuiltinCommand = async (args, context) => {
  expectArgs('diff', args, 2);
  const changes = diffLines(readLinesArg(context, args[0]), readLinesArg(context, args[1]));
  return { stdout: changes.join('\n'), stderr: '', exitCode: changes.length > 0 ? 1 : 0 };
};

/**
 * patch - Apply a unified diff to a file in place
 * Usage: patch <file> <patchfile>
 */
export const patch: BuiltinCommand = async (args, context) => {
  expectArgs('patch', args, 2);
  const target = resolveArg(context, args[0]);
  const patched = applyUnifiedPatch(context.fs.readText(target), readTextArg(context, args[1]));
  context.fs.writeText(target, patched);
  return ok(`patching file ${args[0]}`);
};

/**
 * cmp - Compare two files byte by byte
 * Usage: cmp <file1> <file2>
 */
export const cmp: BuiltinCommand = async (args, context) => {
  expectArgs('cmp', args, 2);
  const [left, right] = args;
  const result = cmpBytes(
    context.fs.readBytes(resolveArg(context, left)),
    context.fs.readBytes(resolveArg(context, right))
  );

  switch (result.kind) {
    case 'identical':
      return ok();
    case 'differ':
      return { stdout: `${left} ${right} differ: byte ${result.byte}, line ${result.line}`, stderr: '', exitCode: 1 };
    case 'eof':
      return {
        stdout: '',
        stderr: `cmp: EOF on ${result.shorter === 'left' ? left : right} after byte ${result.after}`,
        exitCode: 1,
      };
  }
};

export const fmt: BuiltinCommand = async (args, context) => {
  expectArgs('fmt', args, 1);
  return ok(fillParagraph(readTextArg(context, args[0])).join('\n'));
};

export const pr: BuiltinCommand = async (args, context) => {
  expectArgs('pr', args, 1);
  return ok(paginate(args[0], readTextArg(context, args[0])).join('\n'));
};

/**
 * colrm - Remove a range of columns from every line
 * Usage: colrm <file> <start> <end>
 */
export const colrm: BuiltinCommand = async (args, context) => {
  expectArgs('colrm', args, 3);
  const start = integerArg('colrm', args[1], 1);
  const end = integerArg('colrm', args[2], start);
  return ok(
    readLinesArg(context, args[0])
      .map(line => removeColumns(line, start, end))
      .join('\n')
  );
};

/**
 * grep - Search files for a regular expression
 * Usage: grep [-i] [-v] <pattern> <file...>
 *
 * Output lines are `file:line:text`. Exits 1 when nothing matched.
 */
export const grep: BuiltinCommand = async (args, context) => {
  let ignoreCase = false;
  let invert = false;
  const operands: string[] = [];

  for (const arg of args) {
    if (arg === '-i') ignoreCase = true;
    else if (arg === '-v') invert = true;
    else operands.push(arg);
  }

  if (operands.length < 2) {
    throw new UsageError(usageOf('grep'));
  }

  const [source, ...paths] = operands;
  const regex = compileRegex(source, ignoreCase ? 'i' : '');
  const matches: string[] = [];

  for (const path of paths) {
    readLinesArg(context, path).forEach((line, index) => {
      if (regex.test(line) !== invert) {
        matches.push(`${path}:${index + 1}:${line}`);
      }
    });
  }

  return { stdout: matches.join('\n'), stderr: '', exitCode: matches.length > 0 ? 0 : 1 };
};

