/**
 * @fileoverview Line-oriented text transforms.
 *
 * Pure functions over strings and string arrays. File access and argument
 * parsing live in the builtins; everything here is deterministic except
 * `shuffleLines`, which takes its random source as a parameter.
 *
 * @module engine/text/lines
 */

import { ExpressionError } from '../errors';

export const TAB_WIDTH = 8;
export const FILL_WIDTH = 70;
export const PAGE_RULE = '-'.repeat(72);
export const SPLIT_CHUNK = 1024;

/**
 * Split text into lines. A trailing newline does not produce a final empty
 * line, and `\r\n` endings are treated like `\n`.
 *
 * @example
 * splitLines('a\nb\n')  // ['a', 'b']
 * splitLines('')        // []
 */
export function splitLines(text: string): string[] {
  if (text === '') return [];
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

/** Whitespace-separated fields of a line. */
export function fieldsOf(line: string): string[] {
  return line.trim().split(/\s+/).filter(field => field.length > 0);
}

export function compareCodeUnits(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Sort lines by UTF-16 code unit. Equal lines keep their relative order.
 */
export function sortLines(lines: readonly string[]): string[] {
  return [...lines].sort(compareCodeUnits);
}

/**
 * Keep the first occurrence of every distinct line, in input order.
 */
export function uniqueLines(lines: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const line of lines) {
    if (seen.has(line)) continue;
    seen.add(line);
    result.push(line);
  }
  return result;
}

/**
 * Three-way comparison of two line sets.
 *
 * Lines are trimmed, deduplicated and sorted first. Lines only in `left` are
 * prefixed `< `, lines only in `right` `> `, and common lines two spaces.
 *
 * @example
 * commLines(['a', 'b'], ['b', 'c'])  // ['< a', '  b', '> c']
 */
export function commLines(left: readonly string[], right: readonly string[]): string[] {
  const a = sortLines(uniqueLines(left.map(line => line.trim())));
  const b = sortLines(uniqueLines(right.map(line => line.trim())));
  const result: string[] = [];
  let i = 0;
  let j = 0;

  while (i < a.length && j < b.length) {
    const order = compareCodeUnits(a[i], b[j]);
    if (order === 0) {
      result.push(`  ${a[i]}`);
      i++;
      j++;
    } else if (order < 0) {
      result.push(`< ${a[i++]}`);
    } else {
      result.push(`> ${b[j++]}`);
    }
  }
  while (i < a.length) result.push(`< ${a[i++]}`);
  while (j < b.length) result.push(`> ${b[j++]}`);

  return result;
}

/**
 * Positional line diff.
 *
 * Lines at the same index are compared; a mismatch at line `n` is reported as
 * a change (`nCn`). Lines present only in `right` are appends (`nAn`), lines
 * present only in `left` are deletes (`nDn`). Identical input gives `[]`.
 *
 * @example
 * diffLines(['a', 'b'], ['a', 'c', 'd'])
 * // ['2c2', '< b', '---', '> c', '3a3', '> d']
 */
export function diffLines(left: readonly string[], right: readonly string[]): string[] {
  const result: string[] = [];
  const shared = Math.min(left.length, right.length);

  for (let i = 0; i < shared; i++) {
    if (left[i] !== right[i]) {
      result.push(`${i + 1}c${i + 1}`, `< ${left[i]}`, '---', `> ${right[i]}`);
    }
  }
  for (let i = shared; i < right.length; i++) {
    result.push(`${i + 1}a${i + 1}`, `> ${right[i]}`);
  }
  for (let i = shared; i < left.length; i++) {
    result.push(`${i + 1}d${i + 1}`, `< ${left[i]}`);
  }

  return result;
}

/**
 * Select a 1-based field from a line. Without a delimiter, fields are
 * separated by runs of whitespace. Returns null when the line is too short.
 */
export function cutField(line: string, field: number, delimiter?: string): string | null {
  const fields = delimiter === undefined ? fieldsOf(line) : line.split(delimiter);
  return field >= 1 && field <= fields.length ? fields[field - 1] : null;
}

/**
 * Merge files line by line, joining columns with a tab. Shorter inputs
 * contribute empty columns.
 */
export function pasteColumns(columns: readonly (readonly string[])[]): string[] {
  const rows = Math.max(0, ...columns.map(column => column.length));
  const result: string[] = [];
  for (let i = 0; i < rows; i++) {
    result.push(columns.map(column => (column[i] ?? '').trim()).join('\t'));
  }
  return result;
}

/**
 * Expand `a-z` style ranges in a `tr` character set.
 */
export function expandCharSet(set: string): string[] {
  const chars = Array.from(set);
  const result: string[] = [];
  for (let i = 0; i < chars.length; i++) {
    if (i + 2 < chars.length && chars[i + 1] === '-') {
      const start = chars[i].codePointAt(0) ?? 0;
      const end = chars[i + 2].codePointAt(0) ?? 0;
      if (start > end) {
        throw new ExpressionError(`invalid range '${chars[i]}-${chars[i + 2]}'`);
      }
      for (let code = start; code <= end; code++) {
        result.push(String.fromCodePoint(code));
      }
      i += 2;
    } else {
      result.push(chars[i]);
    }
  }
  return result;
}

/**
 * Translate characters of `set1` to the character at the same position in
 * `set2`. A shorter `set2` is padded with its last character.
 *
 * @example
 * translate('hello', 'a-z', 'A-Z')  // 'HELLO'
 */
export function translate(text: string, set1: string, set2: string): string {
  const from = expandCharSet(set1);
  const to = expandCharSet(set2);
  if (to.length === 0) {
    throw new ExpressionError('second character set is empty');
  }

  const table = new Map<string, string>();
  from.forEach((ch, index) => {
    table.set(ch, to[Math.min(index, to.length - 1)]);
  });

  return Array.from(text, ch => table.get(ch) ?? ch).join('');
}

/** Prefix every line with its 1-based number and a tab. */
export function numberLines(lines: readonly string[]): string[] {
  return lines.map((line, index) => `${index + 1}\t${line}`);
}

/**
 * Break a line into pieces of at most `width` characters.
 */
export function foldLine(line: string, width: number): string[] {
  if (width < 1) {
    throw new ExpressionError(`invalid width: ${width}`);
  }
  if (line === '') return [''];
  const pieces: string[] = [];
  for (let i = 0; i < line.length; i += width) {
    pieces.push(line.slice(i, i + width));
  }
  return pieces;
}

/**
 * Replace tabs with spaces up to the next tab stop.
 */
export function expandTabs(line: string, tabWidth = TAB_WIDTH): string {
  let column = 0;
  let result = '';
  for (const ch of line) {
    if (ch === '\t') {
      const spaces = tabWidth - (column % tabWidth);
      result += ' '.repeat(spaces);
      column += spaces;
    } else {
      result += ch;
      column++;
    }
  }
  return result;
}

/**
 * Convert leading blanks back to tabs where they reach a tab stop.
 *
 * @example
 * unexpandLine('          x')  // '\t  x'
 */
export function unexpandLine(line: string, tabWidth = TAB_WIDTH): string {
  const indent = /^[ \t]*/.exec(line)?.[0] ?? '';
  const width = expandTabs(indent, tabWidth).length;
  const tabs = Math.floor(width / tabWidth);
  return '\t'.repeat(tabs) + ' '.repeat(width % tabWidth) + line.slice(indent.length);
}

/**
 * Join two sets of records on a 1-based field. Each output line is every
 * field of the left record followed by the right record's fields after the
 * join field.
 */
export function joinOnField(left: readonly string[], right: readonly string[], field: number): string[] {
  if (field < 1) {
    throw new ExpressionError(`invalid field: ${field}`);
  }
  const rightRecords = right.map(fieldsOf);
  const result: string[] = [];

  for (const line of left) {
    const record = fieldsOf(line);
    const key = record[field - 1];
    if (key === undefined) continue;
    for (const other of rightRecords) {
      if (other[field - 1] === key) {
        result.push([...record, ...other.slice(field)].join(' '));
      }
    }
  }
  return result;
}

/** Reverse the characters of each line. */
export function reverseText(lines: readonly string[]): string[] {
  return lines.map(line => Array.from(line).reverse().join(''));
}

/**
 * Align whitespace-separated cells into left-justified columns. Rows may
 * have different numbers of cells.
 */
export function columnize(lines: readonly string[]): string[] {
  const rows = lines.map(fieldsOf);
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, index) => {
      widths[index] = Math.max(widths[index] ?? 0, cell.length);
    });
  }
  return rows.map(row =>
    row
      .map((cell, index) => (index === row.length - 1 ? cell : cell.padEnd(widths[index])))
      .join(' ')
  );
}

/**
 * Remove columns `start` through `end` (1-based, inclusive) from a line.
 */
export function removeColumns(line: string, start: number, end: number): string {
  if (start < 1 || end < start) {
    throw new ExpressionError(`invalid column range: ${start}-${end}`);
  }
  return line.slice(0, start - 1) + line.slice(end);
}

/**
 * Refill text into lines of at most `width` characters. Words longer than
 * the width get a line of their own.
 */
export function fillParagraph(text: string, width = FILL_WIDTH): string[] {
  const words = text.split(/\s+/).filter(word => word.length > 0);
  const lines: string[] = [];
  let current = '';

  for (const word of words) {
    if (current === '') {
      current = word;
    } else if (current.length + 1 + word.length <= width) {
      current += ' ' + word;
    } else {
      lines.push(current);
      current = word;
    }
  }
  if (current !== '') lines.push(current);
  return lines;
}

/**
 * Frame content as a printed page: a `File:` header, a rule, the content
 * and a closing rule.
 */
export function paginate(name: string, content: string): string[] {
  return [`File: ${name}`, PAGE_RULE, ...splitLines(content), PAGE_RULE];
}

/** Render underscores with the terminal underline attribute. */
export function underline(line: string): string {
  return line.replace(/_/g, '\x1b[4m_\x1b[0m');
}

/**
 * Counts reported by `wc`.
 */
export interface WordCount {
  lines: number;
  words: number;
  chars: number;
}

export function wordCount(text: string): WordCount {
  return {
    lines: splitLines(text).length,
    words: fieldsOf(text).length,
    chars: Array.from(text).length,
  };
}

/**
 * Shuffle with Fisher-Yates.
 *
 * @param random - Returns a float in [0, 1)
 */
export function shuffleLines(lines: readonly string[], random: () => number = Math.random): string[] {
  const result = [...lines];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

/**
 * Cut text into fixed-size pieces.
 */
export function splitChunks(text: string, size = SPLIT_CHUNK): string[] {
  const chunks: string[] = [];
  for (let i = 0; i < text.length; i += size) {
    chunks.push(text.slice(i, i + size));
  }
  return chunks;
}

/**
 * Name of the `index`-th piece written by `split` and `csplit`.
 *
 * @example
 * pieceName('part', 2)  // 'part002'
 */
export function pieceName(prefix: string, index: number): string {
  return `${prefix}${String(index).padStart(3, '0')}`;
}

/**
 * Split text around every occurrence of a literal pattern. The pattern
 * itself is dropped.
 */
export function splitOnPattern(text: string, pattern: string): string[] {
  if (pattern === '') {
    throw new ExpressionError('empty pattern');
  }
  return text.split(pattern);
}
