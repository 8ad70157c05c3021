/**
 * @fileoverview Unified-diff hunk application.
 *
 * @module engine/text/patch
 */

import { ExpressionError } from '../errors';
import { splitLines } from './lines';

interface Hunk {
  oldStart: number;
  oldCount: number;
  lines: Array<{ op: ' ' | '-' | '+'; text: string }>;
}

const HUNK_HEADER = /^@@ -(\d+)(?:,(\d+))? \+\d+(?:,\d+)? @@/;

function parseHunks(patch: string): Hunk[] {
  const hunks: Hunk[] = [];
  let current: Hunk | null = null;

  for (const line of splitLines(patch)) {
    if (line.startsWith('--- ') || line.startsWith('+++ ') || line.startsWith('diff ')) {
      continue;
    }
    const header = HUNK_HEADER.exec(line);
    if (header) {
      current = { oldStart: Number(header[1]), oldCount: header[2] === undefined ? 1 : Number(header[2]), lines: [] };
      hunks.push(current);
      continue;
    }
    if (line.startsWith('\\')) continue;
    if (!current) {
      throw new ExpressionError(`unexpected line before first hunk: '${line}'`);
    }

    const op = line.charAt(0);
    if (op === ' ' || op === '-' || op === '+') {
      current.lines.push({ op, text: line.slice(1) });
    } else if (line === '') {
      current.lines.push({ op: ' ', text: '' });
    } else {
      throw new ExpressionError(`malformed hunk line: '${line}'`);
    }
  }

  if (hunks.length === 0) {
    throw new ExpressionError('no hunks found');
  }
  return hunks;
}

/**
 * Apply every hunk of a unified diff to `original`.
 *
 * Context and removed lines must match the original exactly at the position
 * the hunk header names (adjusted for earlier hunks).
 *
 * @returns The patched text, with a trailing newline when non-empty
 * @throws ExpressionError when the patch is malformed or a hunk does not match
 */
export function applyUnifiedPatch(original: string, patch: string): string {
  const source = splitLines(original);
  const output: string[] = [];
  let cursor = 0;

  parseHunks(patch).forEach((hunk, index) => {
    // A hunk that removes nothing inserts after line `oldStart`
    const start = hunk.oldCount === 0 ? hunk.oldStart : hunk.oldStart - 1;
    if (start < cursor || start > source.length) {
      throw new ExpressionError(`hunk #${index + 1} is out of order or past end of file`);
    }
    output.push(...source.slice(cursor, start));
    cursor = start;

    for (const { op, text } of hunk.lines) {
      if (op === '+') {
        output.push(text);
        continue;
      }
      if (source[cursor] !== text) {
        throw new ExpressionError(`hunk #${index + 1} does not apply at line ${cursor + 1}`);
      }
      if (op === ' ') output.push(text);
      cursor++;
    }
  });

  output.push(...source.slice(cursor));
  return output.length > 0 ? output.join('\n') + '\n' : '';
}
