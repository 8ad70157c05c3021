/**
 * @fileoverview Byte-level views of file content.
 *
 * @module engine/text/dump
 */

const ROW_BYTES = 16;
const HEX_COLUMN = ROW_BYTES * 3;

function isPrintable(byte: number): boolean {
  return byte >= 32 && byte <= 126;
}

function hexBytes(row: Uint8Array): string {
  return Array.from(row, byte => byte.toString(16).padStart(2, '0')).join(' ');
}

function asciiBytes(row: Uint8Array): string {
  return Array.from(row, byte => (isPrintable(byte) ? String.fromCharCode(byte) : '.')).join('');
}

function rows(data: Uint8Array): Array<{ offset: number; row: Uint8Array }> {
  const result: Array<{ offset: number; row: Uint8Array }> = [];
  for (let offset = 0; offset < data.length; offset += ROW_BYTES) {
    result.push({ offset, row: data.subarray(offset, offset + ROW_BYTES) });
  }
  return result;
}

/**
 * Canonical hex dump: 8-digit hex offset, 16 hex bytes padded to a fixed
 * column, then the printable characters between bars.
 *
 * @example
 * hexdumpRows(Buffer.from('hi'))
 * // ['00000000  68 69' + ' '.repeat(43) + '  |hi|']
 */
export function hexdumpRows(data: Uint8Array): string[] {
  return rows(data).map(({ offset, row }) =>
    `${offset.toString(16).padStart(8, '0')}  ${hexBytes(row).padEnd(HEX_COLUMN)}  |${asciiBytes(row)}|`
  );
}

/**
 * Octal-offset dump: 7-digit octal offset, hex bytes, printable characters.
 */
export function octalDumpRows(data: Uint8Array): string[] {
  return rows(data).map(({ offset, row }) =>
    `${offset.toString(8).padStart(7, '0')}: ${hexBytes(row).padEnd(HEX_COLUMN)} ${asciiBytes(row)}`
  );
}

/**
 * Runs of at least `minLength` printable ASCII bytes.
 */
export function printableStrings(data: Uint8Array, minLength = 4): string[] {
  const result: string[] = [];
  let current = '';
  for (const byte of data) {
    if (isPrintable(byte)) {
      current += String.fromCharCode(byte);
      continue;
    }
    if (current.length >= minLength) result.push(current);
    current = '';
  }
  if (current.length >= minLength) result.push(current);
  return result;
}

const SIGNATURES: Array<{ magic: number[]; description: string }> = [
  { magic: [0x7f, 0x45, 0x4c, 0x46], description: 'ELF executable' },
  { magic: [0x4d, 0x5a], description: 'Windows executable' },
  { magic: [0x89, 0x50, 0x4e, 0x47], description: 'PNG image' },
  { magic: [0xff, 0xd8, 0xff], description: 'JPEG image' },
  { magic: Array.from(Buffer.from('GIF87a')), description: 'GIF image' },
  { magic: Array.from(Buffer.from('GIF89a')), description: 'GIF image' },
  { magic: Array.from(Buffer.from('%PDF-')), description: 'PDF document' },
  { magic: [0x50, 0x4b, 0x03, 0x04], description: 'Zip archive' },
  { magic: [0x1f, 0x8b], description: 'gzip compressed data' },
  { magic: Array.from(Buffer.from('#!/bin/bash')), description: 'Bash script' },
  { magic: Array.from(Buffer.from('#!/bin/sh')), description: 'POSIX shell script' },
];

/**
 * Identify content by its leading bytes.
 *
 * @returns A short description; `empty` for no data, `ASCII text` when every
 *   byte is printable or whitespace, otherwise `data`
 */
export function detectFileType(head: Uint8Array): string {
  if (head.length === 0) return 'empty';

  for (const { magic, description } of SIGNATURES) {
    if (magic.length <= head.length && magic.every((byte, index) => head[index] === byte)) {
      return description;
    }
  }

  const textual = head.every(byte => isPrintable(byte) || byte === 9 || byte === 10 || byte === 13);
  return textual ? 'ASCII text' : 'data';
}

/**
 * Outcome of a byte-by-byte comparison.
 */
export type CmpResult =
  | { kind: 'identical' }
  | { kind: 'differ'; byte: number; line: number }
  | { kind: 'eof'; shorter: 'left' | 'right'; after: number };

/**
 * Find the first differing byte (1-based) and the line it is on.
 */
export function cmpBytes(left: Uint8Array, right: Uint8Array): CmpResult {
  const shared = Math.min(left.length, right.length);
  let line = 1;
  for (let i = 0; i < shared; i++) {
    if (left[i] !== right[i]) {
      return { kind: 'differ', byte: i + 1, line };
    }
    if (left[i] === 10) line++;
  }
  if (left.length === right.length) return { kind: 'identical' };
  return { kind: 'eof', shorter: left.length < right.length ? 'left' : 'right', after: shared };
}
