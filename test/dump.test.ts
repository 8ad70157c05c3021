import { describe, it, expect } from 'vitest';
import { cmpBytes, detectFileType, hexdumpRows, octalDumpRows, printableStrings } from '../src/engine/text/dump';

describe('hexdumpRows', () => {
  it('should pad the hex column and show printable characters', () => {
    expect(hexdumpRows(Buffer.from('hi'))).toEqual(['00000000  68 69' + ' '.repeat(43) + '  |hi|']);
  });

  it('should start a new row every 16 bytes', () => {
    const rows = hexdumpRows(Buffer.from('0123456789abcdefXY'));
    expect(rows).toHaveLength(2);
    expect(rows[1].startsWith('00000010  58 59')).toBe(true);
  });
});

describe('octalDumpRows', () => {
  it('should use an octal offset and dots for control bytes', () => {
    expect(octalDumpRows(Buffer.from('A\n'))).toEqual(['0000000: 41 0a' + ' '.repeat(43) + ' A.']);
  });
});

describe('printableStrings', () => {
  it('should keep runs of at least four printable bytes', () => {
    expect(printableStrings(Buffer.from('ab\0hello\x01world!'))).toEqual(['hello', 'world!']);
  });
});

describe('detectFileType', () => {
  it.each([
    [Buffer.alloc(0), 'empty'],
    [Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a]), 'PNG image'],
    [Buffer.from('%PDF-1.7'), 'PDF document'],
    [Buffer.from('#!/bin/sh\necho hi\n'), 'POSIX shell script'],
    [Buffer.from('plain words\n'), 'ASCII text'],
    [Buffer.from([0, 1, 2]), 'data'],
  ])('should recognise %#', (head, expected) => {
    expect(detectFileType(head)).toBe(expected);
  });
});

describe('cmpBytes', () => {
  it('should report the first difference with its line', () => {
    expect(cmpBytes(Buffer.from('abc'), Buffer.from('abd'))).toEqual({ kind: 'differ', byte: 3, line: 1 });
    expect(cmpBytes(Buffer.from('a\nb'), Buffer.from('a\nc'))).toEqual({ kind: 'differ', byte: 3, line: 2 });
  });

  it('should report the shorter input', () => {
    expect(cmpBytes(Buffer.from('abc'), Buffer.from('ab'))).toEqual({ kind: 'eof', shorter: 'right', after: 2 });
    expect(cmpBytes(Buffer.from('ab'), Buffer.from('ab'))).toEqual({ kind: 'identical' });
  });
});
