import { describe, it, expect } from 'vitest';
import { bsdSum, digest, posixCksum } from '../src/engine/text/checksum';

const chunks = (...parts: string[]) => parts.map(part => Buffer.from(part));

describe('digest', () => {
  it('should hash empty input', () => {
    expect(digest('md5', [])).toBe('d41d8cd98f00b204e9800998ecf8427e');
  });

  it('should give the same digest however the input is chunked', () => {
    expect(digest('md5', chunks('a', 'bc'))).toBe('900150983cd24fb0d6963f7d28e17f72');
    expect(digest('sha1', chunks('abc'))).toBe('a9993e364706816aba3e25717850c26c9cd0d89d');
    expect(digest('sha256', chunks('ab', 'c'))).toBe(
      'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad'
    );
  });
});

describe('posixCksum', () => {
  it('should complement the CRC of empty input', () => {
    expect(posixCksum([])).toEqual({ checksum: 4294967295, size: 0 });
  });

  it('should fold the length into the CRC', () => {
    expect(posixCksum(chunks('hel', 'lo\n'))).toEqual({ checksum: 3015617425, size: 6 });
  });
});

describe('bsdSum', () => {
  it('should add bytes modulo 2^16', () => {
    expect(bsdSum(chunks('hello\n'))).toEqual({ checksum: 542, size: 6 });
    expect(bsdSum([Buffer.alloc(300, 0xff)])).toEqual({ checksum: (300 * 255) & 0xffff, size: 300 });
  });
});
