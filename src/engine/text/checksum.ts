/**
 * @fileoverview Checksums and digests.
 *
 * Every function takes the file content as a list of chunks, as returned by
 * `FileStore.readChunks`, so large files are never concatenated.
 *
 * @module engine/text/checksum
 */

import { createHash } from 'node:crypto';

export type DigestAlgorithm = 'md5' | 'sha1' | 'sha256';

const CRC_POLYNOMIAL = 0x04c11db7;

/**
 * MSB-first CRC-32 table for the POSIX polynomial.
 */
const CRC_TABLE: Uint32Array = (() => {
  const table = new Uint32Array(256);
  for (let i = 0; i < 256; i++) {
    let crc = i << 24;
    for (let bit = 0; bit < 8; bit++) {
      crc = crc & 0x80000000 ? (crc << 1) ^ CRC_POLYNOMIAL : crc << 1;
    }
    table[i] = crc >>> 0;
  }
  return table;
})();

function crcUpdate(crc: number, byte: number): number {
  return ((crc << 8) ^ CRC_TABLE[((crc >>> 24) ^ byte) & 0xff]) >>> 0;
}

function totalLength(chunks: readonly Uint8Array[]): number {
  return chunks.reduce((sum, chunk) => sum + chunk.length, 0);
}

/**
 * BSD-style 16-bit additive checksum.
 *
 * @returns The checksum and the byte count
 */
export function bsdSum(chunks: readonly Uint8Array[]): { checksum: number; size: number } {
  let checksum = 0;
  for (const chunk of chunks) {
    for (const byte of chunk) {
      checksum = (checksum + byte) & 0xffff;
    }
  }
  return { checksum, size: totalLength(chunks) };
}

/**
 * POSIX `cksum`: CRC-32 over the data followed by the length in as few
 * little-endian bytes as it takes, then complemented.
 *
 * @example
 * posixCksum([])  // { checksum: 4294967295, size: 0 }
 */
export function posixCksum(chunks: readonly Uint8Array[]): { checksum: number; size: number } {
  let crc = 0;
  for (const chunk of chunks) {
    for (const byte of chunk) {
      crc = crcUpdate(crc, byte);
    }
  }

  const size = totalLength(chunks);
  for (let length = size; length > 0; length = Math.floor(length / 256)) {
    crc = crcUpdate(crc, length & 0xff);
  }

  return { checksum: ~crc >>> 0, size };
}

/**
 * Hex digest of the content.
 *
 * @example
 * digest('md5', [])  // 'd41d8cd98f00b204e9800998ecf8427e'
 */
export function digest(algorithm: DigestAlgorithm, chunks: readonly Uint8Array[]): string {
  const hash = createHash(algorithm);
  for (const chunk of chunks) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}
