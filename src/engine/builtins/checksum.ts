/**
 * @fileoverview Checksum and byte-dump commands.
 *
 * Files are read in bounded chunks for the checksums; dumps need the whole
 * content to lay out rows.
 *
 * @module engine/builtins/checksum
 */

import { bsdSum, digest, posixCksum, type DigestAlgorithm } from '../text/checksum';
import { hexdumpRows, octalDumpRows, printableStrings } from '../text/dump';
import { ok, type BuiltinCommand, type ExecutionContext } from '../types';
import { expectArgs, resolveArg } from './helpers';

function chunksOf(context: ExecutionContext, userPath: string): Buffer[] {
  return context.fs.readChunks(resolveArg(context, userPath));
}

function bytesOf(context: ExecutionContext, userPath: string): Buffer {
  return context.fs.readBytes(resolveArg(context, userPath));
}

/**
 * Build an `md5sum`-style command: `<hex>  <name>`.
 */
function digestCommand(name: string, algorithm: DigestAlgorithm): BuiltinCommand {
  return async (args, context) => {
    expectArgs(name, args, 1);
    return ok(`${digest(algorithm, chunksOf(context, args[0]))}  ${args[0]}`);
  };
}

export const md5sum = digestCommand('md5sum', 'md5');
export const sha1sum = digestCommand('sha1sum', 'sha1');
export const sha256sum = digestCommand('sha256sum', 'sha256');

/**
 * sum - 16-bit additive checksum
 * Usage: sum <file>
 */
export const sum: BuiltinCommand = async (args, context) => {
  expectArgs('sum', args, 1);
  const { checksum, size } = bsdSum(chunksOf(context, args[0]));
  return ok(`${checksum} ${size} ${args[0]}`);
};

/**
 * cksum - POSIX CRC-32 checksum
 * Usage: cksum <file>
 */
export const cksum: BuiltinCommand = async (args, context) => {
  expectArgs('cksum', args, 1);
  const { checksum, size } = posixCksum(chunksOf(context, args[0]));
  return ok(`${checksum} ${size} ${args[0]}`);
};

export const od: BuiltinCommand = async (args, context) => {
  expectArgs('od', args, 1);
  return ok(octalDumpRows(bytesOf(context, args[0])).join('\n'));
};

export const hexdump: BuiltinCommand = async (args, context) => {
  expectArgs('hexdump', args, 1);
  return ok(hexdumpRows(bytesOf(context, args[0])).join('\n'));
};

/**
 * strings - Print runs of printable characters
 * Usage: strings <file>
 */
export const strings: BuiltinCommand = async (args, context) => {
  expectArgs('strings', args, 1);
  return ok(printableStrings(bytesOf(context, args[0])).join('\n'));
};
