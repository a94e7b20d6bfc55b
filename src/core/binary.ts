import { closeSync, openSync, readSync } from 'node:fs';
import { BINARY_SNIFF_BYTES } from '../constants/defaults.js';

/**
 * A file is binary iff a NUL byte occurs in its first 8 KiB. Binaries
 * without one in that window pass as text; that is the accepted rule.
 */
export function isBinaryFile(absPath: string): boolean {
  const buffer = Buffer.alloc(BINARY_SNIFF_BYTES);
  const fd = openSync(absPath, 'r');
  let bytesRead: number;
  try {
    bytesRead = readSync(fd, buffer, 0, BINARY_SNIFF_BYTES, 0);
  } finally {
    closeSync(fd);
  }
  return buffer.subarray(0, bytesRead).includes(0);
}
