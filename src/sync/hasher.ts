import { createReadStream } from 'node:fs';
import { sha256 } from '@noble/hashes/sha256';
import { bytesToHex } from '@noble/hashes/utils';
import { IOError } from './errors.js';

export const CHUNK_SIZE = 64 * 1024;

export type FileHasher = (path: string) => Promise<string>;

export function hashBytes(content: Uint8Array | string): string {
  return bytesToHex(sha256(content));
}

/**
 * SHA-256 of a file, read in {@link CHUNK_SIZE} pieces so memory stays flat
 * regardless of file size.
 */
export function hashFile(path: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = sha256.create();
    const stream = createReadStream(path, { highWaterMark: CHUNK_SIZE });

    stream.on('data', (chunk) => hash.update(chunk));
    stream.on('error', (err) => {
      reject(new IOError(`Cannot read ${path}: ${err.message}`, path, { cause: err }));
    });
    stream.on('end', () => {
      resolve(bytesToHex(hash.digest()));
    });
  });
}
