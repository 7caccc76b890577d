/**
 * FILE PURPOSE: Streaming SHA-256 fingerprint of a file's bytes
 * WHY: Files can be large scans; hashing reads fixed-size chunks and never holds
 *      the whole file in memory. The digest depends only on the bytes, not on
 *      where the chunk boundaries fall.
 */

import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';

export const DEFAULT_CHUNK_SIZE = 64 * 1024;

export async function fingerprintChunks(chunks: AsyncIterable<Uint8Array> | Iterable<Uint8Array>): Promise<string> {
  const hash = createHash('sha256');
  for await (const chunk of chunks) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

export function computeFingerprint(path: string, chunkSize = DEFAULT_CHUNK_SIZE): Promise<string> {
  return fingerprintChunks(createReadStream(path, { highWaterMark: chunkSize }));
}
