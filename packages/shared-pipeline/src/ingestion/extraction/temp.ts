/**
 * FILE PURPOSE: Scoped temporary directory for intermediate extraction artifacts
 * WHY: Rasterized pages of a 600 dpi scan run to hundreds of MB. The directory is
 *      removed on success and failure alike; a failed removal is only logged.
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describeError } from '../../errors.js';

export async function removeQuietly(path: string): Promise<void> {
  try {
    await rm(path, { recursive: true, force: true });
  } catch (err) {
    process.stderr.write(`WARN: Failed to remove temporary artifact ${path}: ${describeError(err)}\n`);
  }
}

export async function withTempDir<T>(prefix: string, fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), prefix));
  try {
    return await fn(dir);
  } finally {
    await removeQuietly(dir);
  }
}
