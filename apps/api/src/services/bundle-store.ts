/**
 * FILE PURPOSE: Writes each finished Bundle to `<dir>/<transactionId>.json`
 * WHY: The worker acks a queue item only after this write resolves, so a crash
 *      before the file exists leads to redelivery rather than a lost bundle.
 */

import { mkdir, rename, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Bundle } from '@fhir-intake/shared-types';
import type { BundleSink, IntakeJob } from '@fhir-intake/shared-pipeline';

export class FileBundleSink implements BundleSink {
  constructor(private readonly dir: string) {}

  pathFor(job: Pick<IntakeJob, 'transactionId'>): string {
    return join(this.dir, `${job.transactionId}.json`);
  }

  async write(job: IntakeJob, bundle: Bundle): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    const path = this.pathFor(job);
    const partial = `${path}.partial`;
    // Readers never see a half-written bundle.
    await writeFile(partial, `${JSON.stringify(bundle, null, 2)}\n`, 'utf-8');
    await rename(partial, path);
    process.stderr.write(`INFO: Bundle ${bundle.id} for ${job.fileReference} written to ${path}\n`);
  }
}
