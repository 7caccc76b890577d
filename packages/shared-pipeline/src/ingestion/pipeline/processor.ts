/**
 * FILE PURPOSE: End-to-end processing of one file, and one poll of the work queue
 *
 * WHY: Stages run strictly in sequence for a job; each gets only what the previous
 *      one returned. Queue settlement depends on how the job ended:
 *        bundle written       → ack
 *        ExtractionError      → nack, parked (the document itself is unreadable)
 *        anything else        → nack, requeued (mapper down, disk full...)
 *
 * HOW: classify → createJob → extractContent → mapper.map → toResource
 *      → reconcile → enrichResources → assembleBundle
 *      The OCR markup file is removed once the mapper has consumed it.
 */

import { rm } from 'node:fs/promises';
import type { Bundle, BundleType } from '@fhir-intake/shared-types';
import { describeError, ExtractionError } from '../../errors.js';
import type { EntityRecord, Resource } from '../../resources/resource.js';
import { toResource } from '../../resources/resource.js';
import { assembleBundle } from '../bundle/assembler.js';
import { classifyFile } from '../classify/index.js';
import { mimeString } from '../classify/mime.js';
import { extractContent } from '../extraction/decider.js';
import type { ExtractionOptions } from '../extraction/decider.js';
import { reconcileToList } from '../reconcile/reconcile.js';
import type { ScalarMergePolicy } from '../reconcile/reconcile.js';
import type { ContentSniffer, EntityMapper, ExtractionResult, ExtractionTools, IntakeJob } from '../types.js';
import { createJob } from '../types.js';
import { enrichResources } from '../validation/enricher.js';
import type { QueueLease, WorkQueue } from './jobs.js';

export interface PipelineDependencies {
  sniffer: ContentSniffer;
  tools: ExtractionTools;
  mapper: EntityMapper;
  extraction: ExtractionOptions;
  validation: { url: string | null; timeoutMs?: number };
  hashChunkSize?: number;
  bundleType?: BundleType;
  scalarPolicy?: ScalarMergePolicy;
}

export interface IntakeOutcome {
  job: IntakeJob;
  extraction: ExtractionResult;
  resources: Resource[];
  bundle: Bundle;
}

/** Receives the finished bundle of a job before the queue item is acked. */
export interface BundleSink {
  write(job: IntakeJob, bundle: Bundle): Promise<void>;
}

export type PollOutcome = 'empty' | 'completed' | 'failed' | 'retried';

export interface PollOptions {
  sink: BundleSink;
  /** Called with every job failure before the item is nacked. A throwing hook is logged and ignored. */
  onError?: (err: unknown, lease: QueueLease) => void;
}

async function removeMarkup(markupPath: string): Promise<void> {
  try {
    await rm(markupPath, { force: true });
  } catch (err) {
    process.stderr.write(`WARN: Could not remove OCR output ${markupPath}: ${describeError(err)}\n`);
  }
}

export async function processFile(fileReference: string, deps: PipelineDependencies): Promise<IntakeOutcome> {
  const classification = await classifyFile(fileReference, {
    sniffer: deps.sniffer,
    chunkSize: deps.hashChunkSize,
  });
  const job = createJob(fileReference, classification);
  process.stderr.write(`INFO: Job ${job.transactionId} started for ${fileReference} (${mimeString(job.mime)})\n`);

  const extraction = await extractContent(job, deps.tools, deps.extraction);
  let records: EntityRecord[];
  try {
    records = await deps.mapper.map(extraction, job);
  } finally {
    if (extraction.markupPath) await removeMarkup(extraction.markupPath);
  }
  const reconciled = reconcileToList(records.map(toResource), { scalarPolicy: deps.scalarPolicy });

  let resources = reconciled;
  if (deps.validation.url) {
    resources = await enrichResources(reconciled, deps.validation.url, { timeoutMs: deps.validation.timeoutMs });
  } else {
    process.stderr.write(`INFO: VALIDATION_URL not set, skipping validation for job ${job.transactionId}\n`);
  }

  const bundle = assembleBundle(resources, deps.bundleType);
  process.stderr.write(
    `INFO: Job ${job.transactionId}: ${records.length} records → ${resources.length} resources (${extraction.sourceKind})\n`,
  );

  return { job, extraction, resources, bundle };
}

export async function pollOnce(queue: WorkQueue, deps: PipelineDependencies, options: PollOptions): Promise<PollOutcome> {
  const lease = await queue.takeNext();
  if (!lease) return 'empty';

  try {
    const outcome = await processFile(lease.fileReference, deps);
    await options.sink.write(outcome.job, outcome.bundle);
  } catch (err) {
    try {
      options.onError?.(err, lease);
    } catch (hookErr) {
      process.stderr.write(`WARN: onError hook threw for ${lease.fileReference}: ${describeError(hookErr)}\n`);
    }
    const reason = err instanceof Error ? err : new Error(String(err));

    if (err instanceof ExtractionError) {
      process.stderr.write(`ERROR: ${lease.fileReference} failed permanently: ${err.message}\n`);
      await queue.nack(lease, reason, { requeue: false });
      return 'failed';
    }

    process.stderr.write(
      `WARN: ${lease.fileReference} failed on attempt ${lease.attempt}, requeueing: ${describeError(err)}\n`,
    );
    await queue.nack(lease, reason, { requeue: true });
    return 'retried';
  }

  await queue.ack(lease);
  return 'completed';
}
