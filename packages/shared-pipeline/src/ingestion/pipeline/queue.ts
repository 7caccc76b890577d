/**
 * FILE PURPOSE: BullMQ-backed intake queue: producer factory + acknowledging consumer
 * WHY: A bare list pop loses the file if the worker dies mid-job. BullMQ's manual
 *      fetch mode gives a lock per job (the visibility timeout), explicit completion,
 *      and a stalled-job checker that puts expired locks back in the queue.
 */

import { randomUUID } from 'node:crypto';
import { Queue, UnrecoverableError, Worker } from 'bullmq';
import type { Job } from 'bullmq';
import { parseRedisConnection } from './connection.js';
import { DEFAULT_QUEUE_NAME, INTAKE_JOB_NAME } from './jobs.js';
import type { IntakeQueueData, NackOptions, QueueLease, WorkQueue } from './jobs.js';

export function createIntakeQueue(redisUrl?: string, queueName = DEFAULT_QUEUE_NAME): Queue<IntakeQueueData> {
  return new Queue<IntakeQueueData>(queueName, {
    connection: parseRedisConnection(redisUrl),
    defaultJobOptions: {
      attempts: 3,
      backoff: { type: 'exponential', delay: 1000 },
      removeOnComplete: { count: 1000 },
      removeOnFail: { count: 5000 },
    },
  });
}

/** Push one file reference. Returns the queue's job id. */
export async function enqueueFile(queue: Queue<IntakeQueueData>, fileReference: string): Promise<string> {
  const job = await queue.add(INTAKE_JOB_NAME, {
    fileReference,
    enqueuedAt: new Date().toISOString(),
  });
  return job.id ?? '';
}

export interface BullWorkQueueOptions {
  redisUrl?: string;
  queueName?: string;
  visibilityTimeoutMs: number;
}

interface HeldJob {
  job: Job<IntakeQueueData>;
  token: string;
}

export class BullWorkQueue implements WorkQueue {
  private readonly worker: Worker<IntakeQueueData>;
  private readonly held = new Map<string, HeldJob>();
  private stalledCheckStarted = false;

  constructor(options: BullWorkQueueOptions) {
    this.worker = new Worker<IntakeQueueData>(options.queueName ?? DEFAULT_QUEUE_NAME, null, {
      connection: parseRedisConnection(options.redisUrl),
      autorun: false,
      lockDuration: options.visibilityTimeoutMs,
      stalledInterval: options.visibilityTimeoutMs,
      maxStalledCount: 3,
    });
  }

  async takeNext(): Promise<QueueLease | null> {
    if (!this.stalledCheckStarted) {
      this.stalledCheckStarted = true;
      await this.worker.startStalledCheckTimer();
    }

    const token = randomUUID();
    const job = await this.worker.getNextJob(token, { block: false });
    if (!job) return null;

    const id = job.id ?? token;
    this.held.set(id, { job, token });
    return { id, fileReference: job.data.fileReference, attempt: job.attemptsMade + 1 };
  }

  async ack(lease: QueueLease): Promise<void> {
    const { job, token } = this.release(lease);
    await job.moveToCompleted('acknowledged', token, false);
  }

  async nack(lease: QueueLease, reason: Error, options: NackOptions): Promise<void> {
    const { job, token } = this.release(lease);
    const failure = options.requeue ? reason : new UnrecoverableError(reason.message);
    await job.moveToFailed(failure, token, false);
  }

  async close(): Promise<void> {
    await this.worker.close();
  }

  private release(lease: QueueLease): HeldJob {
    const held = this.held.get(lease.id);
    if (!held) {
      throw new Error(`Lease ${lease.id} is not held by this worker`);
    }
    this.held.delete(lease.id);
    return held;
  }
}
