/**
 * FILE PURPOSE: Queue payload for the intake pipeline
 * WHY: Producer (API / upstream) and consumer (worker) share one typed payload.
 */

/** BullMQ job name used for every intake item. */
export const INTAKE_JOB_NAME = 'intake-file';

/** Default queue name. Matches the list upstream producers already push to. */
export const DEFAULT_QUEUE_NAME = 'file_queue';

/** Job data shape for the BullMQ intake queue. */
export interface IntakeQueueData {
  fileReference: string;
  enqueuedAt: string;
}

/** A file reference handed to one worker until it acks or nacks it. */
export interface QueueLease {
  id: string;
  fileReference: string;
  /** 1 on first delivery, incremented on every redelivery. */
  attempt: number;
}

export interface NackOptions {
  /** true → deliver again later; false → park as failed. */
  requeue: boolean;
}

/**
 * Work queue contract. Delivery is at-least-once: a lease that is neither acked
 * nor nacked within the visibility timeout becomes visible to other workers again.
 */
export interface WorkQueue {
  /** Pop one pending item, or null when there is nothing to do. */
  takeNext(): Promise<QueueLease | null>;
  ack(lease: QueueLease): Promise<void>;
  nack(lease: QueueLease, reason: Error, options: NackOptions): Promise<void>;
  close(): Promise<void>;
}
