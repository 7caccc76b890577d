/**
 * FILE PURPOSE: In-process WorkQueue with the same ack/nack/visibility contract as BullWorkQueue
 * WHY: Local single-process runs and tests need the delivery semantics without Redis.
 */

import { randomUUID } from 'node:crypto';
import type { NackOptions, QueueLease, WorkQueue } from './jobs.js';

interface PendingItem {
  fileReference: string;
  attempt: number;
}

interface InFlightItem {
  item: PendingItem;
  deadline: number;
}

export interface DeadLetter {
  fileReference: string;
  reason: string;
}

export class InMemoryWorkQueue implements WorkQueue {
  private readonly pending: PendingItem[] = [];
  private readonly inFlight = new Map<string, InFlightItem>();
  private readonly deadLetters: DeadLetter[] = [];
  private readonly visibilityTimeoutMs: number;
  private readonly now: () => number;

  constructor(options: { visibilityTimeoutMs: number; now?: () => number }) {
    this.visibilityTimeoutMs = options.visibilityTimeoutMs;
    this.now = options.now ?? Date.now;
  }

  push(fileReference: string): void {
    this.pending.push({ fileReference, attempt: 1 });
  }

  async takeNext(): Promise<QueueLease | null> {
    this.requeueExpired();
    const item = this.pending.shift();
    if (!item) return null;

    const id = randomUUID();
    this.inFlight.set(id, { item, deadline: this.now() + this.visibilityTimeoutMs });
    return { id, fileReference: item.fileReference, attempt: item.attempt };
  }

  async ack(lease: QueueLease): Promise<void> {
    this.release(lease);
  }

  async nack(lease: QueueLease, reason: Error, options: NackOptions): Promise<void> {
    const { item } = this.release(lease);
    if (options.requeue) {
      this.pending.push({ fileReference: item.fileReference, attempt: item.attempt + 1 });
    } else {
      this.deadLetters.push({ fileReference: item.fileReference, reason: reason.message });
    }
  }

  async close(): Promise<void> {
    this.pending.length = 0;
    this.inFlight.clear();
  }

  pendingCount(): number {
    return this.pending.length;
  }

  inFlightCount(): number {
    return this.inFlight.size;
  }

  failed(): readonly DeadLetter[] {
    return this.deadLetters;
  }

  private requeueExpired(): void {
    const now = this.now();
    for (const [id, { item, deadline }] of this.inFlight) {
      if (deadline > now) continue;
      this.inFlight.delete(id);
      process.stderr.write(`WARN: Lease on ${item.fileReference} expired, requeueing\n`);
      this.pending.push({ fileReference: item.fileReference, attempt: item.attempt + 1 });
    }
  }

  private release(lease: QueueLease): InFlightItem {
    this.requeueExpired();
    const held = this.inFlight.get(lease.id);
    if (!held) {
      throw new Error(`Lease ${lease.id} is not held (already settled or expired)`);
    }
    this.inFlight.delete(lease.id);
    return held;
  }
}
