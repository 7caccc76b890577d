import { describe, it, expect, vi, beforeEach } from 'vitest';

const mockGetNextJob = vi.fn();
const mockStartStalledCheckTimer = vi.fn();
const mockWorkerClose = vi.fn();
const mockWorkerCtor = vi.fn();
const mockQueueCtor = vi.fn();
const mockQueueAdd = vi.fn();

vi.mock('bullmq', () => {
  class UnrecoverableError extends Error {
    constructor(message?: string) {
      super(message);
      this.name = 'UnrecoverableError';
    }
  }
  return {
    UnrecoverableError,
    Queue: class {
      add = mockQueueAdd;
      constructor(...args: unknown[]) {
        mockQueueCtor(...args);
      }
    },
    Worker: class {
      getNextJob = mockGetNextJob;
      startStalledCheckTimer = mockStartStalledCheckTimer;
      close = mockWorkerClose;
      constructor(...args: unknown[]) {
        mockWorkerCtor(...args);
      }
    },
  };
});

import { UnrecoverableError } from 'bullmq';
import { BullWorkQueue, createIntakeQueue, enqueueFile } from '../src/ingestion/pipeline/queue.js';

function fakeJob(id: string, fileReference: string, attemptsMade = 0) {
  return {
    id,
    data: { fileReference, enqueuedAt: '2026-01-01T00:00:00.000Z' },
    attemptsMade,
    moveToCompleted: vi.fn().mockResolvedValue(undefined),
    moveToFailed: vi.fn().mockResolvedValue(undefined),
  };
}

describe('createIntakeQueue', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('creates the queue with retry and retention defaults', () => {
    createIntakeQueue('redis://queue-host:6380/2', 'scans');

    expect(mockQueueCtor).toHaveBeenCalledWith('scans', {
      connection: {
        host: 'queue-host',
        port: 6380,
        username: undefined,
        password: undefined,
        db: 2,
        tls: undefined,
      },
      defaultJobOptions: {
        attempts: 3,
        backoff: { type: 'exponential', delay: 1000 },
        removeOnComplete: { count: 1000 },
        removeOnFail: { count: 5000 },
      },
    });
  });

  it('uses file_queue by default', () => {
    createIntakeQueue('redis://localhost:6379');
    expect(mockQueueCtor.mock.calls[0]?.[0]).toBe('file_queue');
  });
});

describe('enqueueFile', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('adds an intake-file job and returns its id', async () => {
    mockQueueAdd.mockResolvedValue({ id: '42' });
    const queue = createIntakeQueue('redis://localhost:6379');

    const id = await enqueueFile(queue, '/data/report.pdf');

    expect(id).toBe('42');
    expect(mockQueueAdd).toHaveBeenCalledWith('intake-file', {
      fileReference: '/data/report.pdf',
      enqueuedAt: expect.any(String),
    });
  });
});

describe('BullWorkQueue', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mockStartStalledCheckTimer.mockResolvedValue(undefined);
    mockWorkerClose.mockResolvedValue(undefined);
  });

  it('creates a manual-fetch worker whose lock lasts the visibility timeout', () => {
    new BullWorkQueue({ redisUrl: 'redis://localhost:6379', visibilityTimeoutMs: 60_000 });

    expect(mockWorkerCtor).toHaveBeenCalledWith('file_queue', null, expect.objectContaining({
      autorun: false,
      lockDuration: 60_000,
      stalledInterval: 60_000,
    }));
  });

  it('returns null when nothing is waiting', async () => {
    mockGetNextJob.mockResolvedValue(undefined);
    const queue = new BullWorkQueue({ visibilityTimeoutMs: 1000 });

    expect(await queue.takeNext()).toBeNull();
  });

  it('starts the stalled-job check once', async () => {
    mockGetNextJob.mockResolvedValue(undefined);
    const queue = new BullWorkQueue({ visibilityTimeoutMs: 1000 });

    await queue.takeNext();
    await queue.takeNext();

    expect(mockStartStalledCheckTimer).toHaveBeenCalledTimes(1);
  });

  it('leases a job and completes it on ack with the same token', async () => {
    const job = fakeJob('7', '/data/report.pdf', 1);
    mockGetNextJob.mockResolvedValue(job);
    const queue = new BullWorkQueue({ visibilityTimeoutMs: 1000 });

    const lease = await queue.takeNext();
    expect(lease).toEqual({ id: '7', fileReference: '/data/report.pdf', attempt: 2 });
    if (!lease) return;

    await queue.ack(lease);

    const token = mockGetNextJob.mock.calls[0]?.[0];
    expect(mockGetNextJob).toHaveBeenCalledWith(token, { block: false });
    expect(job.moveToCompleted).toHaveBeenCalledWith('acknowledged', token, false);
  });

  it('fails a requeued job with the original error so BullMQ retries it', async () => {
    const job = fakeJob('8', '/data/report.pdf');
    mockGetNextJob.mockResolvedValue(job);
    const queue = new BullWorkQueue({ visibilityTimeoutMs: 1000 });
    const lease = await queue.takeNext();
    if (!lease) throw new Error('expected a lease');

    const reason = new Error('mapper unavailable');
    await queue.nack(lease, reason, { requeue: true });

    expect(job.moveToFailed).toHaveBeenCalledWith(reason, expect.any(String), false);
  });

  it('fails a parked job with an UnrecoverableError', async () => {
    const job = fakeJob('9', '/data/broken.pdf');
    mockGetNextJob.mockResolvedValue(job);
    const queue = new BullWorkQueue({ visibilityTimeoutMs: 1000 });
    const lease = await queue.takeNext();
    if (!lease) throw new Error('expected a lease');

    await queue.nack(lease, new Error('Extraction failed at ocr'), { requeue: false });

    const failure = job.moveToFailed.mock.calls[0]?.[0];
    expect(failure).toBeInstanceOf(UnrecoverableError);
    expect(failure.message).toBe('Extraction failed at ocr');
  });

  it('refuses to settle a lease twice', async () => {
    mockGetNextJob.mockResolvedValue(fakeJob('10', '/data/report.pdf'));
    const queue = new BullWorkQueue({ visibilityTimeoutMs: 1000 });
    const lease = await queue.takeNext();
    if (!lease) throw new Error('expected a lease');

    await queue.ack(lease);
    await expect(queue.ack(lease)).rejects.toThrow('Lease 10 is not held by this worker');
  });

  it('closes the worker', async () => {
    const queue = new BullWorkQueue({ visibilityTimeoutMs: 1000 });
    await queue.close();
    expect(mockWorkerClose).toHaveBeenCalled();
  });
});
