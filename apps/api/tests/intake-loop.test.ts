import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { InMemoryWorkQueue } from '@fhir-intake/shared-pipeline';
import type { BundleSink, PipelineDependencies, WorkQueue } from '@fhir-intake/shared-pipeline';
import { runIntakeLoop } from '../src/services/intake-loop.js';

describe('runIntakeLoop', () => {
  let dir: string;
  let deps: PipelineDependencies;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'intake-loop-test-'));
    vi.spyOn(process.stderr, 'write').mockReturnValue(true);
    deps = {
      sniffer: { sniff: async () => 'text/plain; charset=us-ascii' },
      tools: {
        textLayer: { extractText: async () => '' },
        rasterizer: { rasterize: async () => undefined },
        ocr: { recognize: async () => join(dir, 'never.hocr') },
      },
      mapper: { map: async () => [{ resourceType: 'Patient', id: 'p1' }] },
      extraction: { outputDir: join(dir, 'ocr') },
      validation: { url: null },
    };
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('processes queued files and stops when asked', async () => {
    const queue = new InMemoryWorkQueue({ visibilityTimeoutMs: 60_000 });
    const files = ['a.txt', 'b.txt'].map((name) => join(dir, name));
    for (const file of files) {
      await writeFile(file, 'Heart rate 72');
      queue.push(file);
    }
    const sink: BundleSink = { write: vi.fn(async () => undefined) };
    let polls = 0;

    const stats = await runIntakeLoop(queue, deps, {
      sink,
      pollIntervalMs: 1,
      shouldStop: () => polls++ >= 3,
    });

    expect(stats).toEqual({ empty: 1, completed: 2, failed: 0, retried: 0 });
    expect(sink.write).toHaveBeenCalledTimes(2);
  });

  it('reports queue failures and keeps polling', async () => {
    const queue: WorkQueue = {
      takeNext: vi.fn().mockRejectedValueOnce(new Error('Connection is closed.')).mockResolvedValue(null),
      ack: vi.fn(),
      nack: vi.fn(),
      close: vi.fn(),
    };
    const onPollError = vi.fn();
    let polls = 0;

    const stats = await runIntakeLoop(queue, deps, {
      sink: { write: async () => undefined },
      pollIntervalMs: 1,
      shouldStop: () => polls++ >= 3,
      onPollError,
    });

    expect(onPollError).toHaveBeenCalledWith(expect.objectContaining({ message: 'Connection is closed.' }));
    expect(stats.empty).toBe(2);
  });

  it('does not poll when already stopped', async () => {
    const queue = new InMemoryWorkQueue({ visibilityTimeoutMs: 60_000 });
    queue.push(join(dir, 'a.txt'));

    const stats = await runIntakeLoop(queue, deps, {
      sink: { write: async () => undefined },
      pollIntervalMs: 1,
      shouldStop: () => true,
    });

    expect(stats).toEqual({ empty: 0, completed: 0, failed: 0, retried: 0 });
    expect(queue.pendingCount()).toBe(1);
  });
});
