/**
 * FILE PURPOSE: Worker main loop: poll, process, sleep when idle, stop on request
 * WHY: Kept apart from worker.ts so the loop runs against an in-memory queue in tests.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { describeError, pollOnce } from '@fhir-intake/shared-pipeline';
import type { PipelineDependencies, PollOptions, PollOutcome, WorkQueue } from '@fhir-intake/shared-pipeline';

export interface IntakeLoopOptions extends PollOptions {
  pollIntervalMs: number;
  /** Checked between jobs; the current job always finishes. */
  shouldStop: () => boolean;
  /** Called when the queue itself fails, as opposed to a job. */
  onPollError?: (err: unknown) => void;
}

export type LoopStats = Record<PollOutcome, number>;

export async function runIntakeLoop(
  queue: WorkQueue,
  deps: PipelineDependencies,
  options: IntakeLoopOptions,
): Promise<LoopStats> {
  const stats: LoopStats = { empty: 0, completed: 0, failed: 0, retried: 0 };

  while (!options.shouldStop()) {
    let outcome: PollOutcome;
    try {
      outcome = await pollOnce(queue, deps, options);
    } catch (err) {
      // Redis down or lease lost: back off like an empty poll.
      process.stderr.write(`ERROR: Worker poll failed: ${describeError(err)}\n`);
      options.onPollError?.(err);
      outcome = 'empty';
    }

    stats[outcome] += 1;
    if (outcome === 'empty' && !options.shouldStop()) {
      await sleep(options.pollIntervalMs);
    }
  }

  return stats;
}
