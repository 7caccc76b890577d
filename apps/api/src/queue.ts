/**
 * FILE PURPOSE: Lazily created producer handle on the intake queue
 * WHY: The API only needs the queue when a file is submitted; tests and health
 *      checks must not open a Redis connection as a side effect of importing routes.
 */

import type { Queue } from 'bullmq';
import { createIntakeQueue } from '@fhir-intake/shared-pipeline';
import type { IntakeConfig, IntakeQueueData } from '@fhir-intake/shared-pipeline';

let intakeQueue: Queue<IntakeQueueData> | null = null;

export function getIntakeQueue(config: Pick<IntakeConfig, 'redisUrl' | 'queueName'>): Queue<IntakeQueueData> {
  if (intakeQueue) return intakeQueue;
  intakeQueue = createIntakeQueue(config.redisUrl, config.queueName);
  return intakeQueue;
}

export async function closeIntakeQueue(): Promise<void> {
  if (intakeQueue) {
    await intakeQueue.close();
    intakeQueue = null;
  }
}
