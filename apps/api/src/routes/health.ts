/**
 * FILE PURPOSE: Health route: queue reachability plus external service status
 *
 * 200 { status: 'ok' } when Redis answers; 503 { status: 'degraded' } otherwise.
 * The mapper and validator are reported but do not change the status code:
 * the worker requeues or annotates when they are down.
 */

import type { ServerResponse } from 'node:http';
import { checkServiceHealth } from '@fhir-intake/shared-pipeline';
import type { IntakeConfig, ServiceStatus } from '@fhir-intake/shared-pipeline';
import { pingRedis } from '../redis.js';
import { sendJson } from '../types.js';

export async function handleHealthRoute(
  res: ServerResponse,
  config: Pick<IntakeConfig, 'redisUrl' | 'entityMapperUrl' | 'validationUrl'>,
  startTime: number,
): Promise<void> {
  const [queue, entityMapper, validation] = await Promise.all([
    pingRedis(config.redisUrl),
    checkServiceHealth(config.entityMapperUrl),
    config.validationUrl
      ? checkServiceHealth(config.validationUrl)
      : Promise.resolve<ServiceStatus | 'not-configured'>('not-configured'),
  ]);

  const healthy = queue === 'ok';
  sendJson(res, healthy ? 200 : 503, {
    status: healthy ? 'ok' : 'degraded',
    timestamp: new Date().toISOString(),
    uptimeSeconds: Math.floor((Date.now() - startTime) / 1000),
    services: { queue, entityMapper, validation },
  });
}
