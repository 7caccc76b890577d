/**
 * FILE PURPOSE: Redis reachability probe for the health route
 *
 * WHY: The queue is the one dependency without which the API cannot accept work.
 * HOW: Lazy ioredis client with a short retry budget, so a dead Redis fails the
 *      ping quickly instead of hanging the health check.
 */

import { Redis } from 'ioredis';

let redis: Redis | null = null;

function getRedis(redisUrl: string): Redis {
  if (redis) return redis;

  redis = new Redis(redisUrl, {
    maxRetriesPerRequest: 1,
    retryStrategy(times: number) {
      if (times > 3) return null;
      return Math.min(times * 200, 1000);
    },
    lazyConnect: true,
  });

  redis.on('error', (err: Error) => {
    process.stderr.write(`WARN: Redis health client error: ${err.message}\n`);
  });

  return redis;
}

export async function pingRedis(redisUrl: string): Promise<'ok' | 'unreachable'> {
  try {
    const reply = await getRedis(redisUrl).ping();
    return reply === 'PONG' ? 'ok' : 'unreachable';
  } catch {
    return 'unreachable';
  }
}

/** Disconnect Redis gracefully. Call during server shutdown. */
export async function shutdownRedis(): Promise<void> {
  if (redis) {
    try {
      await redis.quit();
    } catch {
      process.stderr.write('WARN: Error closing Redis connection\n');
    }
    redis = null;
  }
}
