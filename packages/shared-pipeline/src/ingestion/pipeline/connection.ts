/**
 * FILE PURPOSE: Shared Redis connection parsing for the BullMQ intake queue
 * WHY: The producer (API) and the consumer (worker) must agree on host, auth and
 *      database index, including the /<db> suffix of the URL.
 */

export interface RedisConnectionOptions {
  host: string;
  port: number;
  username: string | undefined;
  password: string | undefined;
  db: number;
  tls: Record<string, never> | undefined;
}

export function parseRedisConnection(redisUrl?: string): RedisConnectionOptions {
  const url = redisUrl ?? process.env.REDIS_URL ?? 'redis://localhost:6379';
  const parsed = new URL(url);
  const dbIndex = parseInt(parsed.pathname.replace(/^\//, ''), 10);

  return {
    host: parsed.hostname,
    port: parseInt(parsed.port || '6379', 10),
    username: decodeURIComponent(parsed.username) || undefined,
    password: decodeURIComponent(parsed.password) || undefined,
    db: Number.isNaN(dbIndex) ? 0 : dbIndex,
    tls: parsed.protocol === 'rediss:' ? {} : undefined,
  };
}
