import Redis, { RedisOptions } from 'ioredis';
import { computeBackoffDelay, withTimeout } from '../utils/backoff';
import type { Logger } from './logger';

export type RedisConnectionSettings = {
  url?: string;
  host?: string;
  port?: number;
  password?: string;
  reconnectBaseMs: number;
  reconnectMaxMs: number;
};

/**
 * Connection for BullMQ queues and workers.
 * BullMQ requires maxRetriesPerRequest=null; reconnects back off exponentially up to the cap.
 */
export function createRedisConnection(settings: RedisConnectionSettings, logger: Logger): Redis {
  const options: RedisOptions = {
    maxRetriesPerRequest: null,
    retryStrategy: (times) => {
      const delay = computeBackoffDelay(times, settings.reconnectBaseMs, settings.reconnectMaxMs);
      logger.warn({ event: 'redis.reconnect.scheduled', attempt: times, delayMs: delay }, 'redis.reconnect');
      return delay;
    },
  };

  if (settings.url) {
    return new Redis(settings.url, options);
  }

  // Dev-friendly fallback (local redis)
  return new Redis({
    host: settings.host || 'localhost',
    port: settings.port || 6379,
    password: settings.password,
    ...options,
  });
}

export async function pingWithTimeout(
  client: Redis,
  timeoutMs: number,
  retries: number
): Promise<{ ok: boolean; error?: string }> {
  let lastErr: unknown;

  for (let attempt = 0; attempt <= retries; attempt += 1) {
    try {
      const result = await withTimeout('redis ping', timeoutMs, () => client.ping());

      if (result === 'PONG') return { ok: true };
      return { ok: false, error: `unexpected ping response: ${String(result)}` };
    } catch (e) {
      lastErr = e;
    }
  }

  return { ok: false, error: lastErr instanceof Error ? lastErr.message : String(lastErr) };
}

export async function closeRedis(client: Redis): Promise<void> {
  if (client.status === 'end') return;
  await client.quit();
}
