import Redis from 'ioredis';

/**
 * Redelivery counts live beside the broker, keyed by message id, because a requeued message is a
 * new broker job and the broker's own attempt count restarts with it.
 */
export interface RedeliveryCounter {
  peek(messageId: string): Promise<number>;
  increment(messageId: string): Promise<number>;
  clear(messageId: string): Promise<void>;
}

const KEY_PREFIX = 'pipeline:redeliveries:';
const DEFAULT_TTL_MS = 7 * 24 * 60 * 60 * 1000;

export class RedisRedeliveryCounter implements RedeliveryCounter {
  constructor(
    private readonly client: Redis,
    private readonly ttlMs: number = DEFAULT_TTL_MS
  ) {}

  async peek(messageId: string): Promise<number> {
    const raw = await this.client.get(KEY_PREFIX + messageId);
    return raw === null ? 0 : Number(raw);
  }

  async increment(messageId: string): Promise<number> {
    const key = KEY_PREFIX + messageId;
    const results = await this.client.multi().incr(key).pexpire(key, this.ttlMs).exec();
    const incr = results?.[0];
    if (!incr || incr[0]) {
      throw incr?.[0] ?? new Error(`redelivery counter increment failed for ${messageId}`);
    }
    return Number(incr[1]);
  }

  async clear(messageId: string): Promise<void> {
    await this.client.del(KEY_PREFIX + messageId);
  }
}
