/**
 * KV Adapter: Redis + In-Memory implementations
 *
 * Implements the core's KVStore interface backed by either Redis (ioredis)
 * for multi-node deployments or an in-memory Map for single-node / dev use.
 *
 * Reads are fail-open: a Redis error on get/list logs and returns nothing,
 * so the cache store falls back to its in-process snapshot. Writes throw,
 * since a lost credential or audit record must reach the caller.
 */

import { Redis } from 'ioredis';
import type { KVListResult, KVStore } from '@keyward/api';

// ---------------------------------------------------------------------------
// Redis KV Adapter
// ---------------------------------------------------------------------------

export class RedisKVAdapter implements KVStore {
  private readonly redis: Redis;
  private readonly prefix: string;

  constructor(redis: Redis, prefix = 'keyward:') {
    this.redis = redis;
    this.prefix = prefix;
  }

  private key(k: string): string {
    return `${this.prefix}${k}`;
  }

  async get(key: string): Promise<string | null> {
    try {
      return await this.redis.get(this.key(key));
    } catch (err) {
      console.error('[RedisKV] get error (fail-open):', err);
      return null;
    }
  }

  async put(key: string, value: string): Promise<void> {
    await this.redis.set(this.key(key), value);
  }

  async delete(key: string): Promise<void> {
    await this.redis.del(this.key(key));
  }

  async list(options?: { prefix?: string; limit?: number; cursor?: string }): Promise<KVListResult> {
    try {
      const scanPrefix = this.key(options?.prefix ?? '');
      const count = options?.limit ?? 1000;
      const startCursor = options?.cursor ?? '0';

      const [nextCursor, rawKeys] = await this.redis.scan(startCursor, 'MATCH', `${scanPrefix}*`, 'COUNT', count);

      const keys = rawKeys.map((k) => ({
        name: k.startsWith(this.prefix) ? k.slice(this.prefix.length) : k,
      }));

      return {
        keys,
        list_complete: nextCursor === '0',
        cursor: nextCursor === '0' ? undefined : nextCursor,
      };
    } catch (err) {
      console.error('[RedisKV] list error (fail-open):', err);
      return { keys: [], list_complete: true };
    }
  }

  /** Expose underlying Redis client for health checks and shutdown. */
  getRedisClient(): Redis {
    return this.redis;
  }
}

// ---------------------------------------------------------------------------
// In-Memory KV Adapter (single-node / dev)
// ---------------------------------------------------------------------------

export class InMemoryKVAdapter implements KVStore {
  private readonly store = new Map<string, string>();

  async get(key: string): Promise<string | null> {
    return this.store.get(key) ?? null;
  }

  async put(key: string, value: string): Promise<void> {
    this.store.set(key, value);
  }

  async delete(key: string): Promise<void> {
    this.store.delete(key);
  }

  async list(options?: { prefix?: string; limit?: number; cursor?: string }): Promise<KVListResult> {
    const prefix = options?.prefix ?? '';
    const limit = options?.limit ?? 1000;
    const offset = options?.cursor ? Number(options.cursor) : 0;

    const matching = [...this.store.keys()].filter((k) => k.startsWith(prefix)).sort();
    const page = matching.slice(offset, offset + limit).map((name) => ({ name }));
    const next = offset + limit;

    return next < matching.length
      ? { keys: page, list_complete: false, cursor: String(next) }
      : { keys: page, list_complete: true };
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createKVAdapter(redisUrl?: string): KVStore {
  if (redisUrl) {
    const redis = new Redis(redisUrl, {
      maxRetriesPerRequest: 3,
      retryStrategy(times: number) {
        return Math.min(times * 200, 5000);
      },
      lazyConnect: true,
    });
    return new RedisKVAdapter(redis);
  }
  console.warn('[KV] No REDIS_URL configured, using in-memory KV adapter');
  return new InMemoryKVAdapter();
}
