/**
 * backend/src/shared/cache/redis-cache.ts
 *
 * WHY:
 * - Shared tenant-context cache for deployments running several gateway instances:
 *   an invalidation on one instance is seen by all of them.
 *
 * RULES:
 * - Every key is namespaced with `keyPrefix` (DI passes the database name), so gateways
 *   fronting different databases can share one Redis.
 * - TTLs map to Redis `EX`; entries without a TTL never expire on their own.
 * - Client errors fire outside any request, so they go to the global logger.
 */

import { createClient } from 'redis';
import type { Cache, CacheSetOptions } from './cache';
import { logger } from '../logger/logger';

// Derived from createClient() so a second @redis/client copy cannot clash on the type.
type RedisClient = ReturnType<typeof createClient>;

export type RedisCacheOptions = {
  keyPrefix?: string;
};

export class RedisCache implements Cache {
  private constructor(
    private readonly client: RedisClient,
    private readonly keyPrefix: string,
  ) {}

  static async connect(redisUrl: string, opts: RedisCacheOptions = {}): Promise<RedisCache> {
    const client = createClient({ url: redisUrl });

    client.on('error', (err: Error) => {
      logger.error('redis.client_error', {
        flow: 'cache.redis',
        message: err.message,
        stack: err.stack,
      });
    });

    await client.connect();
    return new RedisCache(client, opts.keyPrefix ?? '');
  }

  private key(key: string): string {
    return `${this.keyPrefix}${key}`;
  }

  get(key: string): Promise<string | null> {
    return this.client.get(this.key(key));
  }

  async set(key: string, value: string, opts?: CacheSetOptions): Promise<void> {
    if (opts?.ttlSeconds) {
      await this.client.set(this.key(key), value, { EX: opts.ttlSeconds });
    } else {
      await this.client.set(this.key(key), value);
    }
  }

  async del(key: string): Promise<void> {
    await this.client.del(this.key(key));
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}
