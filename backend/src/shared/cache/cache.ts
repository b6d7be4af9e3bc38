/**
 * src/shared/cache/cache.ts
 *
 * WHY:
 * - Short-lived lookup state (resolved tenant context per user) must be fast and may be externalized.
 * - We depend on an abstraction so tests and single-node deployments can use an in-memory implementation.
 *
 * HOW TO USE:
 * - cache.get(key)
 * - cache.set(key, value, { ttlSeconds })
 * - cache.del(key)
 */

export interface CacheSetOptions {
  ttlSeconds?: number;
}

export interface Cache {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, opts?: CacheSetOptions): Promise<void>;
  del(key: string): Promise<void>;

  /** Releases connections held by the implementation (no-op for in-memory). */
  close(): Promise<void>;
}
