/**
 * src/shared/cache/inmem-cache.ts
 *
 * WHY:
 * - Allows tests and single-node deployments to run without Redis.
 * - TTL map: entries expire lazily on read. Keys that are never read again are dropped
 *   by sweep(), which runs on a timer when `sweepIntervalMs` is set.
 *
 * HOW TO USE:
 * - const cache = new InMemCache()
 * - const cache = new InMemCache({ sweepIntervalMs: 300_000 })  // long-lived processes
 * - const cache = new InMemCache({ now: () => fakeClockMs })  // deterministic tests
 *
 * RULES:
 * - The sweep timer is unref'd (never keeps the process alive) and cleared by close().
 */

import type { Cache, CacheSetOptions } from './cache';

type StringEntry = { value: string; expiresAtMs: number | null };

export class InMemCache implements Cache {
  private readonly store = new Map<string, StringEntry>();
  private readonly clock: () => number;
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(opts: { now?: () => number; sweepIntervalMs?: number } = {}) {
    this.clock = opts.now ?? Date.now;

    if (opts.sweepIntervalMs && opts.sweepIntervalMs > 0) {
      this.sweepTimer = setInterval(() => this.sweep(), opts.sweepIntervalMs);
      this.sweepTimer.unref();
    }
  }

  private getEntry(key: string): StringEntry | null {
    const entry = this.store.get(key);
    if (!entry) return null;

    if (entry.expiresAtMs !== null && entry.expiresAtMs <= this.clock()) {
      this.store.delete(key);
      return null;
    }

    return entry;
  }

  get(key: string): Promise<string | null> {
    const entry = this.getEntry(key);
    return Promise.resolve(entry ? entry.value : null);
  }

  set(key: string, value: string, opts?: CacheSetOptions): Promise<void> {
    const expiresAtMs = opts?.ttlSeconds ? this.clock() + opts.ttlSeconds * 1000 : null;
    this.store.set(key, { value, expiresAtMs });
    return Promise.resolve();
  }

  del(key: string): Promise<void> {
    this.store.delete(key);
    return Promise.resolve();
  }

  /**
   * Drops every expired entry. Returns how many were removed.
   */
  sweep(): number {
    const now = this.clock();
    let removed = 0;
    for (const [key, entry] of this.store) {
      if (entry.expiresAtMs !== null && entry.expiresAtMs <= now) {
        this.store.delete(key);
        removed++;
      }
    }
    return removed;
  }

  size(): number {
    return this.store.size;
  }

  close(): Promise<void> {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    this.store.clear();
    return Promise.resolve();
  }
}
