/**
 * backend/src/modules/bootstrap/tenant-context.cache.ts
 *
 * WHY:
 * - Resolving a request's tenant context costs a user document read.
 *   Cache `userId -> activeTenantId` for a short TTL.
 *
 * RULES:
 * - Injected, never a process global.
 * - A hit may be stale for up to one TTL; gateway writes that change a user's
 *   active tenant must call invalidate().
 */

import type { Cache } from '../../shared/cache/cache';

const KEY_PREFIX = 'tenant-ctx:';

export class TenantContextCache {
  constructor(
    private readonly cache: Cache,
    private readonly ttlSeconds: number,
  ) {}

  private key(userId: string): string {
    return `${KEY_PREFIX}${userId}`;
  }

  get(userId: string): Promise<string | null> {
    return this.cache.get(this.key(userId));
  }

  set(userId: string, tenantId: string): Promise<void> {
    return this.cache.set(this.key(userId), tenantId, { ttlSeconds: this.ttlSeconds });
  }

  invalidate(userId: string): Promise<void> {
    return this.cache.del(this.key(userId));
  }
}
