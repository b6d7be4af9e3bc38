/**
 * backend/src/modules/bootstrap/bootstrap.module.ts
 *
 * WHY:
 * - Wires BootstrapManager and the tenant context cache.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { Cache } from '../../shared/cache/cache';
import type { Logger } from '../../shared/logger/logger';
import type { TenantRepo, TenantService } from '../tenants';
import type { UserRepo } from '../users';
import { BootstrapManager } from './bootstrap.manager';
import { TenantContextCache } from './tenant-context.cache';

export type BootstrapModule = ReturnType<typeof createBootstrapModule>;

export function createBootstrapModule(deps: {
  cache: Cache;
  tenantCacheTtlSeconds: number;
  userRepo: UserRepo;
  tenantRepo: TenantRepo;
  tenantService: TenantService;
  logger: Logger;
  now?: () => Date;
}) {
  const bootstrapManager = new BootstrapManager({
    userRepo: deps.userRepo,
    tenantRepo: deps.tenantRepo,
    tenantService: deps.tenantService,
    logger: deps.logger,
    now: deps.now,
  });
  const tenantContextCache = new TenantContextCache(deps.cache, deps.tenantCacheTtlSeconds);

  return {
    bootstrapManager,
    tenantContextCache,
  };
}
