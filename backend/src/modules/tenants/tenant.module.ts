/**
 * backend/src/modules/tenants/tenant.module.ts
 *
 * WHY:
 * - Encapsulates Tenants module wiring.
 * - Tenants have no routes of their own; the virtual tables module serves them.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { Logger } from '../../shared/logger/logger';
import type { DocumentStore } from '../../shared/storage/document-store';
import { TenantRepo } from './dal/tenant.repo';
import { TenantService } from './tenant.service';

export type TenantModule = ReturnType<typeof createTenantModule>;

export function createTenantModule(deps: { store: DocumentStore; logger: Logger; now?: () => Date }) {
  const tenantRepo = new TenantRepo(deps.store, deps.logger);
  const tenantService = new TenantService({ tenantRepo, logger: deps.logger, now: deps.now });

  return {
    tenantRepo,
    tenantService,
  };
}
