/**
 * backend/src/modules/tenants/index.ts
 *
 * WHY:
 * - Define the public surface of the tenants module.
 * - Prevent cross-module coupling via deep imports into /dal or /policies.
 *
 * RULES:
 * - Only export contracts other modules actually need.
 */

export { createTenantModule } from './tenant.module';
export type { TenantModule } from './tenant.module';
export { TenantRepo, toStoredTenant } from './dal/tenant.repo';
export type { TenantChangeRow } from './dal/tenant.repo';
export { TenantService } from './tenant.service';
export { TenantErrors } from './tenant.errors';
export { TenantBulkOpSchema, TenantCreateSchema, TenantWriteSchema } from './tenant.schemas';
export type { TenantBulkOp, TenantCreate, TenantWrite } from './tenant.schemas';
export { isMember } from './policies/tenant-access.policy';
export { toTenantView } from './tenant.view';
export type { NewTenantDocument, TenantDocument, TenantView } from './tenant.types';
