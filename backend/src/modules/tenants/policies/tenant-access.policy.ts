/**
 * backend/src/modules/tenants/policies/tenant-access.policy.ts
 *
 * WHY:
 * - Who may read, change or delete a tenant document.
 *
 * RULES:
 * - Pure functions only (no I/O).
 * - Members read. The owner updates.
 * - The owner deletes, and only while no member has the tenant as activeTenantId.
 */

import type { DeleteContext } from '../../access/access.types';
import type { TenantDocument } from '../tenant.types';

export function isMember(userId: string, tenant: TenantDocument): boolean {
  return tenant.memberIds.includes(userId);
}

export function canReadTenant(requesterId: string, tenant: TenantDocument): boolean {
  return !tenant.deleted && isMember(requesterId, tenant);
}

export function canUpdateTenant(requesterId: string, tenant: TenantDocument): boolean {
  return !tenant.deleted && requesterId === tenant.ownerId;
}

/** True when some member currently works inside this tenant. Unknown counts as in use. */
export function isTenantInUse(tenant: TenantDocument, ctx: DeleteContext): boolean {
  if (ctx.activeUserIds === undefined) return true;
  return ctx.activeUserIds.some((id) => isMember(id, tenant));
}

export function canDeleteTenant(requesterId: string, tenant: TenantDocument, ctx: DeleteContext): boolean {
  if (!canUpdateTenant(requesterId, tenant)) return false;
  return !isTenantInUse(tenant, ctx);
}
