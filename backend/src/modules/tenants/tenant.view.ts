/**
 * backend/src/modules/tenants/tenant.view.ts
 *
 * WHY:
 * - Translate stored tenants to what clients see (external user ids).
 */

import { internalToExternal } from '../identifiers';
import type { TenantDocument, TenantView } from './tenant.types';

export function toTenantView(tenant: TenantDocument): TenantView {
  return {
    _id: tenant.id,
    _rev: tenant.rev,
    type: 'tenant',
    ownerId: internalToExternal(tenant.ownerId),
    memberIds: tenant.memberIds.map(internalToExternal),
    name: tenant.name,
    metadata: tenant.metadata,
    personal: tenant.personal,
    deleted: tenant.deleted,
    createdAt: tenant.createdAt,
    updatedAt: tenant.updatedAt,
  };
}
