/**
 * backend/src/modules/access/access.types.ts
 *
 * WHY:
 * - The closed set of documents the gateway serves, plus the facts a delete
 *   decision needs that are not on the document itself.
 */

import type { TenantDocument } from '../tenants/tenant.types';
import type { UserDocument } from '../users/user.types';

export type GatewayDocument = UserDocument | TenantDocument;

export type DeleteContext = {
  /** Requester holds the administrative capability (ADMIN_SUBJECTS). */
  administrative?: boolean;
  /**
   * Ids of live users whose activeTenantId points at the tenant being deleted.
   * Required for tenant deletes; absent means "unknown" and the delete is refused.
   */
  activeUserIds?: readonly string[];
};
