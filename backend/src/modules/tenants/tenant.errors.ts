/**
 * backend/src/modules/tenants/tenant.errors.ts
 *
 * WHY:
 * - Tenants module owns its domain semantics.
 * - Keeps shared/http/errors.ts small and stable.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Put tenant-specific meaning here: messages + safe meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const TenantErrors = {
  tenantNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Tenant not found.', meta);
  },

  tenantInUse(meta?: AppErrorMeta) {
    return AppError.forbidden('Tenant is the active tenant of a member.', meta);
  },

  cannotRemoveOwner(meta?: AppErrorMeta) {
    return AppError.forbidden('The tenant owner cannot be removed.', meta);
  },

  memberNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Member not found.', meta);
  },
} as const;
