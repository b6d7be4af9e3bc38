/**
 * backend/src/modules/users/user.errors.ts
 *
 * WHY:
 * - Users module owns its domain semantics.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never put the raw subject in meta; user ids are fine.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const UserErrors = {
  userNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('User not found.', meta);
  },

  userDeactivated(meta?: AppErrorMeta) {
    return AppError.forbidden('User is deactivated.', meta);
  },

  cannotDeleteSelf(meta?: AppErrorMeta) {
    return AppError.forbidden('Users cannot delete themselves.', meta);
  },

  activeTenantNotAllowed(meta?: AppErrorMeta) {
    return AppError.forbidden('Active tenant must be a tenant you belong to.', meta);
  },
} as const;
