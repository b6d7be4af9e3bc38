/**
 * backend/src/modules/invites/invite.errors.ts
 *
 * WHY:
 * - Invites module owns its domain semantics.
 *
 * SECURITY:
 * - Token failures must not leak whether a token exists.
 * - An invite addressed through the wrong tenant is NOT_FOUND, same as a missing one.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include raw tokens or token hashes in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const InviteErrors = {
  invalidToken(meta?: AppErrorMeta) {
    return AppError.notFound('Invite not found.', meta);
  },

  inviteNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Invite not found.', meta);
  },

  tenantMismatch(meta?: AppErrorMeta) {
    return AppError.notFound('Invite not found.', meta);
  },

  inviteExpired(meta?: AppErrorMeta) {
    return AppError.conflict('Invite has expired.', meta);
  },

  inviteAlreadyAccepted(meta?: AppErrorMeta) {
    return AppError.conflict('Invite already accepted.', meta);
  },

  inviteNotPending(meta?: AppErrorMeta) {
    return AppError.conflict('Invite is not valid.', meta);
  },

  alreadyMember(meta?: AppErrorMeta) {
    return AppError.conflict('Already a member of this tenant.', meta);
  },

  personalTenant(meta?: AppErrorMeta) {
    return AppError.validationError('Personal tenants cannot have invitations.', meta);
  },
} as const;
