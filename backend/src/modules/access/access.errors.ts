/**
 * backend/src/modules/access/access.errors.ts
 *
 * WHY:
 * - Shared denial semantics for both virtual collections.
 *
 * RULES:
 * - Messages never say whether the document exists beyond what the status already says.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export type AccessAction = 'read' | 'update' | 'delete';

export const AccessErrors = {
  denied(action: AccessAction, meta?: AppErrorMeta) {
    return AppError.forbidden(`Not allowed to ${action} this document.`, { ...meta, action });
  },

  immutableFields(fields: readonly string[], meta?: AppErrorMeta) {
    return AppError.immutableField(fields, meta);
  },
} as const;
