/**
 * backend/src/shared/storage/storage.errors.ts
 *
 * WHY:
 * - Storage owns the semantics of "the backend said no" vs "the backend is gone".
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never put credentials or full URLs with userinfo in meta.
 */

import { AppError, type AppErrorMeta } from '../http/errors';

export const StorageErrors = {
  /** Transport failure, timeout or abort. Never retried by the core. */
  backendUnavailable(meta?: AppErrorMeta) {
    return AppError.backendUnavailable('Storage backend unavailable.', meta);
  },

  conflict(meta?: AppErrorMeta) {
    return AppError.conflict('Document update conflict.', meta);
  },

  requestRejected(meta?: AppErrorMeta) {
    return AppError.internal('Storage backend rejected the request.', meta);
  },

  unexpectedResponse(meta?: AppErrorMeta) {
    return AppError.internal('Unexpected storage backend response.', meta);
  },
} as const;
