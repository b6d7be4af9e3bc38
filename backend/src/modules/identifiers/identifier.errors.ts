/**
 * backend/src/modules/identifiers/identifier.errors.ts
 *
 * WHY:
 * - Identifier parsing owns the meaning of "this id is not one of ours".
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Meta may carry the offending id (ids are not secrets) but never the subject.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const IdentifierErrors = {
  malformed(meta?: AppErrorMeta) {
    return AppError.malformedIdentifier('Malformed identifier.', meta);
  },

  emptySubject() {
    return AppError.malformedIdentifier('Subject must not be empty.');
  },
} as const;
