/**
 * backend/src/modules/users/user.schemas.ts
 *
 * WHY:
 * - Shape validation for client writes to `__users`.
 *
 * RULES:
 * - `.strict()`: unknown keys are a VALIDATION_ERROR.
 * - Immutable keys are accepted here as `unknown` so the service can compare them
 *   against the stored value and report IMMUTABLE_FIELD instead.
 */

import { z } from 'zod';

export const UserWriteSchema = z
  .object({
    _id: z.unknown().optional(),
    _rev: z.string().min(1).optional(),
    type: z.unknown().optional(),
    subject: z.unknown().optional(),
    personalTenantId: z.unknown().optional(),
    deleted: z.unknown().optional(),
    createdAt: z.unknown().optional(),
    updatedAt: z.unknown().optional(),

    displayName: z.string().trim().min(1).max(200).nullable().optional(),
    email: z.string().trim().toLowerCase().email().max(320).nullable().optional(),
    activeTenantId: z.string().min(1).nullable().optional(),
  })
  .strict();

export type UserWrite = z.infer<typeof UserWriteSchema>;

/** `_bulk_docs` entry: a write that must name its document, optionally a delete. */
export const UserBulkOpSchema = UserWriteSchema.extend({
  _id: z.string().min(1),
  _deleted: z.boolean().optional(),
}).strict();

export type UserBulkOp = z.infer<typeof UserBulkOpSchema>;
