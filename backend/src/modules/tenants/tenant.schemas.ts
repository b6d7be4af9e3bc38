/**
 * backend/src/modules/tenants/tenant.schemas.ts
 *
 * WHY:
 * - Shape validation for client writes to `__tenants`.
 *
 * RULES:
 * - `.strict()`: unknown keys are a VALIDATION_ERROR.
 * - Updates accept immutable keys as `unknown` so they can be compared to the stored
 *   document (IMMUTABLE_FIELD). Creates do not accept them at all.
 */

import { z } from 'zod';

import { JsonObjectSchema } from '../../shared/storage/json.schemas';

const nameSchema = z.string().trim().min(1).max(200);

export const TenantCreateSchema = z
  .object({
    name: nameSchema,
    metadata: JsonObjectSchema.optional(),
  })
  .strict();

export type TenantCreate = z.infer<typeof TenantCreateSchema>;

export const TenantWriteSchema = z
  .object({
    _id: z.unknown().optional(),
    _rev: z.string().min(1).optional(),
    type: z.unknown().optional(),
    ownerId: z.unknown().optional(),
    memberIds: z.unknown().optional(),
    personal: z.unknown().optional(),
    deleted: z.unknown().optional(),
    createdAt: z.unknown().optional(),
    updatedAt: z.unknown().optional(),

    name: nameSchema.optional(),
    metadata: JsonObjectSchema.optional(),
  })
  .strict();

export type TenantWrite = z.infer<typeof TenantWriteSchema>;

/** `_bulk_docs` entry: no `_id` means create, `_deleted: true` means delete. */
export const TenantBulkOpSchema = TenantWriteSchema.extend({
  _id: z.string().min(1).optional(),
  _deleted: z.boolean().optional(),
}).strict();

export type TenantBulkOp = z.infer<typeof TenantBulkOpSchema>;
