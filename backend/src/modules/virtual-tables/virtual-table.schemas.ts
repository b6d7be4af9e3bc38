/**
 * backend/src/modules/virtual-tables/virtual-table.schemas.ts
 *
 * WHY:
 * - Request-level validation shared by both collections (bulk envelope, change feed query).
 *   Per-document schemas live with their module (users/tenants).
 */

import { z } from 'zod';

export const MAX_BULK_DOCS = 500;

export const BulkEnvelopeSchema = z
  .object({
    docs: z.array(z.unknown()).max(MAX_BULK_DOCS),
  })
  .strict();

export const ChangesQuerySchema = z.object({
  since: z.coerce.number().int().min(0).default(0),
});

export const DocParamsSchema = z.object({
  id: z.string().min(1),
});

export const MemberParamsSchema = z.object({
  id: z.string().min(1),
  userId: z.string().min(1),
});

export const RevQuerySchema = z.object({
  rev: z.string().min(1).optional(),
});
