/**
 * backend/src/shared/storage/json.schemas.ts
 *
 * WHY:
 * - zod schemas for free-form JSON fields (tenant metadata) that keep the
 *   JsonValue type instead of widening to unknown.
 */

import { z } from 'zod';

import type { JsonObject, JsonValue } from './storage-backend';

const JsonPrimitiveSchema = z.union([z.string(), z.number().finite(), z.boolean(), z.null()]);

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([JsonPrimitiveSchema, z.array(JsonValueSchema), z.record(JsonValueSchema)]),
);

export const JsonObjectSchema: z.ZodType<JsonObject> = z.record(JsonValueSchema);
