/**
 * backend/src/modules/invites/invite.schemas.ts
 *
 * WHY:
 * - Request validation for the invitation endpoints.
 *
 * RULES:
 * - Never accept invite tokens in query params or URL paths (tokens leak into logs).
 */

import { z } from 'zod';

import { INVITE_STATUSES } from './invite.types';

export const MAX_INVITE_TTL_DAYS = 90;

export const CreateInviteSchema = z
  .object({
    email: z.string().trim().toLowerCase().email().max(320).optional(),
    expiresInDays: z.number().int().min(1).max(MAX_INVITE_TTL_DAYS).optional(),
  })
  .strict();

export type CreateInviteInput = z.infer<typeof CreateInviteSchema>;

export const InviteTokenSchema = z
  .object({
    token: z.string().min(20, 'Invalid invite token').max(256),
  })
  .strict();

export type InviteTokenInput = z.infer<typeof InviteTokenSchema>;

export const ListInvitesQuerySchema = z.object({
  status: z.enum(INVITE_STATUSES).optional(),
});

export const TenantInviteParamsSchema = z.object({
  id: z.string().min(1),
});

export const InviteParamsSchema = z.object({
  id: z.string().min(1),
  inviteId: z.string().min(1),
});
