/**
 * backend/src/shared/http/require-auth-context.ts
 *
 * WHY:
 * - Controllers must not duplicate "require auth" logic.
 * - Centralizes authContext validation to prevent drift across endpoints.
 *
 * RULES:
 * - HTTP-only helper (may depend on Fastify request typing).
 * - Must NOT touch storage or services.
 * - Throws AppError so error-handler maps it consistently.
 */

import type { FastifyRequest } from 'fastify';

import type { Claims } from './auth-context';
import { AppError } from './errors';

export type RequiredAuthContext = Readonly<{
  claims: Claims;
  userId: string;
  administrative: boolean;
}>;

/** no claims -> 401 "Authentication required" */
export function requireAuth(req: FastifyRequest): RequiredAuthContext {
  const ctx = req.authContext;
  if (!ctx || !ctx.claims || !ctx.userId) throw AppError.unauthorized('Authentication required');

  return {
    claims: ctx.claims,
    userId: ctx.userId,
    administrative: ctx.administrative,
  };
}
