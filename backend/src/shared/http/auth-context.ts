/**
 * backend/src/shared/http/auth-context.ts
 *
 * WHY:
 * - Authentication and access are separate concepts.
 * - Token verification happens upstream (verifying proxy / JWKS); the gateway only
 *   consumes the resulting Claims through an Authenticator.
 *
 * HOW IT WORKS:
 * 1. registerAuthContext() runs the Authenticator on every request.
 * 2. Valid claims -> authContext carries claims + internal userId.
 * 3. No claims -> all fields null (unauthenticated request).
 * 4. Controllers read req.authContext via requireAuth().
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';

import { internalUserIdForSubject } from '../../modules/identifiers';

export type Claims = {
  subject: string;
  issuer: string | null;
  /** Tenant the client believes it is working in (validated for membership before use). */
  tenantHint: string | null;
};

export interface Authenticator {
  authenticate(req: FastifyRequest): Claims | null;
}

export type AuthContext = {
  claims: Claims | null;
  /** Internal user id (`user_<sha256(subject)>`). */
  userId: string | null;
  /** Subject listed in ADMIN_SUBJECTS. */
  administrative: boolean;
};

declare module 'fastify' {
  interface FastifyRequest {
    authContext: AuthContext;
  }
}

export type AuthContextOptions = {
  authenticator: Authenticator;
  adminSubjects: readonly string[];
};

export function registerAuthContext(app: FastifyInstance, opts: AuthContextOptions) {
  const admins = new Set(opts.adminSubjects);

  app.decorateRequest('authContext', null);

  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    const claims = opts.authenticator.authenticate(req);

    req.authContext = claims
      ? {
          claims,
          userId: internalUserIdForSubject(claims.subject),
          administrative: admins.has(claims.subject),
        }
      : { claims: null, userId: null, administrative: false };

    done();
  });
}
