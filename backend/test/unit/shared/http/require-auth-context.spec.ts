import { describe, it, expect } from 'vitest';
import type { FastifyRequest } from 'fastify';

import { AppError } from '../../../../src/shared/http/errors';
import { requireAuth } from '../../../../src/shared/http/require-auth-context';

function makeReq(authContext: unknown): FastifyRequest {
  return { authContext } as unknown as FastifyRequest;
}

describe('requireAuth', () => {
  it('throws 401 when no claims are present', () => {
    const unauthenticated = makeReq({ claims: null, userId: null, administrative: false });

    expect(() => requireAuth(unauthenticated)).toThrowError(AppError);

    try {
      requireAuth(unauthenticated);
    } catch (err) {
      expect(err).toBeInstanceOf(AppError);
      const e = err as AppError;
      expect(e.status).toBe(401);
      expect(e.code).toBe('UNAUTHORIZED');
      expect(e.message).toBe('Authentication required');
    }
  });

  it('throws 401 when the auth context was never attached', () => {
    expect(() => requireAuth(makeReq(null))).toThrowError('Authentication required');
  });

  it('returns claims, internal user id and the administrative flag', () => {
    const claims = { subject: 'auth0|alice', issuer: 'test-issuer', tenantHint: null };
    const req = makeReq({ claims, userId: 'user_abc', administrative: true });

    expect(requireAuth(req)).toEqual({ claims, userId: 'user_abc', administrative: true });
  });
});
