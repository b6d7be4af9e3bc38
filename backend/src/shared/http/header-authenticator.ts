/**
 * backend/src/shared/http/header-authenticator.ts
 *
 * WHY:
 * - Default Authenticator for deployments behind a proxy that has already verified
 *   the bearer token and forwards its claims as headers.
 *
 * RULES:
 * - Only trust these headers when the gateway is not reachable directly.
 * - Missing or blank subject -> unauthenticated.
 */

import type { FastifyRequest } from 'fastify';

import type { Authenticator, Claims } from './auth-context';

function readHeader(req: FastifyRequest, name: string): string | null {
  const raw = req.headers[name];
  const value = Array.isArray(raw) ? raw[0] : raw;
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

export class HeaderAuthenticator implements Authenticator {
  private readonly subjectHeader: string;
  private readonly issuerHeader: string;
  private readonly tenantHeader: string;

  constructor(prefix: string) {
    const p = prefix.toLowerCase();
    this.subjectHeader = `${p}subject`;
    this.issuerHeader = `${p}issuer`;
    this.tenantHeader = `${p}tenant`;
  }

  authenticate(req: FastifyRequest): Claims | null {
    const subject = readHeader(req, this.subjectHeader);
    if (!subject) return null;

    return {
      subject,
      issuer: readHeader(req, this.issuerHeader),
      tenantHint: readHeader(req, this.tenantHeader),
    };
  }
}
