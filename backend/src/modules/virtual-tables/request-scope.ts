/**
 * backend/src/modules/virtual-tables/request-scope.ts
 *
 * WHY:
 * - Every authenticated gateway request starts the same way: require auth, resolve the
 *   tenant context (bootstrapping on first contact), tell the client about it.
 * - Shared by the virtual table and invitation controllers.
 *
 * RULES:
 * - HTTP-only helper. No storage access of its own.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import type { Claims } from '../../shared/http/auth-context';
import { requireAuth } from '../../shared/http/require-auth-context';
import type { CallContext } from '../../shared/http/request-context';
import type { Requester, TenantContext } from './virtual-table.types';

export const TENANT_REFRESH_HEADER = 'x-tenant-context-refresh';
export const ACTIVE_TENANT_HEADER = 'x-active-tenant';

export interface TenantContextResolver {
  resolveTenantContext(claims: Claims, ctx?: CallContext): Promise<TenantContext>;
}

export type RequestScope = {
  requester: Requester;
  tenant: TenantContext;
  ctx: CallContext;
};

export async function beginRequest(
  resolver: TenantContextResolver,
  req: FastifyRequest,
  reply: FastifyReply,
): Promise<RequestScope> {
  const auth = requireAuth(req);
  const ctx: CallContext = {
    requestId: req.requestContext.requestId,
    signal: req.requestContext.signal,
  };

  const tenant = await resolver.resolveTenantContext(auth.claims, ctx);

  reply.header(ACTIVE_TENANT_HEADER, tenant.activeTenantId);
  if (tenant.bootstrapped) reply.header(TENANT_REFRESH_HEADER, 'true');

  return {
    requester: {
      userId: auth.userId,
      administrative: auth.administrative,
      activeTenantId: tenant.activeTenantId,
    },
    tenant,
    ctx,
  };
}
