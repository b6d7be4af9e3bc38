/**
 * backend/src/modules/invites/invite.module.ts
 *
 * WHY:
 * - Encapsulates Invites module wiring.
 * - DI creates infra; module composes domain units.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';

import type { Logger } from '../../shared/logger/logger';
import type { TokenHasher } from '../../shared/security/token-hasher';
import type { DocumentStore } from '../../shared/storage/document-store';
import type { TenantModule } from '../tenants';
import type { TenantContextResolver } from '../virtual-tables';
import { InviteRepo } from './dal/invite.repo';
import { InviteController } from './invite.controller';
import { registerInviteRoutes } from './invite.routes';
import { InviteService } from './invite.service';

export type InviteModule = ReturnType<typeof createInviteModule>;

export function createInviteModule(deps: {
  store: DocumentStore;
  tenants: TenantModule;
  contexts: TenantContextResolver;
  tokenHasher: TokenHasher;
  logger: Logger;
  ttlDays: number;
  now?: () => Date;
}) {
  const inviteRepo = new InviteRepo(deps.store, deps.logger);

  const inviteService = new InviteService({
    inviteRepo,
    tenantService: deps.tenants.tenantService,
    tokenHasher: deps.tokenHasher,
    logger: deps.logger,
    ttlDays: deps.ttlDays,
    now: deps.now,
  });

  const controller = new InviteController(inviteService, deps.contexts);

  return {
    inviteService,
    registerRoutes(app: FastifyInstance) {
      registerInviteRoutes(app, controller);
    },
  };
}
