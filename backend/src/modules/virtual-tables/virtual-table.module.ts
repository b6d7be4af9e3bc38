/**
 * backend/src/modules/virtual-tables/virtual-table.module.ts
 *
 * WHY:
 * - Encapsulates virtual tables wiring: handler + controller + routes.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';

import type { Logger } from '../../shared/logger/logger';
import type { BootstrapModule } from '../bootstrap';
import type { TenantModule } from '../tenants';
import type { UserModule } from '../users';
import { VirtualTableController } from './virtual-table.controller';
import { VirtualTableHandler } from './virtual-table.handler';
import { registerVirtualTableRoutes } from './virtual-table.routes';

export type VirtualTableModule = ReturnType<typeof createVirtualTableModule>;

export function createVirtualTableModule(deps: {
  users: UserModule;
  tenants: TenantModule;
  bootstrap: BootstrapModule;
  logger: Logger;
}) {
  const handler = new VirtualTableHandler({
    userService: deps.users.userService,
    userRepo: deps.users.userRepo,
    tenantService: deps.tenants.tenantService,
    tenantRepo: deps.tenants.tenantRepo,
    bootstrapManager: deps.bootstrap.bootstrapManager,
    tenantContextCache: deps.bootstrap.tenantContextCache,
    logger: deps.logger,
  });

  const controller = new VirtualTableController(handler);

  return {
    handler,
    registerRoutes(app: FastifyInstance) {
      registerVirtualTableRoutes(app, controller);
    },
  };
}
