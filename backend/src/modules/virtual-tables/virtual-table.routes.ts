/**
 * backend/src/modules/virtual-tables/virtual-table.routes.ts
 *
 * WHY:
 * - Declares the virtual collection endpoints (CouchDB-style paths).
 * - Keeps routing separate from controller logic.
 *
 * RULES:
 * - No business logic here.
 * - Static segments (`_changes`, `_bulk_docs`) are matched before `:id`.
 */

import type { FastifyInstance } from 'fastify';

import type { VirtualTableController } from './virtual-table.controller';

export function registerVirtualTableRoutes(app: FastifyInstance, controller: VirtualTableController) {
  app.get('/__session', controller.session.bind(controller));

  // __users
  app.get('/__users/_changes', controller.userChanges.bind(controller));
  app.post('/__users/_bulk_docs', controller.bulkUsers.bind(controller));
  app.get('/__users/:id', controller.getUser.bind(controller));
  app.put('/__users/:id', controller.updateUser.bind(controller));
  app.delete('/__users/:id', controller.deleteUser.bind(controller));

  // __tenants
  app.get('/__tenants', controller.listTenants.bind(controller));
  app.post('/__tenants', controller.createTenant.bind(controller));
  app.get('/__tenants/_changes', controller.tenantChanges.bind(controller));
  app.post('/__tenants/_bulk_docs', controller.bulkTenants.bind(controller));
  app.get('/__tenants/:id', controller.getTenant.bind(controller));
  app.put('/__tenants/:id', controller.updateTenant.bind(controller));
  app.delete('/__tenants/:id', controller.deleteTenant.bind(controller));
  app.put('/__tenants/:id/members/:userId', controller.addMember.bind(controller));
  app.delete('/__tenants/:id/members/:userId', controller.removeMember.bind(controller));
}
