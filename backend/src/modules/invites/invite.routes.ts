/**
 * backend/src/modules/invites/invite.routes.ts
 *
 * WHY:
 * - Declares invitation endpoints.
 * - Keeps routing separate from controller logic.
 *
 * SECURITY:
 * - Tokens only in POST body (not URL/query).
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';

import type { InviteController } from './invite.controller';

export function registerInviteRoutes(app: FastifyInstance, controller: InviteController) {
  app.post('/__tenants/:id/invitations', controller.createInvite.bind(controller));
  app.get('/__tenants/:id/invitations', controller.listInvites.bind(controller));
  app.delete('/__tenants/:id/invitations/:inviteId', controller.revokeInvite.bind(controller));

  app.post('/__invitations/preview', controller.previewInvite.bind(controller));
  app.post('/__invitations/accept', controller.acceptInvite.bind(controller));
}
