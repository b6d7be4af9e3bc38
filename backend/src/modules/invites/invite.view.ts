/**
 * backend/src/modules/invites/invite.view.ts
 *
 * WHY:
 * - Translate stored invitations to what tenant owners see (external user ids, no hash).
 */

import { internalToExternal } from '../identifiers';
import type { Invite, InviteView } from './invite.types';

export function toInviteView(invite: Invite): InviteView {
  return {
    _id: invite.id,
    _rev: invite.rev,
    type: 'invitation',
    tenantId: invite.tenantId,
    tenantName: invite.tenantName,
    email: invite.email,
    status: invite.status,
    createdBy: internalToExternal(invite.createdBy),
    createdAt: invite.createdAt,
    expiresAt: invite.expiresAt,
    acceptedAt: invite.acceptedAt,
    acceptedBy: invite.acceptedBy === null ? null : internalToExternal(invite.acceptedBy),
    revokedAt: invite.revokedAt,
  };
}
