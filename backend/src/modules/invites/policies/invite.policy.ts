/**
 * backend/src/modules/invites/policies/invite.policy.ts
 *
 * WHY:
 * - Invite usability rules in one place, shared by preview and accept.
 *
 * RULES:
 * - Pure functions only.
 * - Throws module-level InviteErrors.
 * - Pass "now" for deterministic tests.
 */

import { InviteErrors } from '../invite.errors';
import type { Invite } from '../invite.types';

export function assertInviteExists(invite: Invite | null): asserts invite is Invite {
  if (!invite) throw InviteErrors.inviteNotFound();
}

export function assertInviteIsPending(invite: Invite): void {
  if (invite.status === 'PENDING') return;
  if (invite.status === 'ACCEPTED') {
    throw InviteErrors.inviteAlreadyAccepted({ inviteId: invite.id });
  }
  throw InviteErrors.inviteNotPending({ inviteId: invite.id, status: invite.status });
}

export function assertInviteNotExpired(invite: Invite, now = new Date()): void {
  if (Date.parse(invite.expiresAt) <= now.getTime()) {
    throw InviteErrors.inviteExpired({ inviteId: invite.id });
  }
}

export function assertInviteBelongsToTenant(invite: Invite, tenantId: string): void {
  if (invite.tenantId !== tenantId) {
    throw InviteErrors.tenantMismatch({ inviteId: invite.id });
  }
}

/** Pending and not expired. */
export function assertInviteUsable(invite: Invite, now: Date): void {
  assertInviteIsPending(invite);
  assertInviteNotExpired(invite, now);
}
