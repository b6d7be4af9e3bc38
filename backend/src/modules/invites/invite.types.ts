/**
 * backend/src/modules/invites/invite.types.ts
 *
 * WHY:
 * - Domain types for tenant invitations.
 * - The repo shapes stored documents into these types (keeps CouchDB field names in the DAL).
 *
 * RULES:
 * - Only the token HASH is ever stored. The raw token exists in the create response and nowhere else.
 * - `tenantId`, `createdBy` and `acceptedBy` hold INTERNAL ids.
 * - Expiry is not a status: a PENDING invite past `expiresAt` is simply unusable.
 */

export const INVITE_STATUSES = ['PENDING', 'ACCEPTED', 'REVOKED'] as const;

export type InviteStatus = (typeof INVITE_STATUSES)[number];

export type InviteId = string;

export type Invite = {
  type: 'invitation';
  id: InviteId;
  rev: string;

  tenantId: string;
  /** Denormalized so a preview needs no tenant read access. */
  tenantName: string;
  email: string | null;

  status: InviteStatus;
  tokenHash: string;

  createdBy: string;
  createdAt: string;
  expiresAt: string;

  acceptedAt: string | null;
  acceptedBy: string | null;
  revokedAt: string | null;
};

export type NewInvite = Omit<Invite, 'rev'>;

/** What the tenant owner sees. No token, no hash. */
export type InviteView = {
  _id: string;
  _rev: string;
  type: 'invitation';
  tenantId: string;
  tenantName: string;
  email: string | null;
  status: InviteStatus;
  createdBy: string;
  createdAt: string;
  expiresAt: string;
  acceptedAt: string | null;
  acceptedBy: string | null;
  revokedAt: string | null;
};

/** Create response: the only time the raw token leaves the server. */
export type CreatedInvite = InviteView & { token: string };

export type InvitePreview = {
  tenantId: string;
  tenantName: string;
  expiresAt: string;
};

export type AcceptedInvite = {
  ok: true;
  inviteId: string;
  tenantId: string;
  tenantName: string;
};
