/**
 * backend/src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the `__users` virtual collection.
 * - Users are global identities keyed by a hash of the authenticator subject.
 *
 * RULES:
 * - `id` is always the INTERNAL id (`user_<hex>`). External ids exist only at the HTTP edge.
 * - Clients change displayName, email and activeTenantId; everything else is fixed.
 */

export type UserId = string;

export type UserDocument = {
  type: 'user';
  id: UserId;
  rev: string;

  subject: string;
  displayName: string | null;
  email: string | null;

  activeTenantId: string | null;
  personalTenantId: string | null;

  deleted: boolean;
  createdAt: string;
  updatedAt: string;
};

/** A user that has not been written yet. */
export type NewUserDocument = Omit<UserDocument, 'rev'>;

/** Wire keys clients may echo but never change. `_rev` is checked separately. */
export const USER_IMMUTABLE_KEYS = [
  '_id',
  'type',
  'subject',
  'personalTenantId',
  'deleted',
  'createdAt',
  'updatedAt',
] as const;

/** What clients see: external `_id`, CouchDB-style meta fields. */
export type UserView = {
  _id: string;
  _rev: string;
  type: 'user';
  subject: string;
  displayName: string | null;
  email: string | null;
  activeTenantId: string | null;
  personalTenantId: string | null;
  deleted: boolean;
  createdAt: string;
  updatedAt: string;
};
