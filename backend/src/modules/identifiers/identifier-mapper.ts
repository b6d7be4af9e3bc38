/**
 * backend/src/modules/identifiers/identifier-mapper.ts
 *
 * WHY:
 * - Clients see opaque ids; storage sees namespaced ids (`user_<hex>`, `tenant_<uuid>`).
 * - One place owns both directions so the two can never drift.
 *
 * RULES:
 * - Pure functions. No I/O, no logging, never catches.
 * - External user id = sha256(subject) as 64 hex chars. Internal = `user_` + external.
 * - Tenant ids are the same on both sides (`tenant_<uuid>`). So are invitation ids (`invite_<uuid>`).
 * - Anything else -> IdentifierErrors.malformed.
 */

import { createHash, randomUUID } from 'node:crypto';

import { IdentifierErrors } from './identifier.errors';

export type Collection = 'user' | 'tenant';

export const USER_ID_PREFIX = 'user_';
export const TENANT_ID_PREFIX = 'tenant_';
export const INVITE_ID_PREFIX = 'invite_';

const USER_PAYLOAD_RE = /^[0-9a-f]{64}$/i;
const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/** Namespace for name-based personal tenant ids. Changing it orphans every personal tenant. */
const PERSONAL_TENANT_NAMESPACE = 'personal-tenant:';

function sha256Hex(input: string): string {
  return createHash('sha256').update(input, 'utf8').digest('hex');
}

export function isExternalUserId(value: string): boolean {
  return USER_PAYLOAD_RE.test(value);
}

export function isUserId(value: string): boolean {
  return value.startsWith(USER_ID_PREFIX) && USER_PAYLOAD_RE.test(value.slice(USER_ID_PREFIX.length));
}

export function isTenantId(value: string): boolean {
  return value.startsWith(TENANT_ID_PREFIX) && UUID_RE.test(value.slice(TENANT_ID_PREFIX.length));
}

export function isInviteId(value: string): boolean {
  return value.startsWith(INVITE_ID_PREFIX) && UUID_RE.test(value.slice(INVITE_ID_PREFIX.length));
}

/** One-way step from authenticator subject to external user id. */
export function userIdForSubject(subject: string): string {
  if (subject.length === 0) throw IdentifierErrors.emptySubject();
  return sha256Hex(subject);
}

/** Convenience: subject straight to the internal (stored) user id. */
export function internalUserIdForSubject(subject: string): string {
  return `${USER_ID_PREFIX}${userIdForSubject(subject)}`;
}

export function externalToInternal(collection: Collection, externalId: string): string {
  if (collection === 'user') {
    if (!isExternalUserId(externalId)) throw IdentifierErrors.malformed({ collection, id: externalId });
    return `${USER_ID_PREFIX}${externalId}`;
  }

  if (!isTenantId(externalId)) throw IdentifierErrors.malformed({ collection, id: externalId });
  return externalId;
}

export function internalToExternal(internalId: string): string {
  if (isUserId(internalId)) return internalId.slice(USER_ID_PREFIX.length);
  if (isTenantId(internalId)) return internalId;
  throw IdentifierErrors.malformed({ id: internalId });
}

export function collectionOf(internalId: string): Collection {
  if (isUserId(internalId)) return 'user';
  if (isTenantId(internalId)) return 'tenant';
  throw IdentifierErrors.malformed({ id: internalId });
}

/**
 * Deterministic (name-based, version 5 layout) tenant id for a user's personal tenant.
 * Concurrent bootstraps of the same user compute the same id and race on create-if-absent.
 */
export function personalTenantIdFor(userInternalId: string): string {
  if (!isUserId(userInternalId)) throw IdentifierErrors.malformed({ id: userInternalId });

  const bytes = createHash('sha256')
    .update(`${PERSONAL_TENANT_NAMESPACE}${userInternalId}`, 'utf8')
    .digest()
    .subarray(0, 16);

  bytes[6] = (bytes[6] & 0x0f) | 0x50;
  bytes[8] = (bytes[8] & 0x3f) | 0x80;

  const hex = bytes.toString('hex');
  const uuid = `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
  return `${TENANT_ID_PREFIX}${uuid}`;
}

export function newTenantId(): string {
  return `${TENANT_ID_PREFIX}${randomUUID()}`;
}

export function newInviteId(): string {
  return `${INVITE_ID_PREFIX}${randomUUID()}`;
}
