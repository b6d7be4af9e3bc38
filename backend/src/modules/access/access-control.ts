/**
 * backend/src/modules/access/access-control.ts
 *
 * WHY:
 * - Single entrypoint for "may this requester do X to this document".
 * - Dispatches on the document's `type` to the per-collection policies.
 *
 * RULES:
 * - Pure. No I/O, no logging, never catches.
 * - Deleted documents are never readable, updatable or deletable.
 * - The switch is exhaustive: adding a document type must fail compilation here.
 */

import { isDeepStrictEqual } from 'node:util';

import { canDeleteTenant, canReadTenant, canUpdateTenant } from '../tenants/policies/tenant-access.policy';
import { canDeleteUser, canReadUser, canUpdateUser } from '../users/policies/user-access.policy';
import { AccessErrors, type AccessAction } from './access.errors';
import type { DeleteContext, GatewayDocument } from './access.types';

function assertNever(value: never): never {
  throw new Error(`Unhandled document type: ${JSON.stringify(value)}`);
}

export function canRead(requesterId: string, doc: GatewayDocument): boolean {
  switch (doc.type) {
    case 'user':
      return canReadUser(requesterId, doc);
    case 'tenant':
      return canReadTenant(requesterId, doc);
    default:
      return assertNever(doc);
  }
}

export function canUpdate(requesterId: string, doc: GatewayDocument): boolean {
  switch (doc.type) {
    case 'user':
      return canUpdateUser(requesterId, doc);
    case 'tenant':
      return canUpdateTenant(requesterId, doc);
    default:
      return assertNever(doc);
  }
}

export function canDelete(requesterId: string, doc: GatewayDocument, ctx: DeleteContext = {}): boolean {
  switch (doc.type) {
    case 'user':
      return canDeleteUser(requesterId, doc, ctx);
    case 'tenant':
      return canDeleteTenant(requesterId, doc, ctx);
    default:
      return assertNever(doc);
  }
}

const CHECKS: Record<AccessAction, (requesterId: string, doc: GatewayDocument, ctx: DeleteContext) => boolean> = {
  read: (requesterId, doc) => canRead(requesterId, doc),
  update: (requesterId, doc) => canUpdate(requesterId, doc),
  delete: canDelete,
};

export function assertAllowed(
  action: AccessAction,
  requesterId: string,
  doc: GatewayDocument,
  ctx: DeleteContext = {},
): void {
  if (!CHECKS[action](requesterId, doc, ctx)) {
    throw AccessErrors.denied(action, { collection: doc.type, id: doc.id });
  }
}

/**
 * Immutable keys the write carries with a value different from the stored one.
 * Echoing the stored value back is accepted.
 */
export function findImmutableFields(
  stored: Readonly<Record<string, unknown>>,
  write: Readonly<Record<string, unknown>>,
  immutableKeys: readonly string[],
): string[] {
  return immutableKeys.filter(
    (key) => Object.prototype.hasOwnProperty.call(write, key) && !isDeepStrictEqual(write[key], stored[key]),
  );
}

/** Rejects the whole write when any immutable key changes. */
export function assertWriteIsMutable(
  stored: Readonly<Record<string, unknown>>,
  write: Readonly<Record<string, unknown>>,
  immutableKeys: readonly string[],
): void {
  const fields = findImmutableFields(stored, write, immutableKeys);
  if (fields.length > 0) throw AccessErrors.immutableFields(fields);
}
