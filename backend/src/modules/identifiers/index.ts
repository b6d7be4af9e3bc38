/**
 * backend/src/modules/identifiers/index.ts
 *
 * WHY:
 * - Public surface of the identifiers module.
 */

export {
  USER_ID_PREFIX,
  TENANT_ID_PREFIX,
  INVITE_ID_PREFIX,
  collectionOf,
  externalToInternal,
  internalToExternal,
  internalUserIdForSubject,
  isExternalUserId,
  isInviteId,
  isTenantId,
  isUserId,
  newInviteId,
  newTenantId,
  personalTenantIdFor,
  userIdForSubject,
} from './identifier-mapper';
export type { Collection } from './identifier-mapper';
