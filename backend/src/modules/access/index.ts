/**
 * backend/src/modules/access/index.ts
 *
 * WHY:
 * - Public surface of the access control engine.
 */

export {
  assertAllowed,
  assertWriteIsMutable,
  canDelete,
  canRead,
  canUpdate,
  findImmutableFields,
} from './access-control';
export { AccessErrors } from './access.errors';
export type { AccessAction } from './access.errors';
export type { DeleteContext, GatewayDocument } from './access.types';
