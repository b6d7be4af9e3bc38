/**
 * backend/src/modules/users/policies/user-access.policy.ts
 *
 * WHY:
 * - Who may read, change or delete a user document.
 *
 * RULES:
 * - Pure functions only (no I/O).
 * - A user reads and updates only their own document.
 * - Nobody deletes themselves; deleting anyone else needs the administrative capability.
 */

import type { DeleteContext } from '../../access/access.types';
import type { UserDocument } from '../user.types';

export function canReadUser(requesterId: string, user: UserDocument): boolean {
  return !user.deleted && requesterId === user.id;
}

export function canUpdateUser(requesterId: string, user: UserDocument): boolean {
  return !user.deleted && requesterId === user.id;
}

export function canDeleteUser(requesterId: string, user: UserDocument, ctx: DeleteContext): boolean {
  if (user.deleted) return false;
  if (requesterId === user.id) return false;
  return ctx.administrative === true;
}
