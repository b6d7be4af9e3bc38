/**
 * backend/src/modules/users/user.view.ts
 *
 * WHY:
 * - Translate between stored user documents and what clients see.
 *
 * RULES:
 * - The only place a user `_id` is turned external.
 */

import { internalToExternal } from '../identifiers';
import type { UserDocument, UserView } from './user.types';

export function toUserView(user: UserDocument): UserView {
  return {
    _id: internalToExternal(user.id),
    _rev: user.rev,
    type: 'user',
    subject: user.subject,
    displayName: user.displayName,
    email: user.email,
    activeTenantId: user.activeTenantId,
    personalTenantId: user.personalTenantId,
    deleted: user.deleted,
    createdAt: user.createdAt,
    updatedAt: user.updatedAt,
  };
}
