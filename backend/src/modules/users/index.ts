/**
 * backend/src/modules/users/index.ts
 *
 * WHY:
 * - Define the public surface of the users module.
 * - Prevent cross-module coupling via deep imports into /dal or /policies.
 *
 * RULES:
 * - Only export contracts other modules actually need.
 */

export { createUserModule } from './user.module';
export type { UserModule } from './user.module';
export { UserRepo, toStoredUser } from './dal/user.repo';
export type { UserChangeRow } from './dal/user.repo';
export { UserService } from './user.service';
export type { TenantLookup, UserUpdateResult } from './user.service';
export { UserErrors } from './user.errors';
export { UserBulkOpSchema, UserWriteSchema } from './user.schemas';
export type { UserBulkOp, UserWrite } from './user.schemas';
export { toUserView } from './user.view';
export type { NewUserDocument, UserDocument, UserView } from './user.types';
