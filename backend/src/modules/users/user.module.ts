/**
 * backend/src/modules/users/user.module.ts
 *
 * WHY:
 * - Encapsulates Users module wiring.
 * - Users have no routes of their own; the virtual tables module serves them.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { Logger } from '../../shared/logger/logger';
import type { DocumentStore } from '../../shared/storage/document-store';
import { UserRepo } from './dal/user.repo';
import { UserService, type TenantLookup } from './user.service';

export type UserModule = ReturnType<typeof createUserModule>;

export function createUserModule(deps: {
  store: DocumentStore;
  tenants: TenantLookup;
  logger: Logger;
  now?: () => Date;
}) {
  const userRepo = new UserRepo(deps.store, deps.logger);
  const userService = new UserService({
    userRepo,
    tenants: deps.tenants,
    logger: deps.logger,
    now: deps.now,
  });

  return {
    userRepo,
    userService,
  };
}
