/**
 * backend/src/modules/users/user.service.ts
 *
 * WHY:
 * - Read, update and delete for `__users` documents.
 * - `prepare*` methods validate and build the next document without writing it,
 *   so bulk writes can validate every op before the single `_bulk_docs` call.
 *
 * RULES:
 * - Access decisions come from the access control engine, never inline.
 * - A deleted or missing user is NOT_FOUND for every caller.
 * - No retries here (the virtual table handler owns the one retry).
 * - No cache writes here (the handler invalidates tenant context).
 */

import type { CallContext } from '../../shared/http/request-context';
import type { Logger } from '../../shared/logger/logger';
import { StorageErrors } from '../../shared/storage/storage.errors';
import { assertAllowed, assertWriteIsMutable } from '../access';
import { isTenantId } from '../identifiers';
import { isMember } from '../tenants/policies/tenant-access.policy';
import type { TenantDocument } from '../tenants/tenant.types';
import type { UserRepo } from './dal/user.repo';
import { UserErrors } from './user.errors';
import type { UserWrite } from './user.schemas';
import { USER_IMMUTABLE_KEYS, type UserDocument } from './user.types';
import { toUserView } from './user.view';

export type TenantLookup = {
  getById(id: string, opts?: CallContext): Promise<TenantDocument | null>;
};

export type PreparedUserUpdate = {
  before: UserDocument;
  after: UserDocument;
};

export type UserUpdateResult = {
  user: UserDocument;
  activeTenantChanged: boolean;
};

export class UserService {
  private readonly now: () => Date;

  constructor(
    private readonly deps: {
      userRepo: UserRepo;
      tenants: TenantLookup;
      logger: Logger;
      now?: () => Date;
    },
  ) {
    this.now = deps.now ?? (() => new Date());
  }

  /** Live user or NOT_FOUND. */
  async requireUser(userId: string, ctx: CallContext = {}): Promise<UserDocument> {
    const user = await this.deps.userRepo.getById(userId, ctx);
    if (!user || user.deleted) throw UserErrors.userNotFound({ userId });
    return user;
  }

  async get(requesterId: string, userId: string, ctx: CallContext = {}): Promise<UserDocument> {
    const user = await this.requireUser(userId, ctx);
    assertAllowed('read', requesterId, user);
    return user;
  }

  async prepareUpdate(
    requesterId: string,
    userId: string,
    write: UserWrite,
    ctx: CallContext = {},
  ): Promise<PreparedUserUpdate> {
    // ── 1. Load + access ──
    const before = await this.requireUser(userId, ctx);
    assertAllowed('update', requesterId, before);

    // ── 2. Immutable fields (compared against what the client was shown) ──
    assertWriteIsMutable(toUserView(before), write, USER_IMMUTABLE_KEYS);

    // ── 3. Optimistic concurrency ──
    if (write._rev !== undefined && write._rev !== before.rev) {
      throw StorageErrors.conflict({ id: userId, reason: 'stale_rev' });
    }

    // ── 4. activeTenantId must name a live tenant the user belongs to ──
    const nextActive = write.activeTenantId;
    if (nextActive !== undefined && nextActive !== null && nextActive !== before.activeTenantId) {
      await this.assertCanActivate(userId, nextActive, ctx);
    }

    // ── 5. Merge ──
    const after: UserDocument = {
      ...before,
      displayName: write.displayName !== undefined ? write.displayName : before.displayName,
      email: write.email !== undefined ? write.email : before.email,
      activeTenantId: nextActive !== undefined ? nextActive : before.activeTenantId,
      updatedAt: this.now().toISOString(),
    };

    return { before, after };
  }

  async update(
    requesterId: string,
    userId: string,
    write: UserWrite,
    ctx: CallContext = {},
  ): Promise<UserUpdateResult> {
    const { before, after } = await this.prepareUpdate(requesterId, userId, write, ctx);
    const saved = await this.deps.userRepo.save(after, ctx);

    this.deps.logger.info({
      msg: 'virtual.user.updated',
      flow: 'virtual.users',
      requestId: ctx.requestId,
      userId,
      rev: saved.rev,
    });

    return { user: saved, activeTenantChanged: before.activeTenantId !== saved.activeTenantId };
  }

  /** Returns the soft-deleted document to write. */
  async prepareDelete(
    requesterId: string,
    userId: string,
    opts: { administrative: boolean; rev?: string },
    ctx: CallContext = {},
  ): Promise<UserDocument> {
    const user = await this.requireUser(userId, ctx);

    if (requesterId === user.id) throw UserErrors.cannotDeleteSelf({ userId });
    assertAllowed('delete', requesterId, user, { administrative: opts.administrative });

    if (opts.rev !== undefined && opts.rev !== user.rev) {
      throw StorageErrors.conflict({ id: userId, reason: 'stale_rev' });
    }

    return { ...user, deleted: true, updatedAt: this.now().toISOString() };
  }

  async delete(
    requesterId: string,
    userId: string,
    opts: { administrative: boolean; rev?: string },
    ctx: CallContext = {},
  ): Promise<UserDocument> {
    const next = await this.prepareDelete(requesterId, userId, opts, ctx);
    const saved = await this.deps.userRepo.save(next, ctx);

    this.deps.logger.info({
      msg: 'virtual.user.deleted',
      flow: 'virtual.users',
      requestId: ctx.requestId,
      userId,
      requesterId,
    });

    return saved;
  }

  async findActiveInTenant(tenantId: string, ctx: CallContext = {}): Promise<UserDocument[]> {
    return this.deps.userRepo.findActiveInTenant(tenantId, ctx);
  }

  /**
   * Clears activeTenantId when it points at `tenantId` (membership revoked).
   * Returns true when a write happened.
   */
  async clearActiveTenant(userId: string, tenantId: string, ctx: CallContext = {}): Promise<boolean> {
    const user = await this.deps.userRepo.getById(userId, ctx);
    if (!user || user.deleted || user.activeTenantId !== tenantId) return false;

    await this.deps.userRepo.save(
      { ...user, activeTenantId: null, updatedAt: this.now().toISOString() },
      ctx,
    );
    return true;
  }

  private async assertCanActivate(userId: string, tenantId: string, ctx: CallContext): Promise<void> {
    if (!isTenantId(tenantId)) throw UserErrors.activeTenantNotAllowed({ userId, tenantId });

    const tenant = await this.deps.tenants.getById(tenantId, ctx);
    if (!tenant || tenant.deleted || !isMember(userId, tenant)) {
      throw UserErrors.activeTenantNotAllowed({ userId, tenantId });
    }
  }
}
