/**
 * backend/src/modules/bootstrap/bootstrap.manager.ts
 *
 * WHY:
 * - First contact of a subject must leave behind exactly one user document and one
 *   personal tenant, even when several requests arrive at once.
 *
 * RULES:
 * - Create-if-absent everywhere; CONFLICT on create means "someone else won", re-fetch.
 * - The personal tenant id is derived from the user id, so racing bootstraps converge.
 * - The activeTenantId write is rev-checked. On CONFLICT, reuse whatever tenant a
 *   concurrent bootstrap already set; otherwise try once more.
 * - A soft-deleted user is refused (FORBIDDEN), never resurrected.
 */

import type { CallContext } from '../../shared/http/request-context';
import { isAppError } from '../../shared/http/errors';
import type { Logger } from '../../shared/logger/logger';
import { StorageErrors } from '../../shared/storage/storage.errors';
import { internalUserIdForSubject, personalTenantIdFor } from '../identifiers';
import type { TenantDocument, TenantRepo, TenantService } from '../tenants';
import { UserErrors, type UserDocument, type UserRepo } from '../users';
import type { BootstrapResult, BootstrapState } from './bootstrap.types';

const ACTIVATE_ATTEMPTS = 2;

export function bootstrapStateOf(user: UserDocument | null): BootstrapState {
  return user && !user.deleted && user.activeTenantId !== null ? 'Ready' : 'NeedsBootstrap';
}

export class BootstrapManager {
  private readonly now: () => Date;

  constructor(
    private readonly deps: {
      userRepo: UserRepo;
      tenantRepo: TenantRepo;
      tenantService: TenantService;
      logger: Logger;
      now?: () => Date;
    },
  ) {
    this.now = deps.now ?? (() => new Date());
  }

  async ensureReady(subject: string, ctx: CallContext = {}): Promise<BootstrapResult> {
    const userId = internalUserIdForSubject(subject);

    // ── 1. Resolve or create the user ──
    const user = await this.ensureUser(userId, subject, ctx);
    if (user.deleted) throw UserErrors.userDeactivated({ userId });

    if (bootstrapStateOf(user) === 'Ready' && user.activeTenantId !== null) {
      return { userId, activeTenantId: user.activeTenantId, bootstrapped: false };
    }

    this.deps.logger.info({
      msg: 'bootstrap.start',
      flow: 'bootstrap',
      requestId: ctx.requestId,
      userId,
    });

    // ── 2. Personal tenant ──
    const tenantId = personalTenantIdFor(userId);
    await this.ensurePersonalTenant(user, tenantId, ctx);

    // ── 3. Activate ──
    const activeTenantId = await this.activate(user, tenantId, ctx);

    this.deps.logger.info({
      msg: 'bootstrap.completed',
      flow: 'bootstrap',
      requestId: ctx.requestId,
      userId,
      activeTenantId,
    });

    return { userId, activeTenantId, bootstrapped: true };
  }

  private async ensureUser(userId: string, subject: string, ctx: CallContext): Promise<UserDocument> {
    const existing = await this.deps.userRepo.getById(userId, ctx);
    if (existing) return existing;

    const at = this.now().toISOString();
    const created = await this.deps.userRepo.create(
      {
        type: 'user',
        id: userId,
        subject,
        displayName: null,
        email: null,
        activeTenantId: null,
        personalTenantId: null,
        deleted: false,
        createdAt: at,
        updatedAt: at,
      },
      ctx,
    );

    if (created) {
      this.deps.logger.info({
        msg: 'bootstrap.user_created',
        flow: 'bootstrap',
        requestId: ctx.requestId,
        userId,
      });
      return created;
    }

    // Lost the create race: the winner's document is there now.
    const winner = await this.deps.userRepo.getById(userId, ctx);
    if (!winner) throw StorageErrors.conflict({ id: userId, reason: 'user_create_race' });
    return winner;
  }

  private async ensurePersonalTenant(
    user: UserDocument,
    tenantId: string,
    ctx: CallContext,
  ): Promise<TenantDocument> {
    const existing = await this.deps.tenantRepo.getById(tenantId, ctx);
    if (existing && !existing.deleted) return existing;
    if (existing) return this.restore(existing, user.id, ctx);

    const draft = this.deps.tenantService.buildNew(
      user.id,
      { name: 'Personal' },
      { id: tenantId, personal: true },
    );
    const created = await this.deps.tenantRepo.create(draft, ctx);

    if (created) {
      this.deps.logger.info({
        msg: 'bootstrap.tenant_created',
        flow: 'bootstrap',
        requestId: ctx.requestId,
        userId: user.id,
        tenantId,
      });
      return created;
    }

    const winner = await this.deps.tenantRepo.getById(tenantId, ctx);
    if (!winner) throw StorageErrors.conflict({ id: tenantId, reason: 'tenant_create_race' });
    return winner.deleted ? this.restore(winner, user.id, ctx) : winner;
  }

  /** A soft-deleted personal tenant comes back with its owner as the only member. */
  private async restore(tenant: TenantDocument, userId: string, ctx: CallContext): Promise<TenantDocument> {
    try {
      const restored = await this.deps.tenantRepo.save(
        {
          ...tenant,
          ownerId: userId,
          memberIds: [userId],
          deleted: false,
          updatedAt: this.now().toISOString(),
        },
        ctx,
      );

      this.deps.logger.info({
        msg: 'bootstrap.tenant_restored',
        flow: 'bootstrap',
        requestId: ctx.requestId,
        userId,
        tenantId: tenant.id,
      });
      return restored;
    } catch (err) {
      if (!isAppError(err, 'CONFLICT')) throw err;

      const current = await this.deps.tenantRepo.getById(tenant.id, ctx);
      if (!current || current.deleted) throw err;
      return current;
    }
  }

  private async activate(user: UserDocument, tenantId: string, ctx: CallContext): Promise<string> {
    let current = user;

    for (let attempt = 1; attempt <= ACTIVATE_ATTEMPTS; attempt += 1) {
      try {
        await this.deps.userRepo.save(
          {
            ...current,
            activeTenantId: tenantId,
            personalTenantId: tenantId,
            updatedAt: this.now().toISOString(),
          },
          ctx,
        );
        return tenantId;
      } catch (err) {
        if (!isAppError(err, 'CONFLICT')) throw err;

        const fresh = await this.deps.userRepo.getById(current.id, ctx);
        if (!fresh) throw err;
        if (fresh.deleted) throw UserErrors.userDeactivated({ userId: fresh.id });
        if (fresh.activeTenantId !== null) return fresh.activeTenantId;

        this.deps.logger.warn({
          msg: 'bootstrap.activate_conflict',
          flow: 'bootstrap',
          requestId: ctx.requestId,
          userId: current.id,
          attempt,
        });
        current = fresh;
      }
    }

    throw StorageErrors.conflict({ id: user.id, reason: 'activate_exhausted' });
  }
}
