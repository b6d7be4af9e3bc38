/**
 * backend/src/modules/virtual-tables/virtual-table.handler.ts
 *
 * WHY:
 * - Orchestrates identifiers, access control, bootstrap and storage for the
 *   `__users` and `__tenants` virtual collections.
 * - The HTTP layer calls only this class.
 *
 * RULES:
 * - External ids in, external ids out. Services only ever see internal ids.
 * - This is the ONLY place that retries: a CONFLICT on a single-document
 *   update/delete is retried once (re-fetch + re-validate). BACKEND_UNAVAILABLE never is.
 * - Bulk writes validate every op first, then apply the valid ones in one `_bulk_docs`.
 * - Writes that change whose active tenant a user is invalidate the tenant context cache.
 */

import type { z } from 'zod';

import type { Claims } from '../../shared/http/auth-context';
import { AppError, isAppError } from '../../shared/http/errors';
import type { CallContext } from '../../shared/http/request-context';
import type { Logger } from '../../shared/logger/logger';
import type { BulkResult } from '../../shared/storage/document-store';
import { isJsonObject } from '../../shared/storage/storage-backend';
import { canRead } from '../access';
import type { BootstrapManager, TenantContextCache } from '../bootstrap';
import { externalToInternal, internalToExternal, internalUserIdForSubject, isTenantId } from '../identifiers';
import {
  isMember,
  TenantBulkOpSchema,
  TenantCreateSchema,
  TenantWriteSchema,
  toTenantView,
  type NewTenantDocument,
  type TenantRepo,
  type TenantService,
  type TenantView,
} from '../tenants';
import {
  toUserView,
  UserBulkOpSchema,
  UserWriteSchema,
  type UserDocument,
  type UserRepo,
  type UserService,
  type UserView,
} from '../users';
import { BulkEnvelopeSchema } from './virtual-table.schemas';
import type {
  BulkOpFailure,
  BulkOpResult,
  Requester,
  TenantChanges,
  TenantContext,
  UserChanges,
  WriteAck,
} from './virtual-table.types';

type Planned<TDoc> = {
  index: number;
  doc: TDoc;
  /** Run after a successful write (cache invalidation). */
  after?: () => Promise<void>;
};

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw AppError.validationError('Invalid request body.', {
      issues: parsed.error.issues.map((i) => ({ path: i.path.join('.'), code: i.code })),
    });
  }
  return parsed.data;
}

function toFailure(id: string | null, err: AppError): BulkOpFailure {
  const failure: BulkOpFailure = { ok: false, id, error: err.code, reason: err.message };
  const fields = err.meta?.fields;
  if (err.code === 'IMMUTABLE_FIELD' && Array.isArray(fields)) {
    failure.fields = fields.filter((f): f is string => typeof f === 'string');
  }
  return failure;
}

function storageFailure(id: string, result: Extract<BulkResult, { ok: false }>): BulkOpFailure {
  switch (result.error) {
    case 'conflict':
      return { ok: false, id, error: 'CONFLICT', reason: 'Document update conflict.' };
    case 'not_found':
      return { ok: false, id, error: 'NOT_FOUND', reason: 'Document not found.' };
    case 'forbidden':
    case 'unauthorized':
      return { ok: false, id, error: 'FORBIDDEN', reason: 'Write rejected by storage.' };
    default:
      return { ok: false, id, error: 'INTERNAL', reason: 'Write failed.' };
  }
}

export class VirtualTableHandler {
  constructor(
    private readonly deps: {
      userService: UserService;
      userRepo: UserRepo;
      tenantService: TenantService;
      tenantRepo: TenantRepo;
      bootstrapManager: BootstrapManager;
      tenantContextCache: TenantContextCache;
      logger: Logger;
    },
  ) {}

  // ── Tenant context ──────────────────────────────────────

  /**
   * cache → user document → BootstrapManager; then a tenant hint, if it names a
   * tenant the user belongs to, overrides the stored active tenant.
   */
  async resolveTenantContext(claims: Claims, ctx: CallContext = {}): Promise<TenantContext> {
    const userId = internalUserIdForSubject(claims.subject);
    const base = await this.resolveActiveTenant(claims.subject, userId, ctx);

    const hint = claims.tenantHint;
    if (hint === null || hint === base.activeTenantId) return base;

    if (isTenantId(hint)) {
      const tenant = await this.deps.tenantRepo.getById(hint, ctx);
      if (tenant && !tenant.deleted && isMember(userId, tenant)) {
        return { ...base, activeTenantId: hint, source: 'hint' };
      }
    }

    this.deps.logger.warn({
      msg: 'virtual.tenant_hint_rejected',
      flow: 'virtual.context',
      requestId: ctx.requestId,
      userId,
      tenantHint: hint,
    });
    return base;
  }

  private async resolveActiveTenant(subject: string, userId: string, ctx: CallContext): Promise<TenantContext> {
    const cached = await this.deps.tenantContextCache.get(userId);
    if (cached !== null) {
      return { userId, activeTenantId: cached, bootstrapped: false, source: 'cache' };
    }

    const user = await this.deps.userRepo.getById(userId, ctx);
    if (user && !user.deleted && user.activeTenantId !== null) {
      await this.deps.tenantContextCache.set(userId, user.activeTenantId);
      return { userId, activeTenantId: user.activeTenantId, bootstrapped: false, source: 'document' };
    }

    const result = await this.deps.bootstrapManager.ensureReady(subject, ctx);
    await this.deps.tenantContextCache.set(userId, result.activeTenantId);
    return {
      userId,
      activeTenantId: result.activeTenantId,
      bootstrapped: result.bootstrapped,
      source: 'bootstrap',
    };
  }

  // ── __users ─────────────────────────────────────────────

  async getUser(requester: Requester, externalId: string, ctx: CallContext = {}): Promise<UserView> {
    const userId = externalToInternal('user', externalId);
    return toUserView(await this.deps.userService.get(requester.userId, userId, ctx));
  }

  async updateUser(
    requester: Requester,
    externalId: string,
    body: unknown,
    ctx: CallContext = {},
  ): Promise<WriteAck> {
    const userId = externalToInternal('user', externalId);
    const write = parseBody(UserWriteSchema, body);

    const result = await this.retryOnConflict('user.update', userId, ctx, () =>
      this.deps.userService.update(requester.userId, userId, write, ctx),
    );

    if (result.activeTenantChanged) await this.deps.tenantContextCache.invalidate(userId);
    return { ok: true, id: externalId, rev: result.user.rev };
  }

  async deleteUser(
    requester: Requester,
    externalId: string,
    rev: string | undefined,
    ctx: CallContext = {},
  ): Promise<WriteAck> {
    const userId = externalToInternal('user', externalId);

    const deleted = await this.retryOnConflict('user.delete', userId, ctx, () =>
      this.deps.userService.delete(
        requester.userId,
        userId,
        { administrative: requester.administrative, rev },
        ctx,
      ),
    );

    await this.deps.tenantContextCache.invalidate(userId);
    return { ok: true, id: externalId, rev: deleted.rev };
  }

  async userChanges(requester: Requester, since: number, ctx: CallContext = {}): Promise<UserChanges> {
    const { rows, lastSeq } = await this.deps.userRepo.changesSince(since, ctx);

    const results = rows.flatMap((row) =>
      row.user && canRead(requester.userId, row.user)
        ? [{ seq: row.seq, id: internalToExternal(row.user.id), rev: row.user.rev, doc: toUserView(row.user) }]
        : [],
    );

    return { results, lastSeq };
  }

  async bulkUsers(requester: Requester, body: unknown, ctx: CallContext = {}): Promise<BulkOpResult[]> {
    const { docs } = parseBody(BulkEnvelopeSchema, body);
    const results: BulkOpResult[] = new Array<BulkOpResult>(docs.length);
    const planned: Planned<UserDocument>[] = [];

    // ── 1. Validate every op ──
    for (const [index, raw] of docs.entries()) {
      const rawId = isJsonObject(raw) && typeof raw._id === 'string' ? raw._id : null;
      try {
        const op = parseBody(UserBulkOpSchema, raw);
        const userId = externalToInternal('user', op._id);

        if (op._deleted === true) {
          const doc = await this.deps.userService.prepareDelete(
            requester.userId,
            userId,
            { administrative: requester.administrative, rev: op._rev },
            ctx,
          );
          planned.push({ index, doc, after: () => this.deps.tenantContextCache.invalidate(userId) });
          continue;
        }

        const { _deleted: _flag, ...write } = op;
        const { before, after } = await this.deps.userService.prepareUpdate(requester.userId, userId, write, ctx);
        planned.push({
          index,
          doc: after,
          after:
            before.activeTenantId !== after.activeTenantId
              ? () => this.deps.tenantContextCache.invalidate(userId)
              : undefined,
        });
      } catch (err) {
        if (!isAppError(err)) throw err;
        results[index] = toFailure(rawId, err);
      }
    }

    // ── 2. Apply the valid ones in one round trip ──
    await this.applyBulk(
      planned,
      results,
      (items) => this.deps.userRepo.bulkSave(items.map((p) => p.doc), ctx),
      (p) => internalToExternal(p.doc.id),
    );

    this.logBulk('users', requester, results, ctx);
    return results;
  }

  // ── __tenants ───────────────────────────────────────────

  async listTenants(requester: Requester, ctx: CallContext = {}): Promise<TenantView[]> {
    const tenants = await this.deps.tenantService.list(requester.userId, ctx);
    return tenants.map(toTenantView);
  }

  async getTenant(requester: Requester, tenantId: string, ctx: CallContext = {}): Promise<TenantView> {
    const id = externalToInternal('tenant', tenantId);
    return toTenantView(await this.deps.tenantService.get(requester.userId, id, ctx));
  }

  async createTenant(requester: Requester, body: unknown, ctx: CallContext = {}): Promise<WriteAck> {
    const input = parseBody(TenantCreateSchema, body);
    const tenant = await this.deps.tenantService.create(requester.userId, input, ctx);
    return { ok: true, id: tenant.id, rev: tenant.rev };
  }

  async updateTenant(
    requester: Requester,
    tenantId: string,
    body: unknown,
    ctx: CallContext = {},
  ): Promise<WriteAck> {
    const id = externalToInternal('tenant', tenantId);
    const write = parseBody(TenantWriteSchema, body);

    const saved = await this.retryOnConflict('tenant.update', id, ctx, () =>
      this.deps.tenantService.update(requester.userId, id, write, ctx),
    );
    return { ok: true, id: saved.id, rev: saved.rev };
  }

  async deleteTenant(
    requester: Requester,
    tenantId: string,
    rev: string | undefined,
    ctx: CallContext = {},
  ): Promise<WriteAck> {
    const id = externalToInternal('tenant', tenantId);

    const deleted = await this.retryOnConflict('tenant.delete', id, ctx, async () => {
      const activeUserIds = await this.activeUserIds(id, requester, ctx);
      return this.deps.tenantService.delete(requester.userId, id, { activeUserIds, rev }, ctx);
    });
    return { ok: true, id: deleted.id, rev: deleted.rev };
  }

  async addMember(
    requester: Requester,
    tenantId: string,
    memberExternalId: string,
    ctx: CallContext = {},
  ): Promise<TenantView> {
    const id = externalToInternal('tenant', tenantId);
    const memberId = externalToInternal('user', memberExternalId);

    await this.deps.userService.requireUser(memberId, ctx);

    const saved = await this.retryOnConflict('tenant.add_member', id, ctx, () =>
      this.deps.tenantService.addMember(requester.userId, id, memberId, ctx),
    );
    return toTenantView(saved);
  }

  /** A removed member whose active tenant was this one is sent back through bootstrap. */
  async removeMember(
    requester: Requester,
    tenantId: string,
    memberExternalId: string,
    ctx: CallContext = {},
  ): Promise<TenantView> {
    const id = externalToInternal('tenant', tenantId);
    const memberId = externalToInternal('user', memberExternalId);

    const saved = await this.retryOnConflict('tenant.remove_member', id, ctx, () =>
      this.deps.tenantService.removeMember(requester.userId, id, memberId, ctx),
    );

    try {
      await this.retryOnConflict('user.clear_active_tenant', memberId, ctx, () =>
        this.deps.userService.clearActiveTenant(memberId, id, ctx),
      );
    } catch (err) {
      // Membership is already gone; the member's stored activeTenantId may still name the tenant.
      this.deps.logger.error({
        msg: 'virtual.tenant.member_removal_incomplete',
        flow: 'virtual.tenants',
        requestId: ctx.requestId,
        tenantId: id,
        memberId,
        err,
      });
      throw err;
    } finally {
      await this.deps.tenantContextCache.invalidate(memberId);
    }

    return toTenantView(saved);
  }

  async tenantChanges(requester: Requester, since: number, ctx: CallContext = {}): Promise<TenantChanges> {
    const { rows, lastSeq } = await this.deps.tenantRepo.changesSince(since, ctx);

    const results = rows.flatMap((row) =>
      row.tenant && canRead(requester.userId, row.tenant)
        ? [{ seq: row.seq, id: row.tenant.id, rev: row.tenant.rev, doc: toTenantView(row.tenant) }]
        : [],
    );

    return { results, lastSeq };
  }

  /** Ops without `_id` create, `_deleted: true` deletes, anything else updates. */
  async bulkTenants(requester: Requester, body: unknown, ctx: CallContext = {}): Promise<BulkOpResult[]> {
    const { docs } = parseBody(BulkEnvelopeSchema, body);
    const results: BulkOpResult[] = new Array<BulkOpResult>(docs.length);
    const planned: Planned<NewTenantDocument & { rev?: string }>[] = [];

    // ── 1. Validate every op ──
    for (const [index, raw] of docs.entries()) {
      const rawId = isJsonObject(raw) && typeof raw._id === 'string' ? raw._id : null;
      try {
        const hasId = isJsonObject(raw) && raw._id !== undefined;
        if (!hasId) {
          const input = parseBody(TenantCreateSchema, raw);
          planned.push({ index, doc: this.deps.tenantService.buildNew(requester.userId, input) });
          continue;
        }

        const op = parseBody(TenantBulkOpSchema, raw);
        const id = externalToInternal('tenant', op._id ?? '');

        if (op._deleted === true) {
          const activeUserIds = await this.activeUserIds(id, requester, ctx);
          const doc = await this.deps.tenantService.prepareDelete(
            requester.userId,
            id,
            { activeUserIds, rev: op._rev },
            ctx,
          );
          planned.push({ index, doc });
          continue;
        }

        const { _deleted: _flag, ...write } = op;
        const { after } = await this.deps.tenantService.prepareUpdate(requester.userId, id, write, ctx);
        planned.push({ index, doc: after });
      } catch (err) {
        if (!isAppError(err)) throw err;
        results[index] = toFailure(rawId, err);
      }
    }

    // ── 2. Apply the valid ones in one round trip ──
    await this.applyBulk(
      planned,
      results,
      (items) => this.deps.tenantRepo.bulkSave(items.map((p) => p.doc), ctx),
      (p) => p.doc.id,
    );

    this.logBulk('tenants', requester, results, ctx);
    return results;
  }

  // ── internals ───────────────────────────────────────────

  /**
   * Users working inside `tenantId`: stored activeTenantId, plus the requester when this
   * request's resolved context (a tenant hint included) is that tenant.
   */
  private async activeUserIds(tenantId: string, requester: Requester, ctx: CallContext): Promise<string[]> {
    const users = await this.deps.userService.findActiveInTenant(tenantId, ctx);
    const ids = users.map((u) => u.id);
    if (requester.activeTenantId === tenantId && !ids.includes(requester.userId)) ids.push(requester.userId);
    return ids;
  }

  private async applyBulk<TDoc>(
    planned: Planned<TDoc>[],
    results: BulkOpResult[],
    write: (items: Planned<TDoc>[]) => Promise<BulkResult[]>,
    externalIdOf: (item: Planned<TDoc>) => string,
  ): Promise<void> {
    if (planned.length === 0) return;

    const written = await write(planned);

    for (const [i, item] of planned.entries()) {
      const outcome = written[i];
      const id = externalIdOf(item);

      if (!outcome) {
        results[item.index] = { ok: false, id, error: 'INTERNAL', reason: 'Write failed.' };
        continue;
      }
      if (!outcome.ok) {
        results[item.index] = storageFailure(id, outcome);
        continue;
      }

      results[item.index] = { ok: true, id, rev: outcome.rev };
      if (item.after) await item.after();
    }
  }

  private async retryOnConflict<T>(
    op: string,
    id: string,
    ctx: CallContext,
    fn: () => Promise<T>,
  ): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (!isAppError(err, 'CONFLICT')) throw err;

      this.deps.logger.warn({
        msg: 'virtual.conflict_retry',
        flow: 'virtual.write',
        requestId: ctx.requestId,
        op,
        id,
      });
      return fn();
    }
  }

  private logBulk(collection: string, requester: Requester, results: BulkOpResult[], ctx: CallContext): void {
    const failed = results.filter((r) => !r.ok).length;
    this.deps.logger.info({
      msg: 'virtual.bulk_write',
      flow: `virtual.${collection}`,
      requestId: ctx.requestId,
      userId: requester.userId,
      total: results.length,
      failed,
    });
  }
}
