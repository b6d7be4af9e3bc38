/**
 * backend/src/modules/tenants/tenant.service.ts
 *
 * WHY:
 * - CRUD, listing and membership changes for `__tenants` documents.
 * - `prepare*` methods validate and build the next document without writing,
 *   so bulk writes can validate every op up front.
 *
 * RULES:
 * - ownerId is always a member. Nothing here can produce a tenant violating that.
 * - Membership only changes through addMember/removeMember.
 * - Whether a tenant is "in use" is decided by the caller (it needs user documents);
 *   this service only receives the ids.
 * - No retries here.
 */

import type { CallContext } from '../../shared/http/request-context';
import type { Logger } from '../../shared/logger/logger';
import { StorageErrors } from '../../shared/storage/storage.errors';
import { AccessErrors, assertAllowed, assertWriteIsMutable } from '../access';
import { newTenantId } from '../identifiers';
import type { TenantRepo } from './dal/tenant.repo';
import { canUpdateTenant, isMember, isTenantInUse } from './policies/tenant-access.policy';
import { TenantErrors } from './tenant.errors';
import type { TenantCreate, TenantWrite } from './tenant.schemas';
import { TENANT_IMMUTABLE_KEYS, type NewTenantDocument, type TenantDocument } from './tenant.types';
import { toTenantView } from './tenant.view';

export type PreparedTenantUpdate = {
  before: TenantDocument;
  after: TenantDocument;
};

export class TenantService {
  private readonly now: () => Date;

  constructor(
    private readonly deps: {
      tenantRepo: TenantRepo;
      logger: Logger;
      now?: () => Date;
    },
  ) {
    this.now = deps.now ?? (() => new Date());
  }

  /** Live tenant or NOT_FOUND. */
  async requireTenant(tenantId: string, ctx: CallContext = {}): Promise<TenantDocument> {
    const tenant = await this.deps.tenantRepo.getById(tenantId, ctx);
    if (!tenant || tenant.deleted) throw TenantErrors.tenantNotFound({ tenantId });
    return tenant;
  }

  async get(requesterId: string, tenantId: string, ctx: CallContext = {}): Promise<TenantDocument> {
    const tenant = await this.requireTenant(tenantId, ctx);
    assertAllowed('read', requesterId, tenant);
    return tenant;
  }

  async list(requesterId: string, ctx: CallContext = {}): Promise<TenantDocument[]> {
    return this.deps.tenantRepo.listForMember(requesterId, ctx);
  }

  /** Requester becomes owner and sole member. */
  buildNew(
    requesterId: string,
    input: TenantCreate,
    opts: { id?: string; personal?: boolean } = {},
  ): NewTenantDocument {
    const at = this.now().toISOString();
    return {
      type: 'tenant',
      id: opts.id ?? newTenantId(),
      ownerId: requesterId,
      memberIds: [requesterId],
      name: input.name,
      metadata: input.metadata ?? {},
      personal: opts.personal ?? false,
      deleted: false,
      createdAt: at,
      updatedAt: at,
    };
  }

  async create(requesterId: string, input: TenantCreate, ctx: CallContext = {}): Promise<TenantDocument> {
    const draft = this.buildNew(requesterId, input);
    const created = await this.deps.tenantRepo.create(draft, ctx);
    if (!created) throw StorageErrors.conflict({ id: draft.id, reason: 'id_taken' });

    this.deps.logger.info({
      msg: 'virtual.tenant.created',
      flow: 'virtual.tenants',
      requestId: ctx.requestId,
      tenantId: created.id,
      ownerId: requesterId,
    });

    return created;
  }

  async prepareUpdate(
    requesterId: string,
    tenantId: string,
    write: TenantWrite,
    ctx: CallContext = {},
  ): Promise<PreparedTenantUpdate> {
    // ── 1. Load + access ──
    const before = await this.requireTenant(tenantId, ctx);
    assertAllowed('update', requesterId, before);

    // ── 2. Immutable fields ──
    assertWriteIsMutable(toTenantView(before), write, TENANT_IMMUTABLE_KEYS);

    // ── 3. Optimistic concurrency ──
    if (write._rev !== undefined && write._rev !== before.rev) {
      throw StorageErrors.conflict({ id: tenantId, reason: 'stale_rev' });
    }

    // ── 4. Merge ──
    const after: TenantDocument = {
      ...before,
      name: write.name ?? before.name,
      metadata: write.metadata ?? before.metadata,
      updatedAt: this.now().toISOString(),
    };

    return { before, after };
  }

  async update(
    requesterId: string,
    tenantId: string,
    write: TenantWrite,
    ctx: CallContext = {},
  ): Promise<TenantDocument> {
    const { after } = await this.prepareUpdate(requesterId, tenantId, write, ctx);
    const saved = await this.deps.tenantRepo.save(after, ctx);

    this.deps.logger.info({
      msg: 'virtual.tenant.updated',
      flow: 'virtual.tenants',
      requestId: ctx.requestId,
      tenantId,
      rev: saved.rev,
    });

    return saved;
  }

  /**
   * Returns the soft-deleted document to write.
   * `activeUserIds`: live users whose activeTenantId is this tenant.
   */
  async prepareDelete(
    requesterId: string,
    tenantId: string,
    opts: { activeUserIds: readonly string[]; rev?: string },
    ctx: CallContext = {},
  ): Promise<TenantDocument> {
    const tenant = await this.requireTenant(tenantId, ctx);

    if (!canUpdateTenant(requesterId, tenant)) {
      throw AccessErrors.denied('delete', { collection: 'tenant', id: tenantId });
    }
    if (isTenantInUse(tenant, { activeUserIds: opts.activeUserIds })) {
      throw TenantErrors.tenantInUse({ tenantId });
    }
    assertAllowed('delete', requesterId, tenant, { activeUserIds: opts.activeUserIds });

    if (opts.rev !== undefined && opts.rev !== tenant.rev) {
      throw StorageErrors.conflict({ id: tenantId, reason: 'stale_rev' });
    }

    return { ...tenant, deleted: true, updatedAt: this.now().toISOString() };
  }

  async delete(
    requesterId: string,
    tenantId: string,
    opts: { activeUserIds: readonly string[]; rev?: string },
    ctx: CallContext = {},
  ): Promise<TenantDocument> {
    const next = await this.prepareDelete(requesterId, tenantId, opts, ctx);
    const saved = await this.deps.tenantRepo.save(next, ctx);

    this.deps.logger.info({
      msg: 'virtual.tenant.deleted',
      flow: 'virtual.tenants',
      requestId: ctx.requestId,
      tenantId,
    });

    return saved;
  }

  /** Owner only. Adding an existing member is a no-op. */
  async addMember(
    requesterId: string,
    tenantId: string,
    memberId: string,
    ctx: CallContext = {},
  ): Promise<TenantDocument> {
    const tenant = await this.requireTenant(tenantId, ctx);
    assertAllowed('update', requesterId, tenant);

    if (isMember(memberId, tenant)) return tenant;

    const saved = await this.deps.tenantRepo.save(
      { ...tenant, memberIds: [...tenant.memberIds, memberId], updatedAt: this.now().toISOString() },
      ctx,
    );

    this.deps.logger.info({
      msg: 'virtual.tenant.member_added',
      flow: 'virtual.tenants',
      requestId: ctx.requestId,
      tenantId,
      memberId,
    });

    return saved;
  }

  /** Owner only. The owner can never be removed. */
  async removeMember(
    requesterId: string,
    tenantId: string,
    memberId: string,
    ctx: CallContext = {},
  ): Promise<TenantDocument> {
    const tenant = await this.requireTenant(tenantId, ctx);
    assertAllowed('update', requesterId, tenant);

    if (memberId === tenant.ownerId) throw TenantErrors.cannotRemoveOwner({ tenantId });
    if (!isMember(memberId, tenant)) throw TenantErrors.memberNotFound({ tenantId, memberId });

    const saved = await this.deps.tenantRepo.save(
      {
        ...tenant,
        memberIds: tenant.memberIds.filter((id) => id !== memberId),
        updatedAt: this.now().toISOString(),
      },
      ctx,
    );

    this.deps.logger.info({
      msg: 'virtual.tenant.member_removed',
      flow: 'virtual.tenants',
      requestId: ctx.requestId,
      tenantId,
      memberId,
    });

    return saved;
  }
}
