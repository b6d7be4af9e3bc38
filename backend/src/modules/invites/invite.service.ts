/**
 * backend/src/modules/invites/invite.service.ts
 *
 * WHY:
 * - Tenant invitations end-to-end: create, list, preview, accept, revoke.
 *
 * RULES:
 * - Only the tenant owner creates, lists and revokes invitations.
 * - Never store/log raw tokens (hash immediately).
 * - Acceptance is single-use: the invite is marked ACCEPTED with a rev-checked write
 *   BEFORE the membership change, so two concurrent accepts cannot both succeed.
 * - Membership changes go through TenantService.addMember, acting with the authority
 *   of the invite's creator.
 * - No retries here.
 */

import type { CallContext } from '../../shared/http/request-context';
import { isAppError } from '../../shared/http/errors';
import type { Logger } from '../../shared/logger/logger';
import { generateSecureToken } from '../../shared/security/token';
import type { TokenHasher } from '../../shared/security/token-hasher';
import { StorageErrors } from '../../shared/storage/storage.errors';
import { assertAllowed } from '../access';
import { newInviteId } from '../identifiers';
import { isMember, type TenantDocument, type TenantService } from '../tenants';
import type { InviteRepo } from './dal/invite.repo';
import { InviteErrors } from './invite.errors';
import type { CreateInviteInput } from './invite.schemas';
import type { AcceptedInvite, Invite, InvitePreview, InviteStatus, NewInvite } from './invite.types';
import {
  assertInviteBelongsToTenant,
  assertInviteExists,
  assertInviteIsPending,
  assertInviteUsable,
} from './policies/invite.policy';

const DAY_MS = 24 * 60 * 60 * 1000;

export type CreateInviteResult = {
  invite: Invite;
  /** Raw token. Returned once, never stored. */
  token: string;
};

export class InviteService {
  private readonly now: () => Date;

  constructor(
    private readonly deps: {
      inviteRepo: InviteRepo;
      tenantService: TenantService;
      tokenHasher: TokenHasher;
      logger: Logger;
      ttlDays: number;
      now?: () => Date;
    },
  ) {
    this.now = deps.now ?? (() => new Date());
  }

  async create(
    requesterId: string,
    tenantId: string,
    input: CreateInviteInput,
    ctx: CallContext = {},
  ): Promise<CreateInviteResult> {
    // ── 1. Tenant + owner check ──
    const tenant = await this.requireOwnedTenant(requesterId, tenantId, ctx);
    if (tenant.personal) throw InviteErrors.personalTenant({ tenantId });

    // ── 2. Token (hash immediately) ──
    const token = generateSecureToken();
    const tokenHash = this.deps.tokenHasher.hash(token);

    // ── 3. Write ──
    const now = this.now();
    const ttlDays = input.expiresInDays ?? this.deps.ttlDays;
    const draft: NewInvite = {
      type: 'invitation',
      id: newInviteId(),
      tenantId: tenant.id,
      tenantName: tenant.name,
      email: input.email ?? null,
      status: 'PENDING',
      tokenHash,
      createdBy: requesterId,
      createdAt: now.toISOString(),
      expiresAt: new Date(now.getTime() + ttlDays * DAY_MS).toISOString(),
      acceptedAt: null,
      acceptedBy: null,
      revokedAt: null,
    };

    const invite = await this.deps.inviteRepo.create(draft, ctx);
    if (!invite) throw StorageErrors.conflict({ id: draft.id, reason: 'id_taken' });

    this.deps.logger.info({
      msg: 'invites.created',
      flow: 'invites.create',
      requestId: ctx.requestId,
      tenantId: tenant.id,
      inviteId: invite.id,
      expiresAt: invite.expiresAt,
    });

    return { invite, token };
  }

  async list(
    requesterId: string,
    tenantId: string,
    status: InviteStatus | undefined,
    ctx: CallContext = {},
  ): Promise<Invite[]> {
    const tenant = await this.requireOwnedTenant(requesterId, tenantId, ctx);
    return this.deps.inviteRepo.listForTenant(tenant.id, status, ctx);
  }

  /** No authentication needed: the token is the credential. */
  async preview(token: string, ctx: CallContext = {}): Promise<InvitePreview> {
    const invite = await this.loadUsableInvite(token, ctx);
    const tenant = await this.deps.tenantService.requireTenant(invite.tenantId, ctx);

    return { tenantId: tenant.id, tenantName: tenant.name, expiresAt: invite.expiresAt };
  }

  async accept(requesterId: string, token: string, ctx: CallContext = {}): Promise<AcceptedInvite> {
    this.deps.logger.info({
      msg: 'invites.accept.start',
      flow: 'invites.accept',
      requestId: ctx.requestId,
      userId: requesterId,
    });

    // ── 1. Load + usability (pure policies) ──
    const invite = await this.loadUsableInvite(token, ctx);

    // ── 2. Tenant must still exist; existing members have nothing to accept ──
    const tenant = await this.deps.tenantService.requireTenant(invite.tenantId, ctx);
    if (isMember(requesterId, tenant)) {
      throw InviteErrors.alreadyMember({ tenantId: tenant.id, inviteId: invite.id });
    }

    // ── 3. Mark accepted (single-use guard) ──
    const acceptedAt = this.now().toISOString();
    try {
      await this.deps.inviteRepo.save(
        { ...invite, status: 'ACCEPTED', acceptedAt, acceptedBy: requesterId },
        ctx,
      );
    } catch (err) {
      if (isAppError(err, 'CONFLICT')) throw InviteErrors.inviteNotPending({ inviteId: invite.id });
      throw err;
    }

    // ── 4. Membership ──
    try {
      await this.deps.tenantService.addMember(invite.createdBy, tenant.id, requesterId, ctx);
    } catch (err) {
      this.deps.logger.error({
        msg: 'invites.accept.membership_failed',
        flow: 'invites.accept',
        requestId: ctx.requestId,
        inviteId: invite.id,
        tenantId: tenant.id,
        userId: requesterId,
        err,
      });
      throw err;
    }

    this.deps.logger.info({
      msg: 'invites.accept.success',
      flow: 'invites.accept',
      requestId: ctx.requestId,
      inviteId: invite.id,
      tenantId: tenant.id,
      userId: requesterId,
    });

    return { ok: true, inviteId: invite.id, tenantId: tenant.id, tenantName: tenant.name };
  }

  async revoke(
    requesterId: string,
    tenantId: string,
    inviteId: string,
    ctx: CallContext = {},
  ): Promise<Invite> {
    const tenant = await this.requireOwnedTenant(requesterId, tenantId, ctx);

    const invite = await this.deps.inviteRepo.getById(inviteId, ctx);
    assertInviteExists(invite);
    assertInviteBelongsToTenant(invite, tenant.id);
    assertInviteIsPending(invite);

    const revoked = await this.deps.inviteRepo.save(
      { ...invite, status: 'REVOKED', revokedAt: this.now().toISOString() },
      ctx,
    );

    this.deps.logger.info({
      msg: 'invites.revoked',
      flow: 'invites.revoke',
      requestId: ctx.requestId,
      tenantId: tenant.id,
      inviteId,
    });

    return revoked;
  }

  // ── internals ───────────────────────────────────────────

  private async requireOwnedTenant(
    requesterId: string,
    tenantId: string,
    ctx: CallContext,
  ): Promise<TenantDocument> {
    const tenant = await this.deps.tenantService.requireTenant(tenantId, ctx);
    assertAllowed('update', requesterId, tenant);
    return tenant;
  }

  private async loadUsableInvite(token: string, ctx: CallContext): Promise<Invite> {
    const invite = await this.deps.inviteRepo.findByTokenHash(this.deps.tokenHasher.hash(token), ctx);
    if (!invite) throw InviteErrors.invalidToken();

    assertInviteUsable(invite, this.now());
    return invite;
  }
}
