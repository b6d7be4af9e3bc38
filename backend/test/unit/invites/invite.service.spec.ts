import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import type { AppDeps } from '../../../src/app/di';
import { AppError } from '../../../src/shared/http/errors';
import { Sha256TokenHasher } from '../../../src/shared/security/sha256-token-hasher';
import {
  internalToExternal,
  internalUserIdForSubject,
  newInviteId,
  personalTenantIdFor,
} from '../../../src/modules/identifiers';
import type { InviteService } from '../../../src/modules/invites';
import type { Requester, VirtualTableHandler } from '../../../src/modules/virtual-tables';
import { buildTestDeps } from '../../helpers/build-test-app';

const T0 = Date.parse('2026-01-01T00:00:00.000Z');
const DAY_MS = 24 * 60 * 60 * 1000;

const aliceId = internalUserIdForSubject('auth0|alice');
const bobId = internalUserIdForSubject('auth0|bob');
const carolId = internalUserIdForSubject('auth0|carol');

const alice: Requester = { userId: aliceId, administrative: false };

async function captureError(p: Promise<unknown>): Promise<AppError> {
  const err: unknown = await p.catch((e: unknown) => e);
  if (!(err instanceof AppError)) throw new Error('expected AppError');
  return err;
}

describe('InviteService', () => {
  let nowMs: number;
  let deps: AppDeps;
  let handler: VirtualTableHandler;
  let invites: InviteService;
  let team: string;

  beforeEach(async () => {
    nowMs = T0;
    deps = await buildTestDeps({}, { now: () => new Date(nowMs) });
    handler = deps.virtualTables.handler;
    invites = deps.invites.inviteService;

    for (const subject of ['auth0|alice', 'auth0|bob', 'auth0|carol']) {
      await handler.resolveTenantContext({ subject, issuer: 'test-issuer', tenantHint: null });
    }
    team = (await handler.createTenant(alice, { name: 'Team' })).id;
  });

  afterEach(async () => {
    await deps.close();
  });

  async function memberIds(tenantId: string): Promise<string[]> {
    return (await deps.tenants.tenantService.requireTenant(tenantId)).memberIds;
  }

  describe('create', () => {
    it('stores a pending invitation under the token hash only', async () => {
      const { invite, token } = await invites.create(aliceId, team, { email: 'bob@example.com' });

      expect(invite).toMatchObject({
        type: 'invitation',
        tenantId: team,
        tenantName: 'Team',
        email: 'bob@example.com',
        status: 'PENDING',
        createdBy: aliceId,
        createdAt: '2026-01-01T00:00:00.000Z',
        expiresAt: '2026-01-08T00:00:00.000Z',
        acceptedAt: null,
        acceptedBy: null,
        revokedAt: null,
      });
      expect(invite.id.startsWith('invite_')).toBe(true);
      expect(invite.tokenHash).toBe(new Sha256TokenHasher().hash(token));

      const stored = await deps.store.getDoc(invite.id);
      expect(stored?.tokenHash).toBe(invite.tokenHash);
      expect(Object.values(stored ?? {})).not.toContain(token);
    });

    it('takes a per-invitation expiry', async () => {
      const { invite } = await invites.create(aliceId, team, { expiresInDays: 1 });

      expect(invite.expiresAt).toBe('2026-01-02T00:00:00.000Z');
    });

    it('refuses personal tenants', async () => {
      const err = await captureError(invites.create(aliceId, personalTenantIdFor(aliceId), {}));

      expect(err.code).toBe('VALIDATION_ERROR');
      expect(err.message).toBe('Personal tenants cannot have invitations.');
    });

    it('is owner-only, members included', async () => {
      await handler.addMember(alice, team, internalToExternal(bobId));

      const err = await captureError(invites.create(bobId, team, {}));

      expect(err.code).toBe('FORBIDDEN');
      expect(err.message).toBe('Not allowed to update this document.');
    });
  });

  describe('list', () => {
    it('returns newest first and filters by status', async () => {
      const older = (await invites.create(aliceId, team, {})).invite;
      nowMs = T0 + 1_000;
      const newer = (await invites.create(aliceId, team, {})).invite;
      await invites.revoke(aliceId, team, older.id);

      const all = await invites.list(aliceId, team, undefined);
      const revoked = await invites.list(aliceId, team, 'REVOKED');
      const pending = await invites.list(aliceId, team, 'PENDING');

      expect(all.map((i) => i.id)).toEqual([newer.id, older.id]);
      expect(revoked.map((i) => i.id)).toEqual([older.id]);
      expect(pending.map((i) => i.id)).toEqual([newer.id]);
    });

    it('is owner-only', async () => {
      const err = await captureError(invites.list(bobId, team, undefined));

      expect(err.code).toBe('FORBIDDEN');
    });
  });

  describe('preview', () => {
    it('shows the tenant behind a usable token', async () => {
      const { token } = await invites.create(aliceId, team, {});

      expect(await invites.preview(token)).toEqual({
        tenantId: team,
        tenantName: 'Team',
        expiresAt: '2026-01-08T00:00:00.000Z',
      });
    });

    it('does not distinguish unknown tokens from missing invites', async () => {
      const err = await captureError(invites.preview('unknown-token-unknown-token'));

      expect(err.code).toBe('NOT_FOUND');
      expect(err.message).toBe('Invite not found.');
    });
  });

  describe('accept', () => {
    it('adds the accepting user as a member and marks the invite accepted', async () => {
      const { invite, token } = await invites.create(aliceId, team, {});
      nowMs = T0 + 60_000;

      const accepted = await invites.accept(bobId, token);

      expect(accepted).toEqual({ ok: true, inviteId: invite.id, tenantId: team, tenantName: 'Team' });
      expect(await memberIds(team)).toEqual([aliceId, bobId]);
      expect(await deps.store.getDoc(invite.id)).toMatchObject({
        status: 'ACCEPTED',
        acceptedBy: bobId,
        acceptedAt: '2026-01-01T00:01:00.000Z',
      });
    });

    it('is single-use', async () => {
      const { token } = await invites.create(aliceId, team, {});
      await invites.accept(bobId, token);

      const second = await captureError(invites.accept(carolId, token));
      const preview = await captureError(invites.preview(token));

      expect(second.code).toBe('CONFLICT');
      expect(second.message).toBe('Invite already accepted.');
      expect(preview.message).toBe('Invite already accepted.');
      expect(await memberIds(team)).toEqual([aliceId, bobId]);
    });

    it('leaves the invite pending for someone who is already a member', async () => {
      const { invite, token } = await invites.create(aliceId, team, {});

      const err = await captureError(invites.accept(aliceId, token));

      expect(err.code).toBe('CONFLICT');
      expect(err.message).toBe('Already a member of this tenant.');
      expect((await deps.store.getDoc(invite.id))?.status).toBe('PENDING');
    });

    it('refuses expired invitations', async () => {
      const { token } = await invites.create(aliceId, team, {});
      nowMs = T0 + 7 * DAY_MS;

      const accept = await captureError(invites.accept(bobId, token));
      const preview = await captureError(invites.preview(token));

      expect(accept.code).toBe('CONFLICT');
      expect(accept.message).toBe('Invite has expired.');
      expect(preview.message).toBe('Invite has expired.');
      expect(await memberIds(team)).toEqual([aliceId]);
    });
  });

  describe('revoke', () => {
    it('makes the token unusable', async () => {
      const { invite, token } = await invites.create(aliceId, team, {});
      nowMs = T0 + 1_000;

      const revoked = await invites.revoke(aliceId, team, invite.id);
      const accept = await captureError(invites.accept(bobId, token));
      const again = await captureError(invites.revoke(aliceId, team, invite.id));

      expect(revoked.status).toBe('REVOKED');
      expect(revoked.revokedAt).toBe('2026-01-01T00:00:01.000Z');
      expect(revoked.rev.startsWith('2-')).toBe(true);
      expect(accept.message).toBe('Invite is not valid.');
      expect(again.message).toBe('Invite is not valid.');
    });

    it('does not find invites through another tenant or unknown ids', async () => {
      const { invite } = await invites.create(aliceId, team, {});
      const other = (await handler.createTenant(alice, { name: 'Other' })).id;

      const wrongTenant = await captureError(invites.revoke(aliceId, other, invite.id));
      const unknown = await captureError(invites.revoke(aliceId, team, newInviteId()));

      expect(wrongTenant.code).toBe('NOT_FOUND');
      expect(wrongTenant.message).toBe('Invite not found.');
      expect(unknown.code).toBe('NOT_FOUND');
    });
  });
});
