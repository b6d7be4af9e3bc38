import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import type { AppDeps } from '../../../src/app/di';
import { AppError } from '../../../src/shared/http/errors';
import { internalToExternal, internalUserIdForSubject, personalTenantIdFor } from '../../../src/modules/identifiers';
import type { Requester, VirtualTableHandler } from '../../../src/modules/virtual-tables';
import { MemoryBackend } from '../../../src/shared/storage/memory-backend';
import { buildTestDeps, TEST_DATABASE } from '../../helpers/build-test-app';
import { ScriptedBackend } from '../../helpers/scripted-backend';

const ALICE_SUBJECT = 'auth0|alice';
const BOB_SUBJECT = 'auth0|bob';

const aliceId = internalUserIdForSubject(ALICE_SUBJECT);
const bobId = internalUserIdForSubject(BOB_SUBJECT);
const aliceExt = internalToExternal(aliceId);
const bobExt = internalToExternal(bobId);

const alice: Requester = { userId: aliceId, administrative: false };
const bob: Requester = { userId: bobId, administrative: false };

async function captureError(p: Promise<unknown>): Promise<AppError> {
  const err: unknown = await p.catch((e: unknown) => e);
  if (!(err instanceof AppError)) throw new Error('expected AppError');
  return err;
}

function claims(subject: string, tenantHint: string | null = null) {
  return { subject, issuer: 'test-issuer', tenantHint };
}

describe('VirtualTableHandler', () => {
  let deps: AppDeps;
  let handler: VirtualTableHandler;

  beforeEach(async () => {
    deps = await buildTestDeps({ adminSubjects: ['auth0|admin'] });
    handler = deps.virtualTables.handler;

    // Both users bootstrapped: seqs 1-3 (alice), 4-6 (bob).
    await handler.resolveTenantContext(claims(ALICE_SUBJECT));
    await handler.resolveTenantContext(claims(BOB_SUBJECT));
  });

  afterEach(async () => {
    await deps.close();
  });

  async function createTeam(name = 'Team'): Promise<string> {
    const ack = await handler.createTenant(alice, { name });
    return ack.id;
  }

  describe('tenant context', () => {
    it('bootstraps on first contact and then serves from cache', async () => {
      const carol = claims('auth0|carol');
      const carolId = internalUserIdForSubject('auth0|carol');

      const first = await handler.resolveTenantContext(carol);
      const second = await handler.resolveTenantContext(carol);

      expect(first).toEqual({
        userId: carolId,
        activeTenantId: personalTenantIdFor(carolId),
        bootstrapped: true,
        source: 'bootstrap',
      });
      expect(second).toEqual({ ...first, bootstrapped: false, source: 'cache' });
    });

    it('falls back to the user document when the cache is empty', async () => {
      await deps.bootstrap.tenantContextCache.invalidate(aliceId);

      const ctx = await handler.resolveTenantContext(claims(ALICE_SUBJECT));

      expect(ctx.source).toBe('document');
      expect(ctx.activeTenantId).toBe(personalTenantIdFor(aliceId));
    });

    it('honours a tenant hint only for tenants the user belongs to', async () => {
      const team = await createTeam();

      const hinted = await handler.resolveTenantContext(claims(ALICE_SUBJECT, team));
      const foreign = await handler.resolveTenantContext(claims(ALICE_SUBJECT, personalTenantIdFor(bobId)));
      const garbage = await handler.resolveTenantContext(claims(ALICE_SUBJECT, 'not-a-tenant'));

      expect(hinted.activeTenantId).toBe(team);
      expect(hinted.source).toBe('hint');
      expect(foreign.activeTenantId).toBe(personalTenantIdFor(aliceId));
      expect(garbage.activeTenantId).toBe(personalTenantIdFor(aliceId));
    });
  });

  describe('__users', () => {
    it('rejects ids that are not external user ids', async () => {
      const err = await captureError(handler.getUser(alice, 'ext_42'));

      expect(err.code).toBe('MALFORMED_IDENTIFIER');
      expect(err.status).toBe(400);
    });

    it('shows users only their own document', async () => {
      const own = await handler.getUser(alice, aliceExt);
      const err = await captureError(handler.getUser(alice, bobExt));

      expect(own._id).toBe(aliceExt);
      expect(own.subject).toBe(ALICE_SUBJECT);
      expect(err.code).toBe('FORBIDDEN');
      expect(err.message).toBe('Not allowed to read this document.');
    });

    it('updates mutable fields and acknowledges with the external id', async () => {
      const ack = await handler.updateUser(alice, aliceExt, { displayName: '  Alice  ' });

      expect(ack.ok).toBe(true);
      expect(ack.id).toBe(aliceExt);
      expect(ack.rev.startsWith('3-')).toBe(true);
      expect((await handler.getUser(alice, aliceExt)).displayName).toBe('Alice');
    });

    it('rejects a change to an immutable field and names it', async () => {
      const err = await captureError(handler.updateUser(alice, aliceExt, { subject: 'someone-else' }));

      expect(err.code).toBe('IMMUTABLE_FIELD');
      expect(err.meta?.fields).toEqual(['subject']);
      expect((await handler.getUser(alice, aliceExt)).subject).toBe(ALICE_SUBJECT);
    });

    it('accepts immutable fields echoed back unchanged', async () => {
      const view = await handler.getUser(alice, aliceExt);

      const ack = await handler.updateUser(alice, aliceExt, { ...view, email: 'Alice@Example.com' });

      expect(ack.ok).toBe(true);
      expect((await handler.getUser(alice, aliceExt)).email).toBe('alice@example.com');
    });

    it('rejects unknown keys', async () => {
      const err = await captureError(handler.updateUser(alice, aliceExt, { role: 'admin' }));

      expect(err.code).toBe('VALIDATION_ERROR');
    });

    it('reports a stale revision as CONFLICT', async () => {
      const err = await captureError(handler.updateUser(alice, aliceExt, { _rev: '1-stale', displayName: 'A' }));

      expect(err.code).toBe('CONFLICT');
      expect(err.status).toBe(409);
    });

    it('only lets users activate tenants they belong to', async () => {
      const err = await captureError(
        handler.updateUser(alice, aliceExt, { activeTenantId: personalTenantIdFor(bobId) }),
      );

      expect(err.code).toBe('FORBIDDEN');
      expect(err.message).toBe('Active tenant must be a tenant you belong to.');
    });

    it('drops the cached tenant context when the active tenant changes', async () => {
      const team = await createTeam();

      await handler.updateUser(alice, aliceExt, { activeTenantId: team });

      expect(await deps.bootstrap.tenantContextCache.get(aliceId)).toBeNull();
      expect((await handler.resolveTenantContext(claims(ALICE_SUBJECT))).activeTenantId).toBe(team);
    });

    it('never lets users delete themselves, even as administrators', async () => {
      const err = await captureError(handler.deleteUser({ userId: aliceId, administrative: true }, aliceExt, undefined));

      expect(err.code).toBe('FORBIDDEN');
      expect(err.message).toBe('Users cannot delete themselves.');
    });

    it('lets an administrator soft-delete another user', async () => {
      const denied = await captureError(handler.deleteUser(alice, bobExt, undefined));
      const ack = await handler.deleteUser({ userId: aliceId, administrative: true }, bobExt, undefined);

      expect(denied.code).toBe('FORBIDDEN');
      expect(ack.id).toBe(bobExt);

      const stored = await deps.users.userRepo.getById(bobId);
      expect(stored?.deleted).toBe(true);

      const refused = await captureError(handler.resolveTenantContext(claims(BOB_SUBJECT)));
      expect(refused.message).toBe('User is deactivated.');
    });

    it('returns only the requester in the change feed', async () => {
      const changes = await handler.userChanges(alice, 0);

      expect(changes.results.map((r) => [r.seq, r.id])).toEqual([[3, aliceExt]]);
      expect(changes.lastSeq).toBe(6);
    });

    it('reports per-document bulk results in input order', async () => {
      const results = await handler.bulkUsers(alice, {
        docs: [{ _id: aliceExt, displayName: 'Alice' }, { _id: bobExt, displayName: 'Mallory' }, { _id: 'ext_42' }],
      });

      expect(results).toEqual([
        { ok: true, id: aliceExt, rev: expect.stringMatching(/^3-/) },
        { ok: false, id: bobExt, error: 'FORBIDDEN', reason: 'Not allowed to update this document.' },
        { ok: false, id: 'ext_42', error: 'MALFORMED_IDENTIFIER', reason: 'Malformed identifier.' },
      ]);
    });
  });

  describe('__tenants', () => {
    it('creates a tenant owned by the requester', async () => {
      const team = await createTeam('Research');

      const view = await handler.getTenant(alice, team);

      expect(view).toMatchObject({
        _id: team,
        type: 'tenant',
        name: 'Research',
        ownerId: aliceExt,
        memberIds: [aliceExt],
        personal: false,
        deleted: false,
      });
    });

    it('rejects owner fields on create', async () => {
      const err = await captureError(handler.createTenant(alice, { name: 'Team', ownerId: bobExt }));

      expect(err.code).toBe('VALIDATION_ERROR');
    });

    it('lists the tenants the requester belongs to', async () => {
      const team = await createTeam();

      const tenants = await handler.listTenants(alice);

      expect(tenants.map((t) => t._id).sort()).toEqual([personalTenantIdFor(aliceId), team].sort());
    });

    it('lets the owner update and forbids other members', async () => {
      const team = await createTeam();
      await handler.addMember(alice, team, bobExt);

      const denied = await captureError(handler.updateTenant(bob, team, { name: 'Hijacked' }));
      const ack = await handler.updateTenant(alice, team, { name: 'Renamed' });

      expect(denied.code).toBe('FORBIDDEN');
      expect(ack.id).toBe(team);
      expect((await handler.getTenant(bob, team)).name).toBe('Renamed');
    });

    it('keeps ownerId when a patch tries to change it', async () => {
      const team = await createTeam();

      const err = await captureError(handler.updateTenant(alice, team, { ownerId: bobExt, name: 'Mine' }));

      expect(err.code).toBe('IMMUTABLE_FIELD');
      expect(err.meta?.fields).toEqual(['ownerId']);
      const view = await handler.getTenant(alice, team);
      expect(view.ownerId).toBe(aliceExt);
      expect(view.name).toBe('Team');
    });

    it('refuses to delete a tenant that a member has active', async () => {
      const team = await createTeam();
      await handler.addMember(alice, team, bobExt);
      await handler.updateUser(bob, bobExt, { activeTenantId: team });

      const blocked = await captureError(handler.deleteTenant(alice, team, undefined));
      expect(blocked.code).toBe('FORBIDDEN');
      expect(blocked.message).toBe('Tenant is the active tenant of a member.');

      await handler.updateUser(bob, bobExt, { activeTenantId: personalTenantIdFor(bobId) });
      const ack = await handler.deleteTenant(alice, team, undefined);

      expect(ack.id).toBe(team);
      const gone = await captureError(handler.getTenant(alice, team));
      expect(gone.code).toBe('NOT_FOUND');
    });

    it('refuses to delete the tenant the requester is working in', async () => {
      const team = await createTeam();
      const inTeam: Requester = { ...alice, activeTenantId: team };

      const single = await captureError(handler.deleteTenant(inTeam, team, undefined));
      const bulk = await handler.bulkTenants(inTeam, { docs: [{ _id: team, _deleted: true }] });

      expect(single.code).toBe('FORBIDDEN');
      expect(single.message).toBe('Tenant is the active tenant of a member.');
      expect(bulk).toEqual([
        { ok: false, id: team, error: 'FORBIDDEN', reason: 'Tenant is the active tenant of a member.' },
      ]);

      const ack = await handler.deleteTenant(alice, team, undefined);
      expect(ack.id).toBe(team);
    });

    it('only lets the owner delete', async () => {
      const team = await createTeam();
      await handler.addMember(alice, team, bobExt);

      const err = await captureError(handler.deleteTenant(bob, team, undefined));

      expect(err.code).toBe('FORBIDDEN');
      expect(err.message).toBe('Not allowed to delete this document.');
    });

    it('adds members idempotently and rejects unknown users', async () => {
      const team = await createTeam();

      const once = await handler.addMember(alice, team, bobExt);
      const twice = await handler.addMember(alice, team, bobExt);
      const unknown = await captureError(handler.addMember(alice, team, 'f'.repeat(64)));

      expect(once.memberIds).toEqual([aliceExt, bobExt]);
      expect(twice._rev).toBe(once._rev);
      expect(unknown.code).toBe('NOT_FOUND');
    });

    it('clears the active tenant of a removed member', async () => {
      const team = await createTeam();
      await handler.addMember(alice, team, bobExt);
      await handler.updateUser(bob, bobExt, { activeTenantId: team });
      await handler.resolveTenantContext(claims(BOB_SUBJECT));

      const view = await handler.removeMember(alice, team, bobExt);

      expect(view.memberIds).toEqual([aliceExt]);
      expect((await deps.users.userRepo.getById(bobId))?.activeTenantId).toBeNull();
      expect(await deps.bootstrap.tenantContextCache.get(bobId)).toBeNull();

      const ctx = await handler.resolveTenantContext(claims(BOB_SUBJECT));
      expect(ctx.activeTenantId).toBe(personalTenantIdFor(bobId));
      expect(ctx.bootstrapped).toBe(true);
    });

    it('never removes the owner', async () => {
      const team = await createTeam();

      const err = await captureError(handler.removeMember(alice, team, aliceExt));

      expect(err.code).toBe('FORBIDDEN');
      expect(err.message).toBe('The tenant owner cannot be removed.');
    });

    it('streams readable tenant changes in sequence order', async () => {
      const team = await createTeam(); // seq 7

      const changes = await handler.tenantChanges(alice, 0);

      expect(changes.results.map((r) => [r.seq, r.id])).toEqual([
        [2, personalTenantIdFor(aliceId)],
        [7, team],
      ]);
      expect(changes.lastSeq).toBe(7);

      const again = await handler.tenantChanges(alice, changes.lastSeq);
      expect(again).toEqual({ results: [], lastSeq: 7 });
    });

    it('applies valid bulk ops and reports the rest', async () => {
      const first = await createTeam('First');
      const second = await createTeam('Second');

      const results = await handler.bulkTenants(alice, {
        docs: [{ _id: first, name: 'First!' }, { _id: second, ownerId: bobExt }, { name: 'Third' }],
      });

      expect(results).toHaveLength(3);
      expect(results[0]).toEqual({ ok: true, id: first, rev: expect.stringMatching(/^2-/) });
      expect(results[1]).toEqual({
        ok: false,
        id: second,
        error: 'IMMUTABLE_FIELD',
        reason: 'Immutable fields cannot be changed: ownerId',
        fields: ['ownerId'],
      });
      expect(results[2]?.ok).toBe(true);

      expect((await handler.getTenant(alice, first)).name).toBe('First!');
      expect((await handler.getTenant(alice, second)).ownerId).toBe(aliceExt);
      expect((await handler.listTenants(alice)).map((t) => t.name)).toContain('Third');
    });

    it('rejects bulk envelopes with unknown keys', async () => {
      const err = await captureError(handler.bulkTenants(alice, { docs: [], new_edits: false }));

      expect(err.code).toBe('VALIDATION_ERROR');
    });
  });
});

describe('VirtualTableHandler under storage faults', () => {
  let deps: AppDeps;
  let handler: VirtualTableHandler;
  let backend: ScriptedBackend;

  beforeEach(async () => {
    backend = new ScriptedBackend(new MemoryBackend({ databases: [TEST_DATABASE] }), TEST_DATABASE);
    deps = await buildTestDeps({}, { backend });
    handler = deps.virtualTables.handler;

    await handler.resolveTenantContext(claims(ALICE_SUBJECT));
    await handler.resolveTenantContext(claims(BOB_SUBJECT));
  });

  afterEach(async () => {
    await deps.close();
  });

  async function createTeam(): Promise<string> {
    const ack = await handler.createTenant(alice, { name: 'Team' });
    return ack.id;
  }

  describe('conflict retry', () => {
    it('re-reads and writes again after one conflicting update', async () => {
      const team = await createTeam();
      backend.failPuts(team, 'conflict');

      const ack = await handler.updateTenant(alice, team, { name: 'Renamed' });

      expect(ack).toEqual({ ok: true, id: team, rev: expect.stringMatching(/^2-/) });
      expect(backend.puts(team)).toBe(2);
      expect((await handler.getTenant(alice, team)).name).toBe('Renamed');
    });

    it('surfaces CONFLICT when the retry conflicts too', async () => {
      const team = await createTeam();
      backend.failPuts(team, 'conflict', 'conflict');

      const err = await captureError(handler.updateTenant(alice, team, { name: 'Renamed' }));

      expect(err.code).toBe('CONFLICT');
      expect(err.message).toBe('Document update conflict.');
      expect(backend.puts(team)).toBe(2);
      expect((await handler.getTenant(alice, team)).name).toBe('Team');
    });

    it('does not retry when the backend is unavailable', async () => {
      const team = await createTeam();
      backend.failPuts(team, 'unavailable');

      const err = await captureError(handler.updateTenant(alice, team, { name: 'Renamed' }));

      expect(err.code).toBe('BACKEND_UNAVAILABLE');
      expect(backend.puts(team)).toBe(1);
    });
  });

  describe('member removal', () => {
    it('logs a removal whose active tenant reset failed and still drops the cached context', async () => {
      const team = await createTeam();
      await handler.addMember(alice, team, bobExt);
      await handler.updateUser(bob, bobExt, { activeTenantId: team });
      await handler.resolveTenantContext(claims(BOB_SUBJECT));
      const errorSpy = vi.spyOn(deps.logger, 'error');
      backend.failPuts(bobId, 'unavailable');

      const err = await captureError(handler.removeMember(alice, team, bobExt));

      expect(err.code).toBe('BACKEND_UNAVAILABLE');
      expect((await handler.getTenant(alice, team)).memberIds).toEqual([aliceExt]);
      expect((await deps.users.userRepo.getById(bobId))?.activeTenantId).toBe(team);
      expect(await deps.bootstrap.tenantContextCache.get(bobId)).toBeNull();
      expect(errorSpy).toHaveBeenCalledWith(
        expect.objectContaining({
          msg: 'virtual.tenant.member_removal_incomplete',
          tenantId: team,
          memberId: bobId,
        }),
      );
    });
  });
});
