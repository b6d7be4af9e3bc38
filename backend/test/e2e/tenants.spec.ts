import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { z } from 'zod';

import { internalUserIdForSubject, personalTenantIdFor, userIdForSubject } from '../../src/modules/identifiers';
import { authHeaders, buildTestApp } from '../helpers/build-test-app';

type TestApp = Awaited<ReturnType<typeof buildTestApp>>;

const ALICE = 'auth0|alice';
const BOB = 'auth0|bob';

const aliceExt = userIdForSubject(ALICE);
const bobExt = userIdForSubject(BOB);
const alicePersonal = personalTenantIdFor(internalUserIdForSubject(ALICE));
const bobPersonal = personalTenantIdFor(internalUserIdForSubject(BOB));

const WriteAckSchema = z.object({ ok: z.literal(true), id: z.string(), rev: z.string() });

const TenantViewSchema = z.object({
  _id: z.string(),
  _rev: z.string(),
  type: z.literal('tenant'),
  ownerId: z.string(),
  memberIds: z.array(z.string()),
  name: z.string(),
  personal: z.boolean(),
  deleted: z.boolean(),
});

const ListResponseSchema = z.object({ total_rows: z.number(), docs: z.array(TenantViewSchema) });

const ErrorResponseSchema = z.object({ error: z.object({ code: z.string(), message: z.string() }) });

describe('__tenants', () => {
  let t: TestApp;

  beforeEach(async () => {
    t = await buildTestApp();
    for (const subject of [ALICE, BOB]) {
      await t.app.inject({ method: 'GET', url: '/__session', headers: authHeaders(subject) });
    }
  });

  afterEach(async () => {
    await t.close();
  });

  async function createTeam(name: string): Promise<string> {
    const res = await t.app.inject({
      method: 'POST',
      url: '/__tenants',
      headers: authHeaders(ALICE),
      payload: { name, metadata: { plan: 'team' } },
    });
    expect(res.statusCode).toBe(201);
    return WriteAckSchema.parse(res.json()).id;
  }

  it('lists only the tenants the requester belongs to', async () => {
    const team = await createTeam('Team');

    const res = await t.app.inject({ method: 'GET', url: '/__tenants', headers: authHeaders(ALICE) });

    expect(res.statusCode).toBe(200);
    const body = ListResponseSchema.parse(res.json());
    expect(body.total_rows).toBe(2);
    expect(body.docs.map((d) => d._id).sort()).toEqual([alicePersonal, team].sort());
  });

  it('GET of a tenant the requester is not in is forbidden', async () => {
    const res = await t.app.inject({ method: 'GET', url: `/__tenants/${bobPersonal}`, headers: authHeaders(ALICE) });

    expect(res.statusCode).toBe(403);
  });

  it('a tenant hint header switches the active tenant for a member', async () => {
    const team = await createTeam('Team');

    const res = await t.app.inject({ method: 'GET', url: '/__session', headers: authHeaders(ALICE, team) });

    expect(res.statusCode).toBe(200);
    expect(res.headers['x-active-tenant']).toBe(team);
  });

  it('members read, only the owner writes', async () => {
    const team = await createTeam('Team');
    const added = await t.app.inject({
      method: 'PUT',
      url: `/__tenants/${team}/members/${bobExt}`,
      headers: authHeaders(ALICE),
    });
    expect(added.statusCode).toBe(200);
    expect(TenantViewSchema.parse(added.json()).memberIds).toEqual([aliceExt, bobExt]);

    const read = await t.app.inject({ method: 'GET', url: `/__tenants/${team}`, headers: authHeaders(BOB) });
    expect(read.statusCode).toBe(200);
    expect(TenantViewSchema.parse(read.json()).ownerId).toBe(aliceExt);

    const denied = await t.app.inject({
      method: 'PUT',
      url: `/__tenants/${team}`,
      headers: authHeaders(BOB),
      payload: { name: 'Bob was here' },
    });
    expect(denied.statusCode).toBe(403);

    const renamed = await t.app.inject({
      method: 'PUT',
      url: `/__tenants/${team}`,
      headers: authHeaders(ALICE),
      payload: { name: 'Renamed' },
    });
    expect(renamed.statusCode).toBe(201);
    expect(WriteAckSchema.parse(renamed.json()).rev.startsWith('3-')).toBe(true);
  });

  it('DELETE is blocked while a member has the tenant active', async () => {
    const team = await createTeam('Team');
    await t.app.inject({ method: 'PUT', url: `/__tenants/${team}/members/${bobExt}`, headers: authHeaders(ALICE) });
    const activated = await t.app.inject({
      method: 'PUT',
      url: `/__users/${bobExt}`,
      headers: authHeaders(BOB),
      payload: { activeTenantId: team },
    });
    expect(activated.statusCode).toBe(201);

    const blocked = await t.app.inject({ method: 'DELETE', url: `/__tenants/${team}`, headers: authHeaders(ALICE) });
    expect(blocked.statusCode).toBe(403);
    expect(ErrorResponseSchema.parse(blocked.json()).error.message).toBe('Tenant is the active tenant of a member.');

    const removed = await t.app.inject({
      method: 'DELETE',
      url: `/__tenants/${team}/members/${bobExt}`,
      headers: authHeaders(ALICE),
    });
    expect(removed.statusCode).toBe(200);

    const deleted = await t.app.inject({ method: 'DELETE', url: `/__tenants/${team}`, headers: authHeaders(ALICE) });
    expect(deleted.statusCode).toBe(200);

    const bobSession = await t.app.inject({ method: 'GET', url: '/__session', headers: authHeaders(BOB) });
    expect(bobSession.headers['x-active-tenant']).toBe(bobPersonal);
  });

  it('DELETE is blocked for the tenant the requester is working in through the hint', async () => {
    const team = await createTeam('Team');
    const session = await t.app.inject({ method: 'GET', url: '/__session', headers: authHeaders(ALICE, team) });
    expect(session.headers['x-active-tenant']).toBe(team);

    const blocked = await t.app.inject({
      method: 'DELETE',
      url: `/__tenants/${team}`,
      headers: authHeaders(ALICE, team),
    });
    expect(blocked.statusCode).toBe(403);
    expect(ErrorResponseSchema.parse(blocked.json()).error.message).toBe('Tenant is the active tenant of a member.');

    const bulk = await t.app.inject({
      method: 'POST',
      url: '/__tenants/_bulk_docs',
      headers: authHeaders(ALICE, team),
      payload: { docs: [{ _id: team, _deleted: true }] },
    });
    expect(bulk.json()).toEqual([
      { ok: false, id: team, error: 'FORBIDDEN', reason: 'Tenant is the active tenant of a member.' },
    ]);

    const deleted = await t.app.inject({ method: 'DELETE', url: `/__tenants/${team}`, headers: authHeaders(ALICE) });
    expect(deleted.statusCode).toBe(200);
  });

  it('DELETE with a stale rev is a 409 CONFLICT', async () => {
    const team = await createTeam('Team');

    const res = await t.app.inject({
      method: 'DELETE',
      url: `/__tenants/${team}?rev=1-stale`,
      headers: authHeaders(ALICE),
    });

    expect(res.statusCode).toBe(409);
    expect(ErrorResponseSchema.parse(res.json()).error.code).toBe('CONFLICT');
  });

  it('_changes only carries readable tenants', async () => {
    const team = await createTeam('Team');

    const res = await t.app.inject({ method: 'GET', url: '/__tenants/_changes', headers: authHeaders(ALICE) });

    expect(res.statusCode).toBe(200);
    const body = z
      .object({ results: z.array(z.object({ seq: z.number(), id: z.string() })), last_seq: z.number() })
      .parse(res.json());
    expect(body.results).toEqual([
      { seq: 2, id: alicePersonal },
      { seq: 7, id: team },
    ]);
    expect(body.last_seq).toBe(7);
  });

  it('_bulk_docs creates, updates and reports failures per document', async () => {
    const team = await createTeam('Team');

    const res = await t.app.inject({
      method: 'POST',
      url: '/__tenants/_bulk_docs',
      headers: authHeaders(ALICE),
      payload: {
        docs: [{ name: 'Created in bulk' }, { _id: team, memberIds: [aliceExt, bobExt] }, { _id: team, name: 'Bulk' }],
      },
    });

    expect(res.statusCode).toBe(201);
    const results = z
      .array(z.object({ ok: z.boolean(), error: z.string().optional(), fields: z.array(z.string()).optional() }))
      .parse(res.json());
    expect(results).toEqual([
      { ok: true },
      { ok: false, error: 'IMMUTABLE_FIELD', fields: ['memberIds'] },
      { ok: true },
    ]);
  });
});
