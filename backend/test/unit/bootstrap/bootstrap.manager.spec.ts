import { describe, it, expect } from 'vitest';

import { AppError } from '../../../src/shared/http/errors';
import { internalUserIdForSubject, personalTenantIdFor } from '../../../src/modules/identifiers';
import { bootstrapStateOf } from '../../../src/modules/bootstrap';
import { buildTestDeps } from '../../helpers/build-test-app';

const SUBJECT = 'auth0|alice';

describe('BootstrapManager', () => {
  it('creates the user and a personal tenant on first contact', async () => {
    const deps = await buildTestDeps();
    const userId = internalUserIdForSubject(SUBJECT);
    const tenantId = personalTenantIdFor(userId);

    const result = await deps.bootstrap.bootstrapManager.ensureReady(SUBJECT);

    expect(result).toEqual({ userId, activeTenantId: tenantId, bootstrapped: true });

    const user = await deps.users.userRepo.getById(userId);
    expect(user?.subject).toBe(SUBJECT);
    expect(user?.activeTenantId).toBe(tenantId);
    expect(user?.personalTenantId).toBe(tenantId);
    expect(bootstrapStateOf(user)).toBe('Ready');

    const tenant = await deps.tenants.tenantRepo.getById(tenantId);
    expect(tenant?.name).toBe('Personal');
    expect(tenant?.personal).toBe(true);
    expect(tenant?.ownerId).toBe(userId);
    expect(tenant?.memberIds).toEqual([userId]);

    await deps.close();
  });

  it('is a no-op for a user that is already ready', async () => {
    const deps = await buildTestDeps();
    const first = await deps.bootstrap.bootstrapManager.ensureReady(SUBJECT);

    const second = await deps.bootstrap.bootstrapManager.ensureReady(SUBJECT);

    expect(second).toEqual({ ...first, bootstrapped: false });
    await deps.close();
  });

  it('converges when the same subject bootstraps concurrently', async () => {
    const deps = await buildTestDeps();
    const userId = internalUserIdForSubject(SUBJECT);

    const results = await Promise.all(
      Array.from({ length: 5 }, () => deps.bootstrap.bootstrapManager.ensureReady(SUBJECT)),
    );

    const tenantIds = new Set(results.map((r) => r.activeTenantId));
    expect([...tenantIds]).toEqual([personalTenantIdFor(userId)]);

    const tenants = await deps.tenants.tenantRepo.listForMember(userId);
    expect(tenants).toHaveLength(1);

    const user = await deps.users.userRepo.getById(userId);
    expect(user?.activeTenantId).toBe(personalTenantIdFor(userId));

    await deps.close();
  });

  it('refuses a deactivated user', async () => {
    const deps = await buildTestDeps();
    const userId = internalUserIdForSubject(SUBJECT);
    await deps.bootstrap.bootstrapManager.ensureReady(SUBJECT);
    const user = await deps.users.userRepo.getById(userId);
    if (!user) throw new Error('user missing');
    await deps.users.userRepo.save({ ...user, deleted: true });

    const err: unknown = await deps.bootstrap.bootstrapManager.ensureReady(SUBJECT).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(AppError);
    expect(err instanceof AppError ? [err.status, err.message] : null).toEqual([403, 'User is deactivated.']);
    await deps.close();
  });

  it('restores a soft-deleted personal tenant', async () => {
    const deps = await buildTestDeps();
    const userId = internalUserIdForSubject(SUBJECT);
    const tenantId = personalTenantIdFor(userId);
    await deps.bootstrap.bootstrapManager.ensureReady(SUBJECT);

    const tenant = await deps.tenants.tenantRepo.getById(tenantId);
    const user = await deps.users.userRepo.getById(userId);
    if (!tenant || !user) throw new Error('bootstrap incomplete');
    await deps.tenants.tenantRepo.save({ ...tenant, deleted: true });
    await deps.users.userRepo.save({ ...user, activeTenantId: null });

    const result = await deps.bootstrap.bootstrapManager.ensureReady(SUBJECT);

    expect(result).toEqual({ userId, activeTenantId: tenantId, bootstrapped: true });
    const restored = await deps.tenants.tenantRepo.getById(tenantId);
    expect(restored?.deleted).toBe(false);
    expect(restored?.memberIds).toEqual([userId]);
    await deps.close();
  });

  it('uses the injected clock for timestamps', async () => {
    const fixed = new Date('2026-03-01T12:00:00.000Z');
    const deps = await buildTestDeps({}, { now: () => fixed });
    const userId = internalUserIdForSubject(SUBJECT);

    await deps.bootstrap.bootstrapManager.ensureReady(SUBJECT);

    const user = await deps.users.userRepo.getById(userId);
    expect(user?.createdAt).toBe('2026-03-01T12:00:00.000Z');
    expect(user?.updatedAt).toBe('2026-03-01T12:00:00.000Z');
    await deps.close();
  });
});
