import { describe, it, expect } from 'vitest';

import { AppError } from '../../../src/shared/http/errors';
import type { Invite } from '../../../src/modules/invites';
import {
  assertInviteBelongsToTenant,
  assertInviteExists,
  assertInviteIsPending,
  assertInviteNotExpired,
  assertInviteUsable,
} from '../../../src/modules/invites/policies/invite.policy';

function invite(overrides: Partial<Invite> = {}): Invite {
  return {
    type: 'invitation',
    id: 'invite_00000000-0000-4000-8000-000000000001',
    rev: '1-abc',
    tenantId: 'tenant_1',
    tenantName: 'Team',
    email: null,
    status: 'PENDING',
    tokenHash: 'hash',
    createdBy: 'user_1',
    createdAt: '2026-01-01T00:00:00.000Z',
    expiresAt: '2026-01-08T00:00:00.000Z',
    acceptedAt: null,
    acceptedBy: null,
    revokedAt: null,
    ...overrides,
  };
}

function thrown(fn: () => void): AppError {
  try {
    fn();
  } catch (err) {
    if (err instanceof AppError) return err;
    throw err;
  }
  throw new Error('expected AppError');
}

describe('invite policy', () => {
  it('treats a missing invite as not found', () => {
    const err = thrown(() => assertInviteExists(null));

    expect(err.code).toBe('NOT_FOUND');
    expect(err.message).toBe('Invite not found.');
  });

  it('distinguishes accepted invites from other non-pending ones', () => {
    const accepted = thrown(() => assertInviteIsPending(invite({ status: 'ACCEPTED' })));
    const revoked = thrown(() => assertInviteIsPending(invite({ status: 'REVOKED' })));

    expect(accepted.code).toBe('CONFLICT');
    expect(accepted.message).toBe('Invite already accepted.');
    expect(revoked.code).toBe('CONFLICT');
    expect(revoked.message).toBe('Invite is not valid.');
    expect(() => assertInviteIsPending(invite())).not.toThrow();
  });

  it('expires an invite at its expiry instant', () => {
    const justBefore = new Date('2026-01-07T23:59:59.999Z');
    const atExpiry = new Date('2026-01-08T00:00:00.000Z');

    expect(() => assertInviteNotExpired(invite(), justBefore)).not.toThrow();
    expect(thrown(() => assertInviteNotExpired(invite(), atExpiry)).message).toBe('Invite has expired.');
  });

  it('hides invites addressed through another tenant', () => {
    const err = thrown(() => assertInviteBelongsToTenant(invite(), 'tenant_2'));

    expect(err.code).toBe('NOT_FOUND');
    expect(err.message).toBe('Invite not found.');
  });

  it('checks status before expiry', () => {
    const err = thrown(() =>
      assertInviteUsable(invite({ status: 'REVOKED' }), new Date('2027-01-01T00:00:00.000Z')),
    );

    expect(err.message).toBe('Invite is not valid.');
  });
});
