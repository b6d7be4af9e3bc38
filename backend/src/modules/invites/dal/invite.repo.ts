/**
 * backend/src/modules/invites/dal/invite.repo.ts
 *
 * WHY:
 * - DAL for invitation documents in the shared CouchDB database.
 *
 * RULES:
 * - No AppError of its own.
 * - No policies.
 * - Lookups by token go through the hash only.
 */

import { z } from 'zod';

import type { Logger } from '../../../shared/logger/logger';
import type { DocumentStore } from '../../../shared/storage/document-store';
import type { BackendRequestOptions, CouchDoc } from '../../../shared/storage/storage-backend';
import { INVITE_STATUSES, type Invite, type InviteStatus, type NewInvite } from '../invite.types';

const StoredInviteSchema = z.object({
  _id: z.string(),
  _rev: z.string(),
  type: z.literal('invitation'),
  tenantId: z.string(),
  tenantName: z.string().default(''),
  email: z.string().nullable().default(null),
  status: z.enum(INVITE_STATUSES),
  tokenHash: z.string(),
  createdBy: z.string(),
  createdAt: z.string(),
  expiresAt: z.string(),
  acceptedAt: z.string().nullable().default(null),
  acceptedBy: z.string().nullable().default(null),
  revokedAt: z.string().nullable().default(null),
});

function toStoredInvite(invite: NewInvite & { rev?: string }): CouchDoc {
  const doc: CouchDoc = {
    _id: invite.id,
    type: 'invitation',
    tenantId: invite.tenantId,
    tenantName: invite.tenantName,
    email: invite.email,
    status: invite.status,
    tokenHash: invite.tokenHash,
    createdBy: invite.createdBy,
    createdAt: invite.createdAt,
    expiresAt: invite.expiresAt,
    acceptedAt: invite.acceptedAt,
    acceptedBy: invite.acceptedBy,
    revokedAt: invite.revokedAt,
  };
  if (invite.rev !== undefined) doc._rev = invite.rev;
  return doc;
}

export class InviteRepo {
  constructor(
    private readonly store: DocumentStore,
    private readonly logger: Logger,
  ) {}

  private fromStored(doc: CouchDoc): Invite | null {
    if (doc.type !== 'invitation') return null;

    const parsed = StoredInviteSchema.safeParse(doc);
    if (!parsed.success) {
      this.logger.warn('storage.malformed_document', {
        flow: 'storage',
        collection: 'invitation',
        id: doc._id,
        issues: parsed.error.issues.map((i) => i.path.join('.')),
      });
      return null;
    }

    const { _id, _rev, ...fields } = parsed.data;
    return { ...fields, id: _id, rev: _rev };
  }

  private parseAll(docs: CouchDoc[]): Invite[] {
    return docs.map((doc) => this.fromStored(doc)).filter((i): i is Invite => i !== null);
  }

  async getById(id: string, opts?: BackendRequestOptions): Promise<Invite | null> {
    const doc = await this.store.getDoc(id, opts);
    return doc ? this.fromStored(doc) : null;
  }

  async findByTokenHash(tokenHash: string, opts?: BackendRequestOptions): Promise<Invite | null> {
    const docs = await this.store.find({ type: 'invitation', tokenHash }, { ...opts, limit: 1 });
    return this.parseAll(docs)[0] ?? null;
  }

  /** Newest first. */
  async listForTenant(
    tenantId: string,
    status: InviteStatus | undefined,
    opts?: BackendRequestOptions,
  ): Promise<Invite[]> {
    const selector = status
      ? { type: 'invitation', tenantId, status }
      : { type: 'invitation', tenantId };

    const invites = this.parseAll(await this.store.find(selector, opts));
    return invites.sort((a, b) => b.createdAt.localeCompare(a.createdAt) || a.id.localeCompare(b.id));
  }

  /** Create-if-absent. Returns null when the id is already taken. */
  async create(invite: NewInvite, opts?: BackendRequestOptions): Promise<Invite | null> {
    const result = await this.store.createIfAbsent(toStoredInvite(invite), opts);
    return result.created ? { ...invite, rev: result.rev } : null;
  }

  /** Rev-checked. A concurrent accept/revoke surfaces as CONFLICT. */
  async save(invite: Invite, opts?: BackendRequestOptions): Promise<Invite> {
    const { rev } = await this.store.putDoc(toStoredInvite(invite), opts);
    return { ...invite, rev };
  }
}
