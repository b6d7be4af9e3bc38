/**
 * backend/src/modules/users/dal/user.repo.ts
 *
 * WHY:
 * - DAL for user documents in the shared CouchDB database.
 * - Owns the stored shape (`_id`, `_rev`, field names) so nothing else does.
 *
 * RULES:
 * - No AppError of its own (DocumentStore already maps storage failures).
 * - No policies.
 * - Documents that do not parse as users are treated as absent and logged.
 */

import { z } from 'zod';

import type { Logger } from '../../../shared/logger/logger';
import type {
  BulkResult,
  DocumentStore,
} from '../../../shared/storage/document-store';
import type { BackendRequestOptions, CouchDoc } from '../../../shared/storage/storage-backend';
import type { NewUserDocument, UserDocument } from '../user.types';

const EPOCH = new Date(0).toISOString();

const StoredUserSchema = z.object({
  _id: z.string(),
  _rev: z.string(),
  type: z.literal('user'),
  subject: z.string(),
  displayName: z.string().nullable().default(null),
  email: z.string().nullable().default(null),
  activeTenantId: z.string().nullable().default(null),
  personalTenantId: z.string().nullable().default(null),
  deleted: z.boolean().default(false),
  createdAt: z.string().default(EPOCH),
  updatedAt: z.string().default(EPOCH),
});

export type UserChangeRow = {
  seq: number;
  id: string;
  /** null for tombstones and for documents that are not users */
  user: UserDocument | null;
};

export function toStoredUser(user: NewUserDocument & { rev?: string }): CouchDoc {
  const doc: CouchDoc = {
    _id: user.id,
    type: 'user',
    subject: user.subject,
    displayName: user.displayName,
    email: user.email,
    activeTenantId: user.activeTenantId,
    personalTenantId: user.personalTenantId,
    deleted: user.deleted,
    createdAt: user.createdAt,
    updatedAt: user.updatedAt,
  };
  if (user.rev !== undefined) doc._rev = user.rev;
  return doc;
}

export class UserRepo {
  constructor(
    private readonly store: DocumentStore,
    private readonly logger: Logger,
  ) {}

  fromStored(doc: CouchDoc): UserDocument | null {
    if (doc.type !== 'user') return null;

    const parsed = StoredUserSchema.safeParse(doc);
    if (!parsed.success) {
      this.logger.warn('storage.malformed_document', {
        flow: 'storage',
        collection: 'user',
        id: doc._id,
        issues: parsed.error.issues.map((i) => i.path.join('.')),
      });
      return null;
    }

    const { _id, _rev, ...fields } = parsed.data;
    return { ...fields, id: _id, rev: _rev };
  }

  async getById(id: string, opts?: BackendRequestOptions): Promise<UserDocument | null> {
    const doc = await this.store.getDoc(id, opts);
    return doc ? this.fromStored(doc) : null;
  }

  /** Live users whose activeTenantId points at `tenantId`. */
  async findActiveInTenant(tenantId: string, opts?: BackendRequestOptions): Promise<UserDocument[]> {
    const docs = await this.store.find(
      { type: 'user', activeTenantId: tenantId, deleted: { $ne: true } },
      opts,
    );
    return docs.map((doc) => this.fromStored(doc)).filter((u): u is UserDocument => u !== null);
  }

  /** Create-if-absent. Returns null when a concurrent writer created it first. */
  async create(user: NewUserDocument, opts?: BackendRequestOptions): Promise<UserDocument | null> {
    const result = await this.store.createIfAbsent(toStoredUser(user), opts);
    return result.created ? { ...user, rev: result.rev } : null;
  }

  /** Rev-checked write of the whole document; returns it with its new rev. */
  async save(user: UserDocument, opts?: BackendRequestOptions): Promise<UserDocument> {
    const { rev } = await this.store.putDoc(toStoredUser(user), opts);
    return { ...user, rev };
  }

  async bulkSave(users: readonly UserDocument[], opts?: BackendRequestOptions): Promise<BulkResult[]> {
    return this.store.bulkDocs(users.map(toStoredUser), opts);
  }

  async changesSince(
    since: number,
    opts?: BackendRequestOptions,
  ): Promise<{ rows: UserChangeRow[]; lastSeq: number }> {
    const page = await this.store.changes({ since, includeDocs: true }, opts);
    const rows = page.results.map((row) => ({
      seq: row.seq,
      id: row.id,
      user: row.doc && !row.deleted ? this.fromStored(row.doc) : null,
    }));
    return { rows, lastSeq: page.lastSeq };
  }
}
