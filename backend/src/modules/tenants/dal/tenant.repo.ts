/**
 * backend/src/modules/tenants/dal/tenant.repo.ts
 *
 * WHY:
 * - DAL for tenant documents in the shared CouchDB database.
 *
 * RULES:
 * - No AppError of its own.
 * - No policies.
 * - Documents that do not parse as tenants are treated as absent and logged.
 */

import { z } from 'zod';

import type { Logger } from '../../../shared/logger/logger';
import type { BulkResult, DocumentStore } from '../../../shared/storage/document-store';
import { JsonObjectSchema } from '../../../shared/storage/json.schemas';
import type { BackendRequestOptions, CouchDoc } from '../../../shared/storage/storage-backend';
import type { NewTenantDocument, TenantDocument } from '../tenant.types';

const EPOCH = new Date(0).toISOString();

const StoredTenantSchema = z.object({
  _id: z.string(),
  _rev: z.string(),
  type: z.literal('tenant'),
  ownerId: z.string(),
  memberIds: z.array(z.string()),
  name: z.string().default(''),
  metadata: JsonObjectSchema.default({}),
  personal: z.boolean().default(false),
  deleted: z.boolean().default(false),
  createdAt: z.string().default(EPOCH),
  updatedAt: z.string().default(EPOCH),
});

export type TenantChangeRow = {
  seq: number;
  id: string;
  tenant: TenantDocument | null;
};

export function toStoredTenant(tenant: NewTenantDocument & { rev?: string }): CouchDoc {
  const doc: CouchDoc = {
    _id: tenant.id,
    type: 'tenant',
    ownerId: tenant.ownerId,
    memberIds: [...tenant.memberIds],
    name: tenant.name,
    metadata: tenant.metadata,
    personal: tenant.personal,
    deleted: tenant.deleted,
    createdAt: tenant.createdAt,
    updatedAt: tenant.updatedAt,
  };
  if (tenant.rev !== undefined) doc._rev = tenant.rev;
  return doc;
}

export class TenantRepo {
  constructor(
    private readonly store: DocumentStore,
    private readonly logger: Logger,
  ) {}

  fromStored(doc: CouchDoc): TenantDocument | null {
    if (doc.type !== 'tenant') return null;

    const parsed = StoredTenantSchema.safeParse(doc);
    if (!parsed.success) {
      this.logger.warn('storage.malformed_document', {
        flow: 'storage',
        collection: 'tenant',
        id: doc._id,
        issues: parsed.error.issues.map((i) => i.path.join('.')),
      });
      return null;
    }

    const { _id, _rev, ...fields } = parsed.data;
    return { ...fields, id: _id, rev: _rev };
  }

  async getById(id: string, opts?: BackendRequestOptions): Promise<TenantDocument | null> {
    const doc = await this.store.getDoc(id, opts);
    return doc ? this.fromStored(doc) : null;
  }

  /** Live tenants the user belongs to, ordered by id. */
  async listForMember(userId: string, opts?: BackendRequestOptions): Promise<TenantDocument[]> {
    const docs = await this.store.find(
      {
        type: 'tenant',
        memberIds: { $elemMatch: { $eq: userId } },
        deleted: { $ne: true },
      },
      opts,
    );
    return docs.map((doc) => this.fromStored(doc)).filter((t): t is TenantDocument => t !== null);
  }

  /** Create-if-absent. Returns null when the id is already taken. */
  async create(tenant: NewTenantDocument, opts?: BackendRequestOptions): Promise<TenantDocument | null> {
    const result = await this.store.createIfAbsent(toStoredTenant(tenant), opts);
    return result.created ? { ...tenant, rev: result.rev } : null;
  }

  async save(tenant: TenantDocument, opts?: BackendRequestOptions): Promise<TenantDocument> {
    const { rev } = await this.store.putDoc(toStoredTenant(tenant), opts);
    return { ...tenant, rev };
  }

  /** New tenants (no rev yet) and updates may be mixed in one round trip. */
  async bulkSave(
    tenants: ReadonlyArray<NewTenantDocument & { rev?: string }>,
    opts?: BackendRequestOptions,
  ): Promise<BulkResult[]> {
    return this.store.bulkDocs(tenants.map(toStoredTenant), opts);
  }

  async changesSince(
    since: number,
    opts?: BackendRequestOptions,
  ): Promise<{ rows: TenantChangeRow[]; lastSeq: number }> {
    const page = await this.store.changes({ since, includeDocs: true }, opts);
    const rows = page.results.map((row) => ({
      seq: row.seq,
      id: row.id,
      tenant: row.doc && !row.deleted ? this.fromStored(row.doc) : null,
    }));
    return { rows, lastSeq: page.lastSeq };
  }
}
