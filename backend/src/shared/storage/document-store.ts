/**
 * backend/src/shared/storage/document-store.ts
 *
 * WHY:
 * - Typed wrapper over a StorageBackend bound to one database.
 * - Turns CouchDB status codes and error bodies into AppErrors so modules
 *   never look at raw `{ status, body }`.
 *
 * RULES:
 * - 404 on a single-document read is "absent" (null), not an error.
 * - 409 -> CONFLICT. 5xx -> BACKEND_UNAVAILABLE. Other non-2xx -> INTERNAL.
 * - Response bodies are validated with zod before they are trusted.
 * - No retries here (only the virtual table handler retries).
 */

import { z } from 'zod';

import type { AppError } from '../http/errors';
import { logger as defaultLogger, type Logger } from '../logger/logger';
import { StorageErrors } from './storage.errors';
import {
  isCouchDoc,
  isJsonObject,
  parseSeq,
  type BackendRequestOptions,
  type BackendResponse,
  type CouchDoc,
  type HttpMethod,
  type JsonObject,
  type JsonValue,
  type StorageBackend,
} from './storage-backend';

export type WriteResult = { id: string; rev: string };

export type CreateIfAbsentResult = { created: true; rev: string } | { created: false };

export type BulkResult =
  | { ok: true; id: string; rev: string }
  | { ok: false; id: string; error: string; reason: string };

export type ChangeRow = {
  seq: number;
  id: string;
  rev: string;
  deleted: boolean;
  doc?: CouchDoc;
};

export type ChangesPage = {
  results: ChangeRow[];
  lastSeq: number;
  pending: number;
};

export type FindOptions = BackendRequestOptions & {
  limit?: number;
  skip?: number;
};

export type ChangesParams = {
  since: number;
  limit?: number;
  includeDocs?: boolean;
};

const DEFAULT_FIND_LIMIT = 1000;

const SeqSchema = z.union([z.number(), z.string()]);

const WriteResponseSchema = z.object({
  id: z.string(),
  rev: z.string(),
});

const FindResponseSchema = z.object({
  docs: z.array(z.unknown()),
});

const BulkResponseSchema = z.array(
  z.object({
    id: z.string().optional(),
    rev: z.string().optional(),
    error: z.string().optional(),
    reason: z.string().optional(),
  }),
);

const ChangesResponseSchema = z.object({
  results: z.array(
    z.object({
      seq: SeqSchema,
      id: z.string(),
      changes: z.array(z.object({ rev: z.string() })),
      deleted: z.boolean().optional(),
      doc: z.unknown().optional(),
    }),
  ),
  last_seq: SeqSchema,
  pending: z.number().optional(),
});

function errorName(body: JsonValue): string | undefined {
  return isJsonObject(body) && typeof body.error === 'string' ? body.error : undefined;
}

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

export class DocumentStore {
  constructor(
    private readonly backend: StorageBackend,
    readonly database: string,
    private readonly logger: Logger = defaultLogger,
  ) {}

  get backendKind(): StorageBackend['kind'] {
    return this.backend.kind;
  }

  /** True when the backend answers `GET /`. Never throws for transport failures. */
  async ping(opts?: BackendRequestOptions): Promise<boolean> {
    try {
      const res = await this.backend.get('/', 'GET', undefined, opts);
      return isSuccess(res.status);
    } catch (err) {
      this.logger.warn('storage.ping_failed', { flow: 'storage', database: this.database, err });
      return false;
    }
  }

  /** PUT /{db}; an existing database is fine. */
  async ensureDatabase(opts?: BackendRequestOptions): Promise<{ created: boolean }> {
    const res = await this.request(`/${encodeURIComponent(this.database)}`, 'PUT', undefined, opts);
    if (isSuccess(res.status)) return { created: true };
    if (res.status === 412) return { created: false };
    throw this.fail(res, 'ensure_database');
  }

  async getDoc(id: string, opts?: BackendRequestOptions): Promise<CouchDoc | null> {
    const res = await this.request(this.docPath(id), 'GET', undefined, opts);
    if (res.status === 404) return null;
    if (!isSuccess(res.status)) throw this.fail(res, 'get', id);
    if (!isCouchDoc(res.body)) throw StorageErrors.unexpectedResponse({ op: 'get', id });
    return res.body;
  }

  /** Rev-checked write. The doc must carry its current `_rev` unless it is new. */
  async putDoc(doc: CouchDoc, opts?: BackendRequestOptions): Promise<WriteResult> {
    const res = await this.request(this.docPath(doc._id), 'PUT', doc, opts);
    if (!isSuccess(res.status)) throw this.fail(res, 'put', doc._id);
    return this.parse(WriteResponseSchema, res.body, 'put');
  }

  /**
   * Create-if-absent (compare-and-swap on "no revision").
   * A concurrent creator winning the race is reported as `{ created: false }`.
   */
  async createIfAbsent(doc: CouchDoc, opts?: BackendRequestOptions): Promise<CreateIfAbsentResult> {
    const fresh: CouchDoc = { ...doc };
    delete fresh._rev;
    const res = await this.request(this.docPath(doc._id), 'PUT', fresh, opts);
    if (res.status === 409) return { created: false };
    if (!isSuccess(res.status)) throw this.fail(res, 'create', doc._id);
    const { rev } = this.parse(WriteResponseSchema, res.body, 'create');
    return { created: true, rev };
  }

  async find(selector: JsonObject, opts: FindOptions = {}): Promise<CouchDoc[]> {
    const { limit = DEFAULT_FIND_LIMIT, skip = 0, ...reqOpts } = opts;
    const res = await this.request(
      `/${encodeURIComponent(this.database)}/_find`,
      'POST',
      { selector, limit, skip },
      reqOpts,
    );
    if (!isSuccess(res.status)) throw this.fail(res, 'find');
    return this.parse(FindResponseSchema, res.body, 'find').docs.filter(isCouchDoc);
  }

  /** One `_bulk_docs` round trip. Per-document failures come back as results, not throws. */
  async bulkDocs(docs: readonly CouchDoc[], opts?: BackendRequestOptions): Promise<BulkResult[]> {
    const res = await this.request(
      `/${encodeURIComponent(this.database)}/_bulk_docs`,
      'POST',
      { docs: [...docs] },
      opts,
    );
    if (!isSuccess(res.status)) throw this.fail(res, 'bulk_docs');

    return this.parse(BulkResponseSchema, res.body, 'bulk_docs').map((row, index): BulkResult => {
      const id = row.id ?? docs[index]?._id ?? '';
      if (row.error === undefined && row.rev !== undefined) return { ok: true, id, rev: row.rev };
      return { ok: false, id, error: row.error ?? 'unknown_error', reason: row.reason ?? '' };
    });
  }

  async changes(params: ChangesParams, opts?: BackendRequestOptions): Promise<ChangesPage> {
    const query = new URLSearchParams({ since: String(params.since) });
    if (params.limit !== undefined) query.set('limit', String(params.limit));
    if (params.includeDocs) query.set('include_docs', 'true');

    const res = await this.request(
      `/${encodeURIComponent(this.database)}/_changes?${query.toString()}`,
      'GET',
      undefined,
      opts,
    );
    if (!isSuccess(res.status)) throw this.fail(res, 'changes');

    const parsed = this.parse(ChangesResponseSchema, res.body, 'changes');
    return {
      results: parsed.results.map((row) => ({
        seq: parseSeq(row.seq),
        id: row.id,
        rev: row.changes[0]?.rev ?? '',
        deleted: row.deleted === true,
        ...(isCouchDoc(row.doc) ? { doc: row.doc } : {}),
      })),
      lastSeq: parseSeq(parsed.last_seq),
      pending: parsed.pending ?? 0,
    };
  }

  // ── internals ───────────────────────────────────────────

  private docPath(id: string): string {
    return `/${encodeURIComponent(this.database)}/${encodeURIComponent(id)}`;
  }

  private request(
    path: string,
    method: HttpMethod,
    body: JsonValue | undefined,
    opts: BackendRequestOptions | undefined,
  ): Promise<BackendResponse> {
    return this.backend.get(path, method, body, opts);
  }

  private parse<T>(schema: z.ZodType<T>, body: JsonValue, op: string): T {
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      this.logger.error('storage.unexpected_response', {
        flow: 'storage',
        database: this.database,
        op,
        issues: parsed.error.issues,
      });
      throw StorageErrors.unexpectedResponse({ op });
    }
    return parsed.data;
  }

  private fail(res: BackendResponse, op: string, id?: string): AppError {
    const meta = { database: this.database, op, id, status: res.status, error: errorName(res.body) };

    if (res.status === 409) return StorageErrors.conflict(meta);

    if (res.status >= 500) {
      this.logger.warn('storage.backend_error', { flow: 'storage', ...meta });
      return StorageErrors.backendUnavailable(meta);
    }

    this.logger.error('storage.request_rejected', { flow: 'storage', ...meta });
    return StorageErrors.requestRejected(meta);
  }
}
