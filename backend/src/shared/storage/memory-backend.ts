/**
 * backend/src/shared/storage/memory-backend.ts
 *
 * WHY:
 * - Deterministic in-process CouchDB emulation for tests and local development.
 * - Speaks the same path/status/body contract as LiveBackend, so DocumentStore
 *   cannot tell them apart.
 *
 * RULES:
 * - Every request runs under one lock (promise chain). Snapshotting `seq` and
 *   filtering the change log happen inside the same critical section.
 * - Stored documents are cloned in and out; callers never hold a reference to state.
 * - Revisions are `N-<32 hex>` derived from the previous rev and the content.
 * - `_local/` documents never enter the change log.
 * - An aborted signal means BACKEND_UNAVAILABLE, same as a dead server.
 */

import { createHash, randomUUID } from 'node:crypto';

import { StorageErrors } from './storage.errors';
import { matchesSelector, SelectorError } from './selector';
import {
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

type ChangeEntry = {
  seq: number;
  id: string;
  rev: string;
  deleted: boolean;
};

type DatabaseState = {
  documents: Map<string, CouchDoc>;
  changeLog: ChangeEntry[];
  localCheckpoints: Map<string, CouchDoc>;
  seq: number;
};

type WriteOutcome =
  | { ok: true; id: string; rev: string }
  | { ok: false; id: string; error: string; reason: string };

const DB_NAME_RE = /^[a-z][a-z0-9_$()+/-]*$/;
const DEFAULT_FIND_LIMIT = 25;

function reply(status: number, body: JsonValue): BackendResponse {
  return { status, body: structuredClone(body) };
}

function errorReply(status: number, error: string, reason: string): BackendResponse {
  return { status, body: { error, reason } };
}

const notFound = (reason = 'missing') => errorReply(404, 'not_found', reason);
const conflict = () => errorReply(409, 'conflict', 'Document update conflict.');
const badRequest = (reason: string) => errorReply(400, 'bad_request', reason);
const methodNotAllowed = () => errorReply(405, 'method_not_allowed', 'Method not allowed.');

function revGeneration(rev: string | undefined): number {
  if (!rev) return 0;
  const n = Number.parseInt(rev.split('-')[0] ?? '', 10);
  return Number.isFinite(n) ? n : 0;
}

function stripMeta(doc: JsonObject): JsonObject {
  const out: JsonObject = {};
  for (const [key, value] of Object.entries(doc)) {
    if (!key.startsWith('_')) out[key] = value;
  }
  return out;
}

function parseNonNegativeInt(raw: string | null, fallback: number): number | null {
  if (raw === null) return fallback;
  const n = Number(raw);
  return Number.isInteger(n) && n >= 0 ? n : null;
}

function parseBooleanFlag(raw: string | null): boolean {
  return raw === 'true';
}

export type MemoryBackendOptions = {
  /** Databases that exist from the start (PUT /{db} is not needed for them). */
  databases?: readonly string[];
};

export class MemoryBackend implements StorageBackend {
  readonly kind = 'memory' as const;

  private readonly databases = new Map<string, DatabaseState>();
  private tail: Promise<void> = Promise.resolve();

  constructor(opts: MemoryBackendOptions = {}) {
    for (const name of opts.databases ?? []) {
      this.databases.set(name, MemoryBackend.emptyDatabase());
    }
  }

  async get(
    path: string,
    method: HttpMethod,
    body?: JsonValue,
    opts: BackendRequestOptions = {},
  ): Promise<BackendResponse> {
    this.assertNotAborted(opts.signal, path);

    const input = body === undefined ? undefined : structuredClone(body);

    return this.exclusive(() => {
      this.assertNotAborted(opts.signal, path);
      return this.dispatch(path, method, input);
    });
  }

  async close(): Promise<void> {
    await this.tail;
  }

  // ── locking ─────────────────────────────────────────────

  private exclusive<T>(fn: () => T): Promise<T> {
    const run = this.tail.then(fn);
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private assertNotAborted(signal: AbortSignal | undefined, path: string): void {
    if (signal?.aborted) {
      throw StorageErrors.backendUnavailable({ backend: 'memory', reason: 'aborted', path });
    }
  }

  // ── routing ─────────────────────────────────────────────

  private dispatch(path: string, method: HttpMethod, body: JsonValue | undefined): BackendResponse {
    const queryIndex = path.indexOf('?');
    const pathname = queryIndex === -1 ? path : path.slice(0, queryIndex);
    const query = new URLSearchParams(queryIndex === -1 ? '' : path.slice(queryIndex + 1));

    let segments: string[];
    try {
      segments = pathname
        .split('/')
        .filter((s) => s.length > 0)
        .map((s) => decodeURIComponent(s));
    } catch {
      return badRequest('Malformed path encoding.');
    }

    const [dbName, second, third]: (string | undefined)[] = segments;

    if (dbName === undefined) {
      if (method !== 'GET' && method !== 'HEAD') return methodNotAllowed();
      return reply(200, {
        couchdb: 'Welcome',
        version: '3.3.3',
        vendor: { name: 'memory-backend' },
      });
    }

    if (second === undefined) return this.handleDatabase(dbName, method);

    const db = this.databases.get(dbName);
    if (!db) return notFound('Database does not exist.');

    if (segments.length === 3 && second === '_local' && third !== undefined) {
      return this.handleLocal(db, third, method, body);
    }
    if (segments.length !== 2) return notFound();

    switch (second) {
      case '_all_docs':
        return method === 'GET' ? this.allDocs(db, query) : methodNotAllowed();
      case '_find':
        return method === 'POST' ? this.find(db, body) : methodNotAllowed();
      case '_bulk_docs':
        return method === 'POST' ? this.bulkDocs(db, body) : methodNotAllowed();
      case '_bulk_get':
        return method === 'POST' ? this.bulkGet(db, body) : methodNotAllowed();
      case '_changes':
        return method === 'GET' ? this.changes(db, query) : methodNotAllowed();
      default:
        if (second.startsWith('_')) return notFound();
        return this.handleDocument(db, second, method, body, query);
    }
  }

  // ── databases ───────────────────────────────────────────

  private static emptyDatabase(): DatabaseState {
    return { documents: new Map(), changeLog: [], localCheckpoints: new Map(), seq: 0 };
  }

  private handleDatabase(name: string, method: HttpMethod): BackendResponse {
    const db = this.databases.get(name);

    switch (method) {
      case 'GET':
      case 'HEAD': {
        if (!db) return notFound('Database does not exist.');
        let docCount = 0;
        let deletedCount = 0;
        for (const doc of db.documents.values()) {
          if (doc._deleted === true) deletedCount += 1;
          else docCount += 1;
        }
        return reply(200, {
          db_name: name,
          doc_count: docCount,
          doc_del_count: deletedCount,
          update_seq: db.seq,
        });
      }
      case 'PUT':
        if (!DB_NAME_RE.test(name)) {
          return errorReply(400, 'illegal_database_name', `Name: '${name}' is not a valid database name.`);
        }
        if (db) {
          return errorReply(
            412,
            'file_exists',
            'The database could not be created, the file already exists.',
          );
        }
        this.databases.set(name, MemoryBackend.emptyDatabase());
        return reply(201, { ok: true });
      case 'DELETE':
        if (!db) return notFound('Database does not exist.');
        this.databases.delete(name);
        return reply(200, { ok: true });
      default:
        return methodNotAllowed();
    }
  }

  // ── documents ───────────────────────────────────────────

  private handleDocument(
    db: DatabaseState,
    id: string,
    method: HttpMethod,
    body: JsonValue | undefined,
    query: URLSearchParams,
  ): BackendResponse {
    switch (method) {
      case 'GET':
      case 'HEAD': {
        const doc = db.documents.get(id);
        if (!doc) return notFound('missing');
        if (doc._deleted === true) return notFound('deleted');
        return reply(200, doc);
      }
      case 'PUT': {
        if (!isJsonObject(body)) return badRequest('Document must be a JSON object.');
        const outcome = this.writeDocument(db, id, body);
        return this.outcomeReply(outcome);
      }
      case 'DELETE': {
        const rev = query.get('rev') ?? undefined;
        const outcome = this.writeDocument(db, id, { _rev: rev, _deleted: true });
        return this.outcomeReply(outcome);
      }
      default:
        return methodNotAllowed();
    }
  }

  private outcomeReply(outcome: WriteOutcome): BackendResponse {
    if (outcome.ok) return reply(201, { ok: true, id: outcome.id, rev: outcome.rev });
    if (outcome.error === 'conflict') return conflict();
    if (outcome.error === 'not_found') return notFound(outcome.reason);
    return badRequest(outcome.reason);
  }

  /**
   * Rev-checked write shared by PUT, DELETE and _bulk_docs.
   * Live document: `_rev` must equal the current rev.
   * Tombstone: may be recreated without `_rev`.
   * Absent: must not carry a `_rev`.
   */
  private writeDocument(db: DatabaseState, id: string, input: JsonObject): WriteOutcome {
    if (id.length === 0 || id.startsWith('_')) {
      return { ok: false, id, error: 'bad_request', reason: 'Only reserved document ids may start with underscore.' };
    }

    const existing = db.documents.get(id);
    const live = existing && existing._deleted !== true ? existing : undefined;
    const suppliedRev = typeof input._rev === 'string' ? input._rev : undefined;
    const deleting = input._deleted === true;

    if (live) {
      if (suppliedRev !== live._rev) return { ok: false, id, error: 'conflict', reason: 'Document update conflict.' };
    } else if (existing) {
      if (suppliedRev !== undefined && suppliedRev !== existing._rev) {
        return { ok: false, id, error: 'conflict', reason: 'Document update conflict.' };
      }
      if (deleting) return { ok: false, id, error: 'not_found', reason: 'deleted' };
    } else {
      if (deleting) return { ok: false, id, error: 'not_found', reason: 'missing' };
      if (suppliedRev !== undefined) return { ok: false, id, error: 'conflict', reason: 'Document update conflict.' };
    }

    const content = deleting ? {} : stripMeta(input);
    const previousRev = existing?._rev;
    const digest = createHash('md5')
      .update(JSON.stringify({ previousRev: previousRev ?? null, deleted: deleting, content }))
      .digest('hex');
    const rev = `${revGeneration(previousRev) + 1}-${digest}`;

    const stored: CouchDoc = deleting
      ? { _id: id, _rev: rev, _deleted: true }
      : { _id: id, _rev: rev, ...content };

    db.seq += 1;
    db.documents.set(id, stored);
    db.changeLog.push({ seq: db.seq, id, rev, deleted: deleting });

    return { ok: true, id, rev };
  }

  // ── _local ──────────────────────────────────────────────

  private handleLocal(
    db: DatabaseState,
    name: string,
    method: HttpMethod,
    body: JsonValue | undefined,
  ): BackendResponse {
    const id = `_local/${name}`;
    const existing = db.localCheckpoints.get(id);

    switch (method) {
      case 'GET':
      case 'HEAD':
        return existing ? reply(200, existing) : notFound('missing');
      case 'PUT': {
        if (!isJsonObject(body)) return badRequest('Document must be a JSON object.');
        const suppliedRev = typeof body._rev === 'string' ? body._rev : undefined;
        if (existing && suppliedRev !== existing._rev) return conflict();
        const counter = Number.parseInt(existing?._rev?.split('-')[1] ?? '0', 10);
        const rev = `0-${(Number.isFinite(counter) ? counter : 0) + 1}`;
        db.localCheckpoints.set(id, { _id: id, _rev: rev, ...stripMeta(body) });
        return reply(201, { ok: true, id, rev });
      }
      case 'DELETE':
        if (!existing) return notFound('missing');
        db.localCheckpoints.delete(id);
        return reply(200, { ok: true, id, rev: '0-0' });
      default:
        return methodNotAllowed();
    }
  }

  // ── queries ─────────────────────────────────────────────

  private liveDocuments(db: DatabaseState): CouchDoc[] {
    return [...db.documents.values()]
      .filter((doc) => doc._deleted !== true)
      .sort((a, b) => (a._id < b._id ? -1 : a._id > b._id ? 1 : 0));
  }

  private allDocs(db: DatabaseState, query: URLSearchParams): BackendResponse {
    const includeDocs = parseBooleanFlag(query.get('include_docs'));
    const skip = parseNonNegativeInt(query.get('skip'), 0);
    const docs = this.liveDocuments(db);
    const limit = parseNonNegativeInt(query.get('limit'), docs.length);
    if (skip === null || limit === null) return badRequest('Invalid skip or limit.');

    const rows: JsonValue[] = docs.slice(skip, skip + limit).map((doc) => ({
      id: doc._id,
      key: doc._id,
      value: { rev: doc._rev ?? null },
      ...(includeDocs ? { doc } : {}),
    }));

    return reply(200, { total_rows: docs.length, offset: skip, rows });
  }

  private find(db: DatabaseState, body: JsonValue | undefined): BackendResponse {
    if (!isJsonObject(body) || !isJsonObject(body.selector)) {
      return badRequest('Missing required key: selector');
    }
    const selector = body.selector;
    const limit = typeof body.limit === 'number' ? body.limit : DEFAULT_FIND_LIMIT;
    const skip = typeof body.skip === 'number' ? body.skip : 0;

    let matched: CouchDoc[];
    try {
      matched = this.liveDocuments(db).filter((doc) => matchesSelector(doc, selector));
    } catch (err) {
      if (err instanceof SelectorError) return errorReply(400, 'invalid_operator', err.message);
      throw err;
    }

    return reply(200, { docs: matched.slice(skip, skip + limit), bookmark: 'nil' });
  }

  private bulkDocs(db: DatabaseState, body: JsonValue | undefined): BackendResponse {
    if (!isJsonObject(body) || !Array.isArray(body.docs)) {
      return badRequest('POST body must include `docs` parameter.');
    }

    const results: JsonValue[] = body.docs.map((doc) => {
      if (!isJsonObject(doc)) {
        return { id: '', error: 'bad_request', reason: 'Document must be a JSON object.' };
      }
      const id = typeof doc._id === 'string' ? doc._id : randomUUID().replace(/-/g, '');
      const outcome = this.writeDocument(db, id, doc);
      return outcome.ok
        ? { ok: true, id: outcome.id, rev: outcome.rev }
        : { id: outcome.id, error: outcome.error, reason: outcome.reason };
    });

    return reply(201, results);
  }

  private bulkGet(db: DatabaseState, body: JsonValue | undefined): BackendResponse {
    if (!isJsonObject(body) || !Array.isArray(body.docs)) {
      return badRequest('POST body must include `docs` parameter.');
    }

    const results: JsonValue[] = body.docs.map((entry) => {
      const id = isJsonObject(entry) && typeof entry.id === 'string' ? entry.id : '';
      const doc = db.documents.get(id);
      if (!doc || doc._deleted === true) {
        return {
          id,
          docs: [{ error: { id, rev: 'undefined', error: 'not_found', reason: doc ? 'deleted' : 'missing' } }],
        };
      }
      return { id, docs: [{ ok: doc }] };
    });

    return reply(200, { results });
  }

  private changes(db: DatabaseState, query: URLSearchParams): BackendResponse {
    const rawSince = query.get('since');
    const since = rawSince === 'now' ? db.seq : parseSeq(rawSince ?? '0');
    const limit = parseNonNegativeInt(query.get('limit'), Number.MAX_SAFE_INTEGER);
    if (limit === null) return badRequest('Invalid limit.');
    const includeDocs = parseBooleanFlag(query.get('include_docs'));

    // Latest entry per document; the log is append-only so later entries win.
    const latest = new Map<string, ChangeEntry>();
    for (const entry of db.changeLog) latest.set(entry.id, entry);

    const pending = [...latest.values()]
      .filter((entry) => entry.seq > since)
      .sort((a, b) => a.seq - b.seq);
    const page = pending.slice(0, limit);

    const results: JsonValue[] = page.map((entry) => {
      const row: JsonObject = {
        seq: entry.seq,
        id: entry.id,
        changes: [{ rev: entry.rev }],
      };
      if (entry.deleted) row.deleted = true;
      if (includeDocs) row.doc = db.documents.get(entry.id) ?? null;
      return row;
    });

    const truncated = page.length < pending.length;
    const last = page[page.length - 1];
    const lastSeq = truncated && last ? last.seq : Math.max(db.seq, since);

    return reply(200, { results, last_seq: lastSeq, pending: pending.length - page.length });
  }
}
