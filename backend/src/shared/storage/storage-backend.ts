/**
 * backend/src/shared/storage/storage-backend.ts
 *
 * WHY:
 * - One collaborator boundary for everything the gateway persists.
 * - CouchDB path convention (`/{db}/{docId}`, `/{db}/_bulk_docs`, `/{db}/_changes?since=N`,
 *   `/{db}/_find`) is the contract, so LiveBackend and MemoryBackend are interchangeable
 *   and nothing above DocumentStore knows which one is wired.
 *
 * RULES:
 * - Backends never throw for HTTP-level failures (404/409/...): they return { status, body }.
 * - Backends DO throw StorageErrors.backendUnavailable for transport failures, timeouts and aborts.
 * - No retries here.
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonObject = { [key: string]: JsonValue | undefined };
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export type HttpMethod = 'GET' | 'HEAD' | 'PUT' | 'POST' | 'DELETE';

export type BackendRequestOptions = {
  /** Caller cancellation (e.g. the inbound HTTP request went away). */
  signal?: AbortSignal;
  /** Overrides the backend's default per-request timeout. */
  timeoutMs?: number;
};

export type BackendResponse = {
  status: number;
  body: JsonValue;
};

export interface StorageBackend {
  readonly kind: 'live' | 'memory';

  get(
    path: string,
    method: HttpMethod,
    body?: JsonValue,
    opts?: BackendRequestOptions,
  ): Promise<BackendResponse>;

  close(): Promise<void>;
}

/** A CouchDB document as stored (meta fields + arbitrary JSON body). */
export type CouchDoc = JsonObject & {
  _id: string;
  _rev?: string;
  _deleted?: boolean;
};

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;

  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isJsonValue);
      return Object.values(value).every((v) => v === undefined || isJsonValue(v));
    default:
      return false;
  }
}

export function isCouchDoc(value: unknown): value is CouchDoc {
  return isJsonObject(value) && typeof value._id === 'string';
}

/**
 * Numeric part of a CouchDB sequence. CouchDB 1.x uses integers, 2.x+ uses
 * `"<n>-<opaque>"` strings; both are ordered by the leading integer.
 */
export function parseSeq(raw: unknown): number {
  if (typeof raw === 'number' && Number.isFinite(raw)) return raw;
  if (typeof raw === 'string') {
    const n = Number.parseInt(raw.split('-')[0] ?? '', 10);
    return Number.isFinite(n) ? n : 0;
  }
  return 0;
}
