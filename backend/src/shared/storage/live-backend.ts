/**
 * backend/src/shared/storage/live-backend.ts
 *
 * WHY:
 * - Talks to a real CouchDB server over HTTP with basic auth.
 *
 * RULES:
 * - Global WHATWG fetch (Node >= 20); injectable for tests.
 * - HTTP error statuses are returned as { status, body }; DocumentStore classifies them.
 * - Timeout, caller abort and network failure -> StorageErrors.backendUnavailable.
 * - Never retries. Never logs credentials.
 */

import { logger as defaultLogger, type Logger } from '../logger/logger';
import { StorageErrors } from './storage.errors';
import {
  isJsonValue,
  type BackendRequestOptions,
  type BackendResponse,
  type HttpMethod,
  type JsonValue,
  type StorageBackend,
} from './storage-backend';

export type FetchLike = (
  url: string,
  init: {
    method: string;
    headers: Record<string, string>;
    body?: string;
    signal: AbortSignal;
  },
) => Promise<{ status: number; text(): Promise<string> }>;

export type LiveBackendOptions = {
  baseUrl: string;
  username?: string;
  password?: string;
  timeoutMs: number;
  fetchFn?: FetchLike;
  logger?: Logger;
};

type FailureReason = 'timeout' | 'aborted' | 'network';

export class LiveBackend implements StorageBackend {
  readonly kind = 'live' as const;

  private readonly baseUrl: string;
  private readonly authHeader: string | null;
  private readonly fetchFn: FetchLike;
  private readonly logger: Logger;

  constructor(private readonly opts: LiveBackendOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, '');
    this.authHeader =
      opts.username !== undefined && opts.username.length > 0
        ? `Basic ${Buffer.from(`${opts.username}:${opts.password ?? ''}`).toString('base64')}`
        : null;
    this.fetchFn = opts.fetchFn ?? ((url, init) => fetch(url, init));
    this.logger = opts.logger ?? defaultLogger;
  }

  async get(
    path: string,
    method: HttpMethod,
    body?: JsonValue,
    reqOpts: BackendRequestOptions = {},
  ): Promise<BackendResponse> {
    const timeoutMs = reqOpts.timeoutMs ?? this.opts.timeoutMs;
    const callerSignal = reqOpts.signal;

    if (callerSignal?.aborted) throw this.unavailable('aborted', method, path);

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onCallerAbort = () => controller.abort();
    callerSignal?.addEventListener('abort', onCallerAbort, { once: true });

    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.authHeader) headers.Authorization = this.authHeader;

    const init: Parameters<FetchLike>[1] = { method, headers, signal: controller.signal };
    if (body !== undefined && method !== 'GET' && method !== 'HEAD') {
      headers['Content-Type'] = 'application/json';
      init.body = JSON.stringify(body);
    }

    try {
      const res = await this.fetchFn(`${this.baseUrl}${path}`, init);
      const raw = await res.text();
      return { status: res.status, body: parseBody(raw) };
    } catch (err) {
      const reason: FailureReason = timedOut ? 'timeout' : callerSignal?.aborted ? 'aborted' : 'network';
      this.logger.warn('storage.backend_unavailable', {
        flow: 'storage',
        backend: 'live',
        reason,
        method,
        path,
        timeoutMs,
        err,
      });
      throw this.unavailable(reason, method, path);
    } finally {
      clearTimeout(timer);
      callerSignal?.removeEventListener('abort', onCallerAbort);
    }
  }

  async close(): Promise<void> {
    // fetch keeps no per-client resources.
  }

  private unavailable(reason: FailureReason, method: HttpMethod, path: string) {
    return StorageErrors.backendUnavailable({ backend: 'live', reason, method, path });
  }
}

function parseBody(raw: string): JsonValue {
  if (raw.length === 0) return null;

  // Proxies in front of CouchDB sometimes answer with HTML error pages.
  const invalid = { error: 'invalid_response', reason: raw.slice(0, 200) };

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return invalid;
  }
  return isJsonValue(parsed) ? parsed : invalid;
}
