/**
 * backend/src/modules/virtual-tables/virtual-table.types.ts
 *
 * WHY:
 * - Result shapes of the virtual table handler. These are what the HTTP layer sends.
 *
 * RULES:
 * - Every `id` here is EXTERNAL.
 */

import type { AppErrorCode } from '../../shared/http/errors';
import type { TenantView } from '../tenants';
import type { UserView } from '../users';

export type Requester = {
  /** Internal user id. */
  userId: string;
  administrative: boolean;
  /** Tenant this request works in (resolved context, hint included). Counts as "in use" for deletes. */
  activeTenantId?: string;
};

export type TenantContextSource = 'hint' | 'cache' | 'document' | 'bootstrap';

export type TenantContext = {
  userId: string;
  activeTenantId: string;
  /** The request triggered a bootstrap; the client should refresh its token. */
  bootstrapped: boolean;
  source: TenantContextSource;
};

/** CouchDB-style write acknowledgement. */
export type WriteAck = {
  ok: true;
  id: string;
  rev: string;
};

export type BulkOpFailure = {
  ok: false;
  id: string | null;
  error: AppErrorCode;
  reason: string;
  fields?: string[];
};

export type BulkOpResult = WriteAck | BulkOpFailure;

export type ChangeEntry<TView> = {
  seq: number;
  id: string;
  rev: string;
  doc: TView;
};

export type ChangesResult<TView> = {
  results: ChangeEntry<TView>[];
  lastSeq: number;
};

export type UserChanges = ChangesResult<UserView>;
export type TenantChanges = ChangesResult<TenantView>;
