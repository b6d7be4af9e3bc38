/**
 * backend/src/modules/tenants/tenant.types.ts
 *
 * WHY:
 * - Domain types for the `__tenants` virtual collection.
 *
 * RULES:
 * - ownerId and memberIds hold INTERNAL user ids; ownerId is always in memberIds.
 * - Membership changes go through addMember/removeMember, never through a document write.
 */

import type { JsonObject } from '../../shared/storage/storage-backend';

export type TenantId = string;

export type TenantDocument = {
  type: 'tenant';
  id: TenantId;
  rev: string;

  ownerId: string;
  memberIds: string[];

  name: string;
  metadata: JsonObject;

  /** Created by bootstrap for exactly one user. */
  personal: boolean;

  deleted: boolean;
  createdAt: string;
  updatedAt: string;
};

export type NewTenantDocument = Omit<TenantDocument, 'rev'>;

export const TENANT_IMMUTABLE_KEYS = [
  '_id',
  'type',
  'ownerId',
  'memberIds',
  'personal',
  'deleted',
  'createdAt',
  'updatedAt',
] as const;

/** What clients see: user references are external ids. */
export type TenantView = {
  _id: string;
  _rev: string;
  type: 'tenant';
  ownerId: string;
  memberIds: string[];
  name: string;
  metadata: JsonObject;
  personal: boolean;
  deleted: boolean;
  createdAt: string;
  updatedAt: string;
};
