/**
 * backend/src/modules/virtual-tables/index.ts
 *
 * WHY:
 * - Public surface of the virtual tables module.
 */

export { createVirtualTableModule } from './virtual-table.module';
export type { VirtualTableModule } from './virtual-table.module';
export { VirtualTableHandler } from './virtual-table.handler';
export { ACTIVE_TENANT_HEADER, TENANT_REFRESH_HEADER, beginRequest } from './request-scope';
export type { RequestScope, TenantContextResolver } from './request-scope';
export type {
  BulkOpResult,
  ChangesResult,
  Requester,
  TenantContext,
  WriteAck,
} from './virtual-table.types';
