/**
 * backend/src/modules/bootstrap/index.ts
 *
 * WHY:
 * - Public surface of the bootstrap module.
 */

export { createBootstrapModule } from './bootstrap.module';
export type { BootstrapModule } from './bootstrap.module';
export { BootstrapManager, bootstrapStateOf } from './bootstrap.manager';
export { TenantContextCache } from './tenant-context.cache';
export type { BootstrapResult, BootstrapState } from './bootstrap.types';
