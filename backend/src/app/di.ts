/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (storage backend, cache) and shares them safely.
 * - Keeps modules testable (tests inject a MemoryBackend / InMemCache / clock).
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (memory vs live backend, memory vs redis cache)
 *   belong HERE, not inside the classes themselves (DIP).
 */

import type { AppConfig } from './config';

import type { Cache } from '../shared/cache/cache';
import { InMemCache } from '../shared/cache/inmem-cache';
import { RedisCache } from '../shared/cache/redis-cache';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { Sha256TokenHasher } from '../shared/security/sha256-token-hasher';

import { DocumentStore } from '../shared/storage/document-store';
import { LiveBackend } from '../shared/storage/live-backend';
import { MemoryBackend } from '../shared/storage/memory-backend';
import type { StorageBackend } from '../shared/storage/storage-backend';

import { createBootstrapModule } from '../modules/bootstrap';
import type { BootstrapModule } from '../modules/bootstrap';

import { createInviteModule } from '../modules/invites';
import type { InviteModule } from '../modules/invites';

import { createTenantModule } from '../modules/tenants';
import type { TenantModule } from '../modules/tenants';

import { createUserModule } from '../modules/users';
import type { UserModule } from '../modules/users';

import { createVirtualTableModule } from '../modules/virtual-tables';
import type { VirtualTableModule } from '../modules/virtual-tables';

export type AppDeps = {
  backend: StorageBackend;
  store: DocumentStore;
  cache: Cache;

  logger: Logger;

  // modules
  tenants: TenantModule;
  users: UserModule;
  bootstrap: BootstrapModule;
  virtualTables: VirtualTableModule;
  invites: InviteModule;

  // lifecycle
  close: () => Promise<void>;
};

/** Test seams. Production passes nothing. */
export type DepsOverrides = {
  backend?: StorageBackend;
  cache?: Cache;
  now?: () => Date;
};

function buildBackend(config: AppConfig): StorageBackend {
  switch (config.storage.backend) {
    case 'memory':
      return new MemoryBackend({ databases: [config.storage.database] });
    case 'live':
      return new LiveBackend({
        baseUrl: config.storage.couchUrl,
        username: config.storage.couchUser,
        password: config.storage.couchPassword,
        timeoutMs: config.storage.timeoutMs,
        logger,
      });
  }
}

async function buildCache(config: AppConfig): Promise<Cache> {
  switch (config.cache.driver) {
    case 'memory':
      // Sweeps on the entry TTL so expired tenant contexts do not pile up.
      return new InMemCache({ sweepIntervalMs: config.cache.tenantContextTtlSeconds * 1000 });
    case 'redis':
      if (!config.cache.redisUrl) throw new Error('REDIS_URL is required when CACHE_DRIVER=redis');
      return RedisCache.connect(config.cache.redisUrl, { keyPrefix: `${config.storage.database}:` });
  }
}

export async function buildDeps(config: AppConfig, overrides: DepsOverrides = {}): Promise<AppDeps> {
  const backend = overrides.backend ?? buildBackend(config);
  const cache = overrides.cache ?? (await buildCache(config));
  const now = overrides.now;

  const store = new DocumentStore(backend, config.storage.database, logger);

  // Live CouchDB: create the database on first boot. Fails fast when unreachable.
  const { created } = await store.ensureDatabase();
  if (created) {
    logger.info('storage.database_created', { flow: 'storage', database: config.storage.database });
  }

  // modules (no HTTP / no business logic here)
  const tenants = createTenantModule({ store, logger, now });
  const users = createUserModule({ store, tenants: tenants.tenantRepo, logger, now });
  const bootstrap = createBootstrapModule({
    cache,
    tenantCacheTtlSeconds: config.cache.tenantContextTtlSeconds,
    userRepo: users.userRepo,
    tenantRepo: tenants.tenantRepo,
    tenantService: tenants.tenantService,
    logger,
    now,
  });
  const virtualTables = createVirtualTableModule({ users, tenants, bootstrap, logger });
  const invites = createInviteModule({
    store,
    tenants,
    contexts: virtualTables.handler,
    tokenHasher: new Sha256TokenHasher(),
    logger,
    ttlDays: config.invites.ttlDays,
    now,
  });

  return {
    backend,
    store,
    cache,
    logger,
    tenants,
    users,
    bootstrap,
    virtualTables,
    invites,
    close: async () => {
      await cache.close();
      await backend.close();
    },
  };
}
