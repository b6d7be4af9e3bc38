import { buildApp } from '../../src/app/build-app';
import type { AppConfig } from '../../src/app/config';
import { buildDeps, type DepsOverrides } from '../../src/app/di';
import { InMemCache } from '../../src/shared/cache/inmem-cache';
import { MemoryBackend } from '../../src/shared/storage/memory-backend';

export const TEST_DATABASE = 'gateway-test';

export type TestConfigOverrides = {
  serviceName?: string;
  adminSubjects?: string[];
  tenantContextTtlSeconds?: number;
};

export function testConfig(overrides: TestConfigOverrides = {}): AppConfig {
  return {
    nodeEnv: 'test',
    port: 0,

    logLevel: 'error',
    serviceName: overrides.serviceName ?? 'tenant-doc-gateway',

    storage: {
      backend: 'memory',
      couchUrl: 'http://localhost:5984',
      couchUser: '',
      couchPassword: '',
      database: TEST_DATABASE,
      timeoutMs: 1000,
    },

    cache: {
      driver: 'memory',
      redisUrl: null,
      tenantContextTtlSeconds: overrides.tenantContextTtlSeconds ?? 300,
    },

    invites: {
      ttlDays: 7,
    },

    auth: {
      adminSubjects: overrides.adminSubjects ?? [],
      headerPrefix: 'x-auth-',
    },
  };
}

function withDefaults(deps: DepsOverrides): DepsOverrides {
  return {
    backend: deps.backend ?? new MemoryBackend({ databases: [TEST_DATABASE] }),
    cache: deps.cache ?? new InMemCache(),
    now: deps.now,
  };
}

/**
 * WHY:
 * - Build a Fastify app for E2E-style tests using app.inject().
 * - Keeps tests clean: build once, inject, close.
 *
 * RULES:
 * - Always the memory backend + in-memory cache (no CouchDB, no Redis).
 * - Each call gets a fresh backend, so tests never share documents.
 */
export async function buildTestApp(overrides: TestConfigOverrides = {}, deps: DepsOverrides = {}) {
  const built = await buildApp(testConfig(overrides), withDefaults(deps));

  return {
    app: built.app,
    deps: built.deps,
    close: built.close,
  };
}

/** Same dependency graph without the HTTP server, for handler/service tests. */
export async function buildTestDeps(overrides: TestConfigOverrides = {}, deps: DepsOverrides = {}) {
  return buildDeps(testConfig(overrides), withDefaults(deps));
}

/** Headers a verifying proxy would forward for `subject`. */
export function authHeaders(subject: string, tenant?: string): Record<string, string> {
  const headers: Record<string, string> = { 'x-auth-subject': subject, 'x-auth-issuer': 'test-issuer' };
  if (tenant) headers['x-auth-tenant'] = tenant;
  return headers;
}
