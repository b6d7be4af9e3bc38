/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 *
 * HOW TO USE:
 * - In dev, we load backend/.env via dotenv.
 * - In prod, the platform injects env vars (no file).
 *
 * TYPING:
 * - nodeEnv, storage.backend and cache.driver are unions, so di.ts branches are
 *   exhaustive and invalid values ('prod', 'couch') fail at startup in Zod.
 */

import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const csv = z
  .string()
  .default('')
  .transform((raw) =>
    raw
      .split(',')
      .map((s) => s.trim())
      .filter((s) => s.length > 0),
  );

const ConfigSchema = z
  .object({
    NODE_ENV: NodeEnvSchema,
    PORT: z.coerce.number().int().min(0).max(65535).default(3000),

    // Logging / service identity
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
    SERVICE_NAME: z.string().default('tenant-doc-gateway'),

    // Storage
    STORAGE_BACKEND: z.enum(['live', 'memory']).optional(),
    COUCHDB_URL: z.string().url().default('http://localhost:5984'),
    COUCHDB_USER: z.string().default(''),
    COUCHDB_PASSWORD: z.string().default(''),
    COUCHDB_DATABASE: z
      .string()
      .regex(/^[a-z][a-z0-9_$()+/-]*$/, 'must be a valid CouchDB database name')
      .default('couch-sitter'),
    BACKEND_TIMEOUT_MS: z.coerce.number().int().min(100).max(120_000).default(10_000),

    // Tenant context cache
    CACHE_DRIVER: z.enum(['memory', 'redis']).default('memory'),
    REDIS_URL: z.string().optional(),
    TENANT_CACHE_TTL_SECONDS: z.coerce.number().int().min(1).max(86_400).default(300),

    // Invitations
    INVITE_TTL_DAYS: z.coerce.number().int().min(1).max(90).default(7),

    // Auth
    ADMIN_SUBJECTS: csv,
    AUTH_HEADER_PREFIX: z
      .string()
      .regex(/^[a-z0-9-]+$/i)
      .default('x-auth-'),
  })
  .superRefine((env, ctx) => {
    if (env.CACHE_DRIVER === 'redis' && !env.REDIS_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['REDIS_URL'],
        message: 'REDIS_URL is required when CACHE_DRIVER=redis',
      });
    }
  });

export type NodeEnv = z.infer<typeof NodeEnvSchema>;
export type StorageBackendKind = 'live' | 'memory';
export type CacheDriver = 'memory' | 'redis';

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;

  logLevel: string;
  serviceName: string;

  storage: {
    backend: StorageBackendKind;
    couchUrl: string;
    couchUser: string;
    couchPassword: string;
    database: string;
    timeoutMs: number;
  };

  cache: {
    driver: CacheDriver;
    redisUrl: string | null;
    tenantContextTtlSeconds: number;
  };

  invites: {
    ttlDays: number;
  };

  auth: {
    adminSubjects: string[];
    headerPrefix: string;
  };
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    storage: {
      // Tests never talk to a real server unless asked to.
      backend: parsed.STORAGE_BACKEND ?? (parsed.NODE_ENV === 'test' ? 'memory' : 'live'),
      couchUrl: parsed.COUCHDB_URL,
      couchUser: parsed.COUCHDB_USER,
      couchPassword: parsed.COUCHDB_PASSWORD,
      database: parsed.COUCHDB_DATABASE,
      timeoutMs: parsed.BACKEND_TIMEOUT_MS,
    },

    cache: {
      driver: parsed.CACHE_DRIVER,
      redisUrl: parsed.REDIS_URL ?? null,
      tenantContextTtlSeconds: parsed.TENANT_CACHE_TTL_SECONDS,
    },

    invites: {
      ttlDays: parsed.INVITE_TTL_DAYS,
    },

    auth: {
      adminSubjects: parsed.ADMIN_SUBJECTS,
      headerPrefix: parsed.AUTH_HEADER_PREFIX.toLowerCase(),
    },
  };
}
