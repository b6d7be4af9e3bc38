/**
 * backend/src/app/routes.ts
 *
 * WHY:
 * - Central place to register all routes:
 *   - core routes (/health)
 *   - module routes (virtual tables)
 *
 * RULES:
 * - No business logic here.
 * - Only wiring: app.get/post + handler functions.
 */

import type { FastifyInstance } from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';

export function registerRoutes(app: FastifyInstance, opts: { config: AppConfig; deps: AppDeps }) {
  // Core health endpoint (E2E smoke + platform checks)
  app.get('/health', async (req, reply) => {
    const backendOk = await opts.deps.store.ping({ signal: req.requestContext.signal });

    return reply.status(backendOk ? 200 : 503).send({
      ok: backendOk,
      env: opts.config.nodeEnv,
      service: opts.config.serviceName,
      backend: opts.deps.store.backendKind,
      requestId: req.requestContext.requestId,
    });
  });

  // Module routes
  opts.deps.virtualTables.registerRoutes(app);
  opts.deps.invites.registerRoutes(app);
}
