/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOW TO USE:
 * - Called from app/build-app.ts.
 * - Global request context (requestId + abort signal) and auth context (claims) are attached here.
 */

import Fastify from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';
import { logger } from '../shared/logger/logger';
import { registerRequestContext } from '../shared/http/request-context';
import { registerAuthContext } from '../shared/http/auth-context';
import { HeaderAuthenticator } from '../shared/http/header-authenticator';
import { registerErrorHandler } from '../shared/http/error-handler';

export async function buildServer(opts: { config: AppConfig; deps: AppDeps }) {
  const app = Fastify({
    logger: false, // we use our own Winston logger
    bodyLimit: 5 * 1024 * 1024,
  });

  // Global context plugins
  registerRequestContext(app);
  registerAuthContext(app, {
    authenticator: new HeaderAuthenticator(opts.config.auth.headerPrefix),
    adminSubjects: opts.config.auth.adminSubjects,
  });

  registerErrorHandler(app);

  // Basic request logging (requestId + authenticated user)
  app.addHook('onRequest', (req, _reply, done) => {
    logger.info('request', {
      method: req.method,
      url: req.url,
      requestId: req.requestContext.requestId,
      userId: req.authContext.userId,
    });
    done();
  });

  app.addHook('onClose', async () => {
    await opts.deps.close();
  });

  return app;
}
