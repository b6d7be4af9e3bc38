/**
 * backend/src/shared/http/request-context.ts
 *
 * WHY:
 * - A stable requestId for logs and debugging.
 * - An AbortSignal that fires when the client goes away, so in-flight storage
 *   round trips are cancelled instead of finishing for nobody.
 *
 * HOW TO USE:
 * - Registered once in app/server.ts via registerRequestContext(app).
 * - After registration, every request has `req.requestContext`.
 * - Pass `req.requestContext` down as the CallContext of service calls.
 *
 * RULES:
 * - The signal is only aborted when the socket closes before the response was written.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { randomUUID } from 'node:crypto';

/** What services need from the caller: log correlation + cancellation. */
export type CallContext = {
  requestId?: string;
  signal?: AbortSignal;
};

export type RequestContext = {
  requestId: string;
  signal: AbortSignal;
};

declare module 'fastify' {
  interface FastifyRequest {
    requestContext: RequestContext;
  }
}

const REQUEST_ID_RE = /^[A-Za-z0-9._-]{1,128}$/;

function pickRequestId(raw: unknown): string {
  if (typeof raw === 'string' && REQUEST_ID_RE.test(raw)) return raw;
  return randomUUID();
}

export function registerRequestContext(app: FastifyInstance) {
  // We decorate the request so TypeScript + Fastify know the property exists.
  // We'll assign the real value on each request in the onRequest hook.
  app.decorateRequest('requestContext', null as unknown as RequestContext);

  // IMPORTANT: Fastify hooks must either be async OR accept `done`.
  app.addHook('onRequest', (req: FastifyRequest, reply: FastifyReply, done) => {
    const controller = new AbortController();

    reply.raw.once('close', () => {
      if (!reply.raw.writableEnded) controller.abort();
    });

    req.requestContext = {
      requestId: pickRequestId(req.headers['x-request-id']),
      signal: controller.signal,
    };

    reply.header('x-request-id', req.requestContext.requestId);

    done();
  });
}
