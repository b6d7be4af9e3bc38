/**
 * backend/src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError.
 * - We need consistent error responses across all endpoints.
 * - Internal details (meta, stack traces) must never leak to clients.
 *
 * RESPONSIBILITIES:
 * - AppError → map .status and .code to structured HTTP response.
 * - Zod validation errors → 400 (safety net if controller misses).
 * - Fastify client errors (bad JSON body, payload too large) → 400-range VALIDATION_ERROR.
 * - Unexpected errors → 500 with generic message.
 * - Log all errors with request context for debugging.
 *
 * RULES:
 * - No business logic here.
 * - Never expose .meta or stack traces in responses. The only exception is the
 *   `fields` list of IMMUTABLE_FIELD, which is the whole point of that error.
 * - Always use withRequestContext(req) so requestId and userId are in every log line.
 */

import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';

import { withRequestContext } from '../logger/with-context';
import { AppError } from './errors';

type ErrorResponseBody = {
  error: {
    code: string;
    message: string;
    fields?: string[];
  };
};

const SENSITIVE_META_KEYS = new Set(['password', 'authorization', 'secret', 'subject']);

function redactMeta(meta: unknown): unknown {
  if (!meta || typeof meta !== 'object') return meta;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = SENSITIVE_META_KEYS.has(k) ? '[REDACTED]' : v;
  }
  return out;
}

function immutableFields(err: AppError): string[] | undefined {
  if (err.code !== 'IMMUTABLE_FIELD') return undefined;
  const fields = err.meta?.fields;
  return Array.isArray(fields) ? fields.filter((f): f is string => typeof f === 'string') : [];
}

function buildResponse(code: string, message: string, fields?: string[]): ErrorResponseBody {
  return fields ? { error: { code, message, fields } } : { error: { code, message } };
}

function isClientFastifyError(err: unknown): err is FastifyError & { statusCode: number } {
  if (!(err instanceof Error)) return false;
  const statusCode: unknown = Reflect.get(err, 'statusCode');
  return typeof statusCode === 'number' && statusCode >= 400 && statusCode < 500;
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: Error, req: FastifyRequest, reply: FastifyReply) => {
    const log = withRequestContext(req);

    // 1) Known application errors
    if (err instanceof AppError) {
      const level = err.status >= 500 ? 'error' : 'warn';
      log[level]('app_error', {
        flow: 'http.error',
        code: err.code,
        status: err.status,
        message: err.message,
        meta: redactMeta(err.meta),
      });

      return reply
        .status(err.status)
        .send(buildResponse(err.code, err.message, immutableFields(err)));
    }

    // 2) Zod safety net
    if (err instanceof ZodError) {
      log.warn('validation_error', {
        flow: 'http.error',
        issues: err.issues.map((i) => ({ path: i.path.join('.'), code: i.code })),
      });

      return reply.status(400).send(buildResponse('VALIDATION_ERROR', 'Invalid request.'));
    }

    // 3) Fastify client errors (malformed JSON, unsupported media type, ...)
    if (isClientFastifyError(err)) {
      log.warn('client_error', {
        flow: 'http.error',
        status: err.statusCode,
        fastifyCode: err.code,
        message: err.message,
      });

      return reply.status(err.statusCode).send(buildResponse('VALIDATION_ERROR', err.message));
    }

    // 4) Unexpected errors: never leak internals
    log.error('unhandled_error', {
      flow: 'http.error',
      message: err.message,
      stack: err.stack,
    });

    return reply.status(500).send(buildResponse('INTERNAL', 'Internal server error'));
  });
}
