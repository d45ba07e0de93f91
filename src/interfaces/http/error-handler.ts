import type { FastifyError, FastifyInstance } from 'fastify';
import { OverloadedError, TracelineError, ValidationError } from '../../domain/index.js';

/** Seconds a client should wait after a 503 OVERLOADED. */
export const RETRY_AFTER_SECONDS = 1;

/**
 * Maps errors thrown by route handlers onto HTTP responses.
 *
 * - TracelineError → its status and `{ error: code, message }`
 *   (plus `issues` for validation failures, `Retry-After` on overload).
 * - Fastify's own client errors (bad JSON, body too large) keep their status.
 * - Anything else is logged and answered with 500 INTERNAL_ERROR.
 */
export function registerErrorHandler(fastify: FastifyInstance): void {
  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof TracelineError) {
      if (error instanceof OverloadedError) {
        reply.header('retry-after', String(RETRY_AFTER_SECONDS));
      }
      if (error.statusCode >= 500) {
        request.log.error({ err: error }, error.message);
      }
      return reply.status(error.statusCode).send({
        error: error.code,
        message: error.message,
        ...(error instanceof ValidationError ? { issues: error.issues } : {}),
      });
    }

    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        error: error.code,
        message: error.message,
      });
    }

    request.log.error({ err: error }, 'Unhandled error');
    return reply.status(500).send({
      error: 'INTERNAL_ERROR',
      message: 'Internal server error',
    });
  });
}
