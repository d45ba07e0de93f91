import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { ValidationError } from '../../domain/index.js';
import {
  getStoreStats,
  getTraceEvents,
  getTraceTimeline,
  listRecentTraces,
  traceIdSchema,
} from '../../application/index.js';
import { parseOrThrow, safeInt } from './request-helpers.js';

type TraceParams = { Params: { trace_id: string } };

/**
 * Read-only trace query routes.
 *
 * GET /api/traces                     — most recently active traces
 * GET /api/traces/:trace_id           — events of one trace, in id order
 * GET /api/traces/:trace_id/timeline  — stages of one trace
 * GET /api/stats                      — store totals
 */
async function traceRoutes(fastify: FastifyInstance): Promise<void> {

  /**
   * GET /api/traces
   *
   * Query params: limit (1..100, default 20)
   */
  fastify.get(
    '/api/traces',
    async (
      request: FastifyRequest<{ Querystring: { limit?: string } }>,
      reply: FastifyReply,
    ) => {
      const limit = safeInt(request.query.limit);
      if (limit !== undefined && Number.isNaN(limit)) {
        throw new ValidationError('limit must be an integer', [
          { path: ['limit'], message: 'Expected an integer' },
        ]);
      }

      const result = await listRecentTraces(fastify.eventStore, { limit });
      return reply.status(200).send(result);
    },
  );

  // ── GET /api/traces/:trace_id ────────────────────────────
  fastify.get(
    '/api/traces/:trace_id',
    async (request: FastifyRequest<TraceParams>, reply: FastifyReply) => {
      const traceId = parseOrThrow(traceIdSchema, request.params.trace_id, 'Invalid trace_id');
      const result = await getTraceEvents(fastify.eventStore, traceId);
      return reply.status(200).send(result);
    },
  );

  // ── GET /api/traces/:trace_id/timeline ───────────────────
  // TraceNotFoundError → 404 via the error handler.
  fastify.get(
    '/api/traces/:trace_id/timeline',
    async (request: FastifyRequest<TraceParams>, reply: FastifyReply) => {
      const traceId = parseOrThrow(traceIdSchema, request.params.trace_id, 'Invalid trace_id');
      const timeline = await getTraceTimeline(fastify.eventStore, traceId);
      return reply.status(200).send(timeline);
    },
  );

  // ── GET /api/stats ───────────────────────────────────────
  fastify.get(
    '/api/stats',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const stats = await getStoreStats(fastify.eventStore);
      return reply.status(200).send(stats);
    },
  );
}

export default fp(traceRoutes, {
  name: 'trace-routes',
  dependencies: ['event-store'],
  fastify: '5.x',
});
