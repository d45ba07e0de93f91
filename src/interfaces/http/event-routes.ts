import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { NormalizedEvent } from '../../domain/index.js';
import { OverloadedError, ValidationError } from '../../domain/index.js';
import { rawEventBatchSchema, rawPayloadSchema, runWithTrace } from '../../application/index.js';
import { RETRY_AFTER_SECONDS } from './error-handler.js';
import { headerTraceId, parseOrThrow } from './request-helpers.js';

/**
 * Registers the event ingestion routes.
 *
 * POST /api/events        — single event ingestion
 * POST /api/events/batch  — batch ingestion (array of events)
 * GET  /api/health        — hub counters
 *
 * Each request runs in its own trace scope seeded from `X-Trace-ID`;
 * a `trace_id` in the body wins over the header. Events of one batch
 * that carry no trace id share the trace generated for the first.
 */
async function eventRoutes(fastify: FastifyInstance): Promise<void> {

  /**
   * Single event ingestion.
   *
   * Validates → normalizes → ingests → returns 202 with the assigned id.
   */
  fastify.post(
    '/api/events',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const raw = parseOrThrow(rawPayloadSchema, request.body, 'Event body must be a JSON object');
      const event = runWithTrace(headerTraceId(request), () => fastify.tracer.capture(raw));

      return reply.status(202).send({
        status: 'accepted',
        id: event.id,
        trace_id: event.trace_id,
      });
    },
  );

  /**
   * Batch event ingestion.
   *
   * Normalizes the full array up-front: any invalid event rejects the
   * whole batch. Ingestion then runs in array order; an overload midway
   * answers 503 with the ids accepted before it.
   */
  fastify.post(
    '/api/events/batch',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const raws = parseOrThrow(rawEventBatchSchema, request.body, 'Invalid event batch');

      return runWithTrace(headerTraceId(request), () => {
        const normalized: NormalizedEvent[] = raws.map((raw, index) => {
          try {
            return fastify.tracer.normalize(raw);
          } catch (err: unknown) {
            if (!(err instanceof ValidationError)) throw err;
            throw new ValidationError(
              `Event ${index}: ${err.message}`,
              err.issues.map((issue) => ({ path: [index, ...issue.path], message: issue.message })),
            );
          }
        });

        const ids: number[] = [];
        for (const event of normalized) {
          try {
            ids.push(fastify.hub.ingest(event).id);
          } catch (err: unknown) {
            if (!(err instanceof OverloadedError)) throw err;
            request.log.warn({ accepted: ids.length, total: normalized.length }, 'Batch cut short by overload');
            return reply
              .status(503)
              .header('retry-after', String(RETRY_AFTER_SECONDS))
              .send({
                error: err.code,
                message: err.message,
                count: ids.length,
                ids,
              });
          }
        }

        return reply.status(202).send({
          status: 'accepted',
          count: ids.length,
          ids,
        });
      });
    },
  );

  /**
   * Hub health. `degraded` once any accepted event failed to persist.
   */
  fastify.get('/api/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    const hub = fastify.hub.health();
    return reply.status(200).send({
      status: hub.unpersisted > 0 ? 'degraded' : 'ok',
      hub,
    });
  });
}

export default fp(eventRoutes, {
  name: 'event-routes',
  dependencies: ['ingestion-hub'],
  fastify: '5.x',
});
