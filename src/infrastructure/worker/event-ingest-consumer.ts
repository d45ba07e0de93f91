import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import { OverloadedError, ValidationError } from '../../domain/index.js';
import { rawPayloadSchema } from '../../application/event-schema.js';
import { runInTraceScope } from '../../application/trace-context.js';
import type { Tracer } from '../../application/tracer.js';
import { EVENT_STREAM_KEY } from '../redis/event-producer.js';
import { runStreamConsumer, type EntryHandler } from './stream-consumer.js';

const GROUP_NAME = 'traceline';

/**
 * Builds the handler that turns `trace_events` stream entries into
 * ingested events.
 *
 * Poison entries (bad JSON, failed validation) are acknowledged and
 * logged. An overloaded hub leaves the entry pending for redelivery.
 * Each entry is captured in its own trace scope.
 */
export function createEventEntryHandler(tracer: Tracer, log: Logger): EntryHandler {
  return async (entry) => {
    const body = entry.fields.get('event');
    if (body === undefined) {
      log.warn({ streamId: entry.id }, 'Stream entry has no event field, skipping');
      return 'ack';
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(body);
    } catch (err: unknown) {
      log.warn({ err, streamId: entry.id }, 'Malformed event entry, skipping');
      return 'ack';
    }

    const raw = rawPayloadSchema.safeParse(decoded);
    if (!raw.success) {
      log.warn({ streamId: entry.id }, 'Event entry is not an object, skipping');
      return 'ack';
    }

    try {
      const accepted = runInTraceScope(() => tracer.capture(raw.data));
      log.debug({ streamId: entry.id, id: accepted.id, trace_id: accepted.trace_id }, 'Event ingested from stream');
      return 'ack';
    } catch (err: unknown) {
      if (err instanceof ValidationError) {
        log.warn({ streamId: entry.id, issues: err.issues }, 'Invalid event entry, skipping');
        return 'ack';
      }
      if (err instanceof OverloadedError) {
        log.warn({ streamId: entry.id, pendingWrites: err.pendingWrites }, 'Hub overloaded — leaving entry pending');
        return 'retry';
      }
      throw err;
    }
  };
}

/**
 * Consumes raw events published by remote producers and ingests them.
 * Resolves when `signal` is aborted.
 */
export function startEventIngestConsumer(
  redis: Redis,
  tracer: Tracer,
  log: Logger,
  signal: AbortSignal,
  consumer = process.env['WORKER_ID'] ?? 'collector-1',
): Promise<void> {
  const consumerLog = log.child({ component: 'event-ingest-consumer' });
  return runStreamConsumer(
    redis,
    consumerLog,
    signal,
    { stream: EVENT_STREAM_KEY, group: GROUP_NAME, consumer },
    createEventEntryHandler(tracer, consumerLog),
  );
}
