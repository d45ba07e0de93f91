import type { Redis } from 'ioredis';
import type { RawEvent } from '../../application/event-schema.js';
import { attachTraceId } from '../../application/trace-context.js';

export const EVENT_STREAM_KEY = 'trace_events';

/**
 * Producer side of the Redis Streams transport.
 *
 * Appends a raw event with `XADD *`. The trace id bound in the caller's
 * context is attached when the payload carries none, so the collector
 * files the event under the producer's trace.
 *
 * @returns The stream entry ID assigned by Redis.
 */
export async function publishRawEvent(redis: Redis, raw: RawEvent): Promise<string | null> {
  return redis.xadd(EVENT_STREAM_KEY, '*', 'event', JSON.stringify(attachTraceId(raw)));
}
