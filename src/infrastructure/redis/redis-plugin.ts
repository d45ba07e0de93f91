import fp from 'fastify-plugin';
import { Redis } from 'ioredis';
import type { FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import { startEventIngestConsumer } from '../worker/event-ingest-consumer.js';

export interface RedisIngestPluginOptions {
  url: string;
  log: Logger;
  consumer?: string;
}

/**
 * Fastify plugin that ingests events from the Redis `trace_events` stream.
 *
 * - Connects on server start, disconnects on close.
 * - Runs the consumer loop on its own connection (XREADGROUP BLOCK holds it).
 * - Decorates `fastify.redis` for producers living in the same process.
 */
async function redisIngestPlugin(
  fastify: FastifyInstance,
  options: RedisIngestPluginOptions,
): Promise<void> {
  const redis = new Redis(options.url, {
    maxRetriesPerRequest: null,   // required for streams (no auto-fail)
    enableReadyCheck: true,
    lazyConnect: true,
  });
  await redis.connect();

  const consumerConnection = redis.duplicate();
  fastify.log.info('Redis connected');

  const controller = new AbortController();
  const loop = startEventIngestConsumer(
    consumerConnection,
    fastify.tracer,
    options.log,
    controller.signal,
    options.consumer,
  ).catch((err: unknown) => {
    fastify.log.error({ err }, 'Event stream consumer crashed');
  });

  fastify.decorate('redis', redis);

  fastify.addHook('onClose', async () => {
    controller.abort();
    // Breaks the blocking read so the loop sees the abort.
    consumerConnection.disconnect();
    await loop;
    await redis.quit();
    fastify.log.info('Redis disconnected');
  });
}

export default fp(redisIngestPlugin, {
  name: 'redis-ingest',
  dependencies: ['ingestion-hub'],
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.redis` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    redis: Redis;
  }
}
