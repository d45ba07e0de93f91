import Fastify, { type FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import { MAX_BATCH_SIZE, type EventStore } from './application/index.js';
import type { AppConfig } from './infrastructure/config.js';
import { hubPlugin, redisIngestPlugin, storePlugin, traceLogMixin } from './infrastructure/index.js';
import { eventRoutes, registerErrorHandler, traceRoutes } from './interfaces/http/index.js';
import { LiveStreamServer } from './interfaces/ws/live-stream-server.js';

export interface BuildAppOptions {
  config: AppConfig;
  /** Logger handed to the hub, consumers and live stream. */
  log: Logger;
  /** Replaces the store selected by `config.enableDbLogging`. */
  store?: EventStore;
}

/**
 * Assembles the Fastify server.
 *
 * Order:
 * 1) Error handler
 * 2) Event store, ingestion hub, optional Redis ingestion
 * 3) HTTP routes
 * 4) Live stream on the HTTP upgrade
 */
export async function buildApp({ config, log, store }: BuildAppOptions): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: {
      level: config.logLevel,
      mixin: traceLogMixin,
    },
    bodyLimit: config.maxPayloadBytes * MAX_BATCH_SIZE,
  });

  registerErrorHandler(fastify);

  // --------------------------------------------------
  // Infrastructure
  // --------------------------------------------------

  await fastify.register(storePlugin, {
    databaseUrl: config.databaseUrl,
    enableDbLogging: config.enableDbLogging,
    store,
  });

  await fastify.register(hubPlugin, {
    log,
    environment: config.environment,
    maxPayloadBytes: config.maxPayloadBytes,
    hub: config.hub,
  });

  if (config.redisUrl !== undefined) {
    await fastify.register(redisIngestPlugin, { url: config.redisUrl, log });
  }

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await fastify.register(eventRoutes);
  await fastify.register(traceRoutes);

  // --------------------------------------------------
  // Live stream
  // --------------------------------------------------

  const liveStream = new LiveStreamServer(fastify.hub, log, { path: config.liveStreamPath });
  liveStream.attach(fastify.server);

  // Upgraded sockets keep the HTTP server open; drop them before it closes.
  fastify.addHook('preClose', async () => {
    liveStream.close();
  });

  return fastify;
}
