import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import { IngestionHub, type HubOptions } from '../../application/ingestion-hub.js';
import { Tracer } from '../../application/tracer.js';

export interface HubPluginOptions {
  log: Logger;
  environment: string;
  maxPayloadBytes: number;
  hub?: Partial<HubOptions>;
}

/**
 * Builds the ingestion hub over `fastify.eventStore` and the tracer
 * feeding it. The hub resumes the stored sequence on start and drains
 * pending writes on close; onClose hooks run in reverse registration
 * order, so this happens before the store shuts down.
 */
async function hubPlugin(fastify: FastifyInstance, options: HubPluginOptions): Promise<void> {
  const hub = new IngestionHub(fastify.eventStore, options.log, options.hub);
  await hub.start();

  const tracer = new Tracer(hub, {
    environment: options.environment,
    maxPayloadBytes: options.maxPayloadBytes,
  });

  fastify.decorate('hub', hub);
  fastify.decorate('tracer', tracer);

  fastify.addHook('onClose', async () => {
    await hub.close();
  });
}

export default fp(hubPlugin, {
  name: 'ingestion-hub',
  dependencies: ['event-store'],
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    hub: IngestionHub;
    tracer: Tracer;
  }
}
