import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { EventStore } from '../../application/event-store.js';
import { createDbClient, ensureSchema, DrizzleEventStore } from '../db/index.js';
import { InMemoryEventStore } from './in-memory-event-store.js';

export interface StorePluginOptions {
  databaseUrl: string;
  /** Postgres when true, in-memory otherwise. */
  enableDbLogging: boolean;
  /** Use this store instead of building one. */
  store?: EventStore;
}

/**
 * Fastify plugin that selects the event store and manages its lifecycle.
 *
 * Decorates `fastify.eventStore`. With durable logging enabled the
 * Postgres schema is bootstrapped on start and the pool closed on
 * server shutdown.
 */
async function storePlugin(fastify: FastifyInstance, options: StorePluginOptions): Promise<void> {
  if (options.store) {
    fastify.decorate('eventStore', options.store);
    return;
  }

  if (!options.enableDbLogging) {
    fastify.decorate('eventStore', new InMemoryEventStore());
    fastify.log.info('Durable logging disabled — events kept in memory');
    return;
  }

  const { sql, db } = createDbClient(options.databaseUrl);
  await ensureSchema(sql);
  fastify.decorate('eventStore', new DrizzleEventStore(db));
  fastify.log.info('Database connected');

  fastify.addHook('onClose', async () => {
    await sql.end();
    fastify.log.info('Database disconnected');
  });
}

export default fp(storePlugin, {
  name: 'event-store',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.eventStore` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    eventStore: EventStore;
  }
}
