export { loadConfig, ConfigError } from './config.js';
export type { AppConfig, LogLevel } from './config.js';
export { createDbClient, ensureSchema, DrizzleEventStore, traceEvents } from './db/index.js';
export type { Database, SqlClient } from './db/index.js';
export { InMemoryEventStore } from './store/in-memory-event-store.js';
export { default as storePlugin } from './store/store-plugin.js';
export type { StorePluginOptions } from './store/store-plugin.js';
export { default as hubPlugin } from './hub/hub-plugin.js';
export type { HubPluginOptions } from './hub/hub-plugin.js';
export { redisIngestPlugin, publishRawEvent, enqueueTracedJob, startTracedJobWorker } from './redis/index.js';
export { runStreamConsumer, startEventIngestConsumer } from './worker/index.js';
export { createCaptureStream, traceLogMixin, severityForLevel } from './logging/capture-stream.js';
