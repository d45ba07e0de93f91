export { traceEvents } from './schema.js';
export type { TraceEventRow, NewTraceEventRow } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, SqlClient, DbClientOptions } from './client.js';
export { ensureSchema } from './migrate.js';
export { DrizzleEventStore, toEvent, toRow } from './event-repository.js';
