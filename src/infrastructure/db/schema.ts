import { pgTable, bigint, varchar, integer, text, timestamp, jsonb, index } from 'drizzle-orm/pg-core';
import { SEVERITIES, type EventLocals } from '../../domain/index.js';

/**
 * Drizzle schema for the append-only `trace_events` table.
 *
 * `id` is the global sequence number assigned by the ingestion hub.
 * Using it as PK gives idempotent appends via ON CONFLICT DO NOTHING.
 * Reads go through `idx_trace_events_trace_id`.
 */
export const traceEvents = pgTable('trace_events', {
  id: bigint('id', { mode: 'number' }).primaryKey(),
  trace_id: varchar('trace_id', { length: 128 }).notNull(),
  system: varchar('system', { length: 64 }).notNull(),
  event_type: varchar('event_type', { length: 64 }).notNull(),
  severity: varchar('severity', { length: 16, enum: SEVERITIES }).notNull(),
  timestamp: timestamp('timestamp', { withTimezone: true, precision: 3 }).notNull(),
  file: varchar('file', { length: 1024 }),
  line: integer('line'),
  source: varchar('source', { length: 512 }),
  locals: jsonb('locals').$type<EventLocals>(),
  stacktrace: jsonb('stacktrace').$type<string[]>(),
  response: varchar('response', { length: 255 }),
  details: text('details'),
  environment: varchar('environment', { length: 64 }).notNull(),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_trace_events_trace_id').on(table.trace_id),
  index('idx_trace_events_timestamp').on(table.timestamp),
]);

export type TraceEventRow = typeof traceEvents.$inferSelect;
export type NewTraceEventRow = typeof traceEvents.$inferInsert;
