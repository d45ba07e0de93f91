import type { SqlClient } from './client.js';

/**
 * Lightweight schema bootstrap via raw SQL.
 *
 * In production this would be handled by drizzle-kit migrate; this
 * guarantees the table is present on first run. Mirrors schema.ts.
 */
export async function ensureSchema(sql: SqlClient): Promise<void> {
  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS trace_events (
      id           BIGINT        PRIMARY KEY,
      trace_id     VARCHAR(128)  NOT NULL,
      system       VARCHAR(64)   NOT NULL,
      event_type   VARCHAR(64)   NOT NULL,
      severity     VARCHAR(16)   NOT NULL,
      timestamp    TIMESTAMPTZ(3) NOT NULL,
      file         VARCHAR(1024),
      line         INTEGER,
      source       VARCHAR(512),
      locals       JSONB,
      stacktrace   JSONB,
      response     VARCHAR(255),
      details      TEXT,
      environment  VARCHAR(64)   NOT NULL,
      created_at   TIMESTAMPTZ   NOT NULL DEFAULT NOW()
    )
  `);

  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_trace_events_trace_id ON trace_events (trace_id)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_trace_events_timestamp ON trace_events (timestamp)`);
}
