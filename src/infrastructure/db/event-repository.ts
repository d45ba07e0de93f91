import { asc, count, countDistinct, desc, eq, inArray, max, min } from 'drizzle-orm';
import type { Event, StoreStats, TraceSummary } from '../../domain/index.js';
import type { EventStore } from '../../application/event-store.js';
import type { Database } from './client.js';
import { traceEvents, type NewTraceEventRow, type TraceEventRow } from './schema.js';

export function toRow(event: Event): NewTraceEventRow {
  return {
    id: event.id,
    trace_id: event.trace_id,
    system: event.system,
    event_type: event.event_type,
    severity: event.severity,
    timestamp: new Date(event.timestamp),
    file: event.file,
    line: event.line,
    source: event.source,
    locals: event.locals,
    stacktrace: event.stacktrace === null ? null : [...event.stacktrace],
    response: event.response,
    details: event.details,
    environment: event.environment,
  };
}

export function toEvent(row: TraceEventRow): Event {
  return {
    id: row.id,
    trace_id: row.trace_id,
    system: row.system,
    event_type: row.event_type,
    severity: row.severity,
    timestamp: row.timestamp.toISOString(),
    file: row.file,
    line: row.line,
    source: row.source,
    locals: row.locals,
    stacktrace: row.stacktrace,
    response: row.response,
    details: row.details,
    environment: row.environment,
  };
}

/**
 * Postgres-backed event store (Drizzle over postgres.js).
 *
 * Appends use ON CONFLICT DO NOTHING on the `id` primary key, so a retry
 * after a timed-out write is a no-op.
 */
export class DrizzleEventStore implements EventStore {
  constructor(private readonly db: Database) {}

  async append(event: Event): Promise<boolean> {
    const inserted = await this.db
      .insert(traceEvents)
      .values(toRow(event))
      .onConflictDoNothing({ target: traceEvents.id })
      .returning({ id: traceEvents.id });

    return inserted.length > 0;
  }

  async queryByTrace(traceId: string): Promise<Event[]> {
    const rows = await this.db
      .select()
      .from(traceEvents)
      .where(eq(traceEvents.trace_id, traceId))
      .orderBy(asc(traceEvents.id));

    return rows.map(toEvent);
  }

  async lastSequence(): Promise<number> {
    const [row] = await this.db
      .select({ last: max(traceEvents.id) })
      .from(traceEvents);

    return Number(row?.last ?? 0);
  }

  /**
   * Groups by trace, newest activity (highest id) first, then fetches
   * each trace's latest event for the summary columns.
   */
  async recentTraces(limit: number): Promise<TraceSummary[]> {
    const groups = await this.db
      .select({
        trace_id: traceEvents.trace_id,
        event_count: count(),
        first_id: min(traceEvents.id),
        last_id: max(traceEvents.id),
      })
      .from(traceEvents)
      .groupBy(traceEvents.trace_id)
      .orderBy(desc(max(traceEvents.id)))
      .limit(limit);

    const lastIds = groups.flatMap((g) => (g.last_id === null ? [] : [Number(g.last_id)]));
    if (lastIds.length === 0) return [];

    const latest = await this.db
      .select()
      .from(traceEvents)
      .where(inArray(traceEvents.id, lastIds));

    const latestById = new Map(latest.map((row) => [row.id, row]));

    return groups.flatMap((g) => {
      const row = g.last_id === null ? undefined : latestById.get(Number(g.last_id));
      if (row === undefined) return [];
      return [{
        trace_id: g.trace_id,
        event_count: Number(g.event_count),
        first_id: Number(g.first_id ?? row.id),
        last_id: row.id,
        last_timestamp: row.timestamp.toISOString(),
        last_system: row.system,
        last_severity: row.severity,
      }];
    });
  }

  async stats(): Promise<StoreStats> {
    const [row] = await this.db
      .select({
        total_events: count(),
        total_traces: countDistinct(traceEvents.trace_id),
        last_id: max(traceEvents.id),
        latest_timestamp: max(traceEvents.timestamp),
      })
      .from(traceEvents);

    return {
      total_events: Number(row?.total_events ?? 0),
      total_traces: Number(row?.total_traces ?? 0),
      last_id: Number(row?.last_id ?? 0),
      latest_timestamp: row?.latest_timestamp ? row.latest_timestamp.toISOString() : null,
    };
  }
}
