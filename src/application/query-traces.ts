import type { Event, StoreStats, Timeline, TraceSummary } from '../domain/index.js';
import type { EventStore } from './event-store.js';
import { buildTimeline } from './timeline.js';

const DEFAULT_TRACE_LIMIT = 20;
const MAX_TRACE_LIMIT = 100;

export interface TraceEventsResult {
  trace_id: string;
  events: Event[];
}

export interface RecentTracesResult {
  traces: TraceSummary[];
  count: number;
  limit: number;
}

/**
 * Use case: raw events of a trace.
 * An unknown trace yields an empty list: "no events yet" and "never
 * will have events" cannot be told apart.
 */
export async function getTraceEvents(store: EventStore, traceId: string): Promise<TraceEventsResult> {
  const events = await store.queryByTrace(traceId);
  return { trace_id: traceId, events };
}

export function getTraceTimeline(store: EventStore, traceId: string): Promise<Timeline> {
  return buildTimeline(store, traceId);
}

/**
 * Use case: most recently active traces.
 * Clamps limit to [1, 100], defaults to 20.
 */
export async function listRecentTraces(
  store: EventStore,
  params: { limit?: number | undefined },
): Promise<RecentTracesResult> {
  const limit = Math.min(Math.max(params.limit ?? DEFAULT_TRACE_LIMIT, 1), MAX_TRACE_LIMIT);
  const traces = await store.recentTraces(limit);
  return { traces, count: traces.length, limit };
}

export function getStoreStats(store: EventStore): Promise<StoreStats> {
  return store.stats();
}
