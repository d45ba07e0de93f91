import type { Event, StoreStats, TraceSummary } from '../domain/index.js';

/**
 * Append-only persistence contract.
 *
 * There is no update or delete path. Implementations must make `append`
 * idempotent on `id` so retried writes never duplicate.
 */
export interface EventStore {
  /** Returns true when the event was inserted, false when `id` already existed. */
  append(event: Event): Promise<boolean>;

  /** All events of a trace ordered by `id`; empty for an unknown trace. */
  queryByTrace(traceId: string): Promise<Event[]>;

  /** Highest stored `id`, or 0 when the store is empty. */
  lastSequence(): Promise<number>;

  /** Traces with the most recent activity first. */
  recentTraces(limit: number): Promise<TraceSummary[]>;

  stats(): Promise<StoreStats>;
}
