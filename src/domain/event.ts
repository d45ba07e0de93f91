/**
 * Core domain types for the Traceline event model.
 *
 * These types define the canonical shape of an event as it flows
 * through the system. They carry no framework dependencies.
 */

export const SEVERITIES = ['info', 'warning', 'error'] as const;

export type Severity = (typeof SEVERITIES)[number];

/** Captured local variables, values already stringified. */
export type EventLocals = Readonly<Record<string, string>>;

/**
 * Canonical Event entity.
 *
 * `id` is the global sequence number assigned by the ingestion hub.
 * Optional diagnostics are `null` when absent so the persisted and
 * in-memory shapes are identical.
 */
export interface Event {
  readonly id: number;
  readonly trace_id: string;
  readonly system: string;
  readonly event_type: string;
  readonly severity: Severity;
  readonly timestamp: string; // ISO-8601, UTC
  readonly file: string | null;
  readonly line: number | null;
  readonly source: string | null;
  readonly locals: EventLocals | null;
  readonly stacktrace: readonly string[] | null;
  readonly response: string | null;
  readonly details: string | null;
  readonly environment: string;
}

/** An event that passed normalization but has not been accepted yet. */
export type NormalizedEvent = Omit<Event, 'id'>;

/** Latest activity of one trace, used by the recent-traces listing. */
export interface TraceSummary {
  readonly trace_id: string;
  readonly event_count: number;
  readonly first_id: number;
  readonly last_id: number;
  readonly last_timestamp: string;
  readonly last_system: string;
  readonly last_severity: Severity;
}

export interface StoreStats {
  readonly total_events: number;
  readonly total_traces: number;
  readonly last_id: number;
  readonly latest_timestamp: string | null;
}
