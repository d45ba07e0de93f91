import type { Event } from './event.js';

export type StageStatus = 'success' | 'error';

/**
 * A maximal run of same-system events within a trace.
 *
 * Derived on read, never persisted.
 */
export interface Stage {
  readonly system: string;
  readonly start_time: string;
  readonly end_time: string;
  readonly duration_ms: number;
  readonly status: StageStatus;
  readonly event_count: number;
  readonly events: readonly Event[];
}

export interface Timeline {
  readonly trace_id: string;
  readonly stages: readonly Stage[];
  readonly total_stages: number;
  readonly has_errors: boolean;
  readonly total_duration_ms: number;
}

function elapsedMs(from: string, to: string): number {
  return Date.parse(to) - Date.parse(from);
}

function toStage(first: Event, run: readonly Event[]): Stage {
  const last = run[run.length - 1] ?? first;

  return {
    system: first.system,
    start_time: first.timestamp,
    end_time: last.timestamp,
    duration_ms: elapsedMs(first.timestamp, last.timestamp),
    status: run.some((e) => e.severity === 'error') ? 'error' : 'success',
    event_count: run.length,
    events: run,
  };
}

/**
 * Splits an id-ordered event sequence into stages.
 *
 * Single linear pass: a new stage opens whenever the system differs from
 * the running stage's system, so `[A, A, B, A]` yields three stages.
 * Timestamps feed durations only; they never reorder events.
 */
export function partitionStages(events: readonly Event[]): Stage[] {
  const stages: Stage[] = [];
  let head: Event | undefined;
  let run: Event[] = [];

  for (const event of events) {
    if (head !== undefined && head.system !== event.system) {
      stages.push(toStage(head, run));
      run = [];
      head = undefined;
    }
    head ??= event;
    run.push(event);
  }

  if (head !== undefined) {
    stages.push(toStage(head, run));
  }

  return stages;
}

/**
 * Assembles the timeline for a non-empty stage list.
 * Returns `null` when there are no stages.
 */
export function summarizeStages(traceId: string, stages: readonly Stage[]): Timeline | null {
  const first = stages[0];
  const last = stages[stages.length - 1];
  if (first === undefined || last === undefined) return null;

  return {
    trace_id: traceId,
    stages,
    total_stages: stages.length,
    has_errors: stages.some((s) => s.status === 'error'),
    total_duration_ms: elapsedMs(first.start_time, last.end_time),
  };
}
