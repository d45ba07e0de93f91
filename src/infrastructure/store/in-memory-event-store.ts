import type { Event, StoreStats, TraceSummary } from '../../domain/index.js';
import type { EventStore } from '../../application/event-store.js';

/**
 * Non-durable event store.
 *
 * Used when durable logging is disabled, and as the store behind tests.
 * Same contract as the Postgres store: idempotent on `id`, reads ordered
 * by `id`, no update or delete.
 */
export class InMemoryEventStore implements EventStore {
  private readonly byId = new Map<number, Event>();
  private readonly byTrace = new Map<string, Event[]>();

  async append(event: Event): Promise<boolean> {
    if (this.byId.has(event.id)) return false;

    this.byId.set(event.id, event);

    const trace = this.byTrace.get(event.trace_id) ?? [];
    const last = trace[trace.length - 1];
    if (last === undefined || last.id < event.id) {
      trace.push(event);
    } else {
      const at = trace.findIndex((e) => e.id > event.id);
      trace.splice(at, 0, event);
    }
    this.byTrace.set(event.trace_id, trace);

    return true;
  }

  async queryByTrace(traceId: string): Promise<Event[]> {
    return [...(this.byTrace.get(traceId) ?? [])];
  }

  async lastSequence(): Promise<number> {
    let last = 0;
    for (const id of this.byId.keys()) {
      if (id > last) last = id;
    }
    return last;
  }

  async recentTraces(limit: number): Promise<TraceSummary[]> {
    const summaries: TraceSummary[] = [];

    for (const [traceId, events] of this.byTrace) {
      const first = events[0];
      const latest = events[events.length - 1];
      if (first === undefined || latest === undefined) continue;

      summaries.push({
        trace_id: traceId,
        event_count: events.length,
        first_id: first.id,
        last_id: latest.id,
        last_timestamp: latest.timestamp,
        last_system: latest.system,
        last_severity: latest.severity,
      });
    }

    return summaries
      .sort((a, b) => b.last_id - a.last_id)
      .slice(0, limit);
  }

  async stats(): Promise<StoreStats> {
    let latest: string | null = null;
    for (const event of this.byId.values()) {
      if (latest === null || Date.parse(event.timestamp) > Date.parse(latest)) {
        latest = event.timestamp;
      }
    }

    return {
      total_events: this.byId.size,
      total_traces: this.byTrace.size,
      last_id: await this.lastSequence(),
      latest_timestamp: latest,
    };
  }
}
