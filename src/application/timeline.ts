import type { Timeline } from '../domain/index.js';
import { TraceNotFoundError, partitionStages, summarizeStages } from '../domain/index.js';
import type { EventStore } from './event-store.js';

/**
 * Use case: reconstruct the stage timeline of a trace.
 *
 * Read-only; reflects whatever the store has durably appended when the
 * read starts.
 *
 * @throws TraceNotFoundError when the trace has no events.
 */
export async function buildTimeline(store: EventStore, traceId: string): Promise<Timeline> {
  const events = await store.queryByTrace(traceId);
  const ordered = [...events].sort((a, b) => a.id - b.id);

  const timeline = summarizeStages(traceId, partitionStages(ordered));
  if (timeline === null) {
    throw new TraceNotFoundError(traceId);
  }
  return timeline;
}
