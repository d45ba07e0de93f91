export {
  rawEventSchema,
  rawPayloadSchema,
  rawEventBatchSchema,
  traceIdSchema,
  MAX_BATCH_SIZE,
} from './event-schema.js';
export type { RawEvent, RawEventInput } from './event-schema.js';
export { normalizeEvent } from './normalizer.js';
export type { NormalizeOptions } from './normalizer.js';
export {
  TRACE_ID_FIELD,
  generateTraceId,
  getTraceId,
  setTraceId,
  ensureTraceId,
  runWithTrace,
  runInTraceScope,
  attachTraceId,
  readAttachedTraceId,
  runWithAttachedTrace,
} from './trace-context.js';
export type { EventStore } from './event-store.js';
export { IngestionHub, DEFAULT_HUB_OPTIONS } from './ingestion-hub.js';
export type { HubOptions, HubHealth } from './ingestion-hub.js';
export { Subscription } from './subscription.js';
export type { EventSink, CloseReason, CloseHandler, SubscribeOptions } from './subscription.js';
export { buildTimeline } from './timeline.js';
export { getTraceEvents, getTraceTimeline, listRecentTraces, getStoreStats } from './query-traces.js';
export type { TraceEventsResult, RecentTracesResult } from './query-traces.js';
export { Tracer } from './tracer.js';
export type { TracerOptions } from './tracer.js';
export { captureSafely } from './capture-adapter.js';
export type { CaptureAdapter } from './capture-adapter.js';
export { describeError } from './error-details.js';
