export type {
  Event,
  EventLocals,
  NormalizedEvent,
  Severity,
  StoreStats,
  TraceSummary,
} from './event.js';
export { SEVERITIES } from './event.js';
export type { Stage, StageStatus, Timeline } from './timeline.js';
export { partitionStages, summarizeStages } from './timeline.js';
export {
  TracelineError,
  ValidationError,
  OverloadedError,
  ConnectionLostError,
  PersistenceFailureError,
  TraceNotFoundError,
} from './errors.js';
export type { DisconnectReason, ValidationIssue } from './errors.js';
