/**
 * Error taxonomy shared by every layer.
 *
 * `statusCode` is the HTTP status the query and ingestion routes answer
 * with; errors that never reach a producer carry 500.
 */
export abstract class TracelineError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export interface ValidationIssue {
  readonly path: ReadonlyArray<string | number>;
  readonly message: string;
}

/** Raw event rejected at normalization. Never ingested. */
export class ValidationError extends TracelineError {
  readonly code = 'VALIDATION_ERROR';
  readonly statusCode = 400;

  constructor(message: string, readonly issues: readonly ValidationIssue[] = []) {
    super(message);
  }
}

/** Persistence queue is saturated; the producer decides whether to retry. */
export class OverloadedError extends TracelineError {
  readonly code = 'OVERLOADED';
  readonly statusCode = 503;

  constructor(readonly pendingWrites: number) {
    super(`Persistence queue saturated (${pendingWrites} pending writes)`);
  }
}

export type DisconnectReason =
  | 'backlog_overflow'
  | 'delivery_timeout'
  | 'delivery_failed'
  | 'replay_failed'
  | 'hub_closed';

/** A live subscriber was dropped. Ingestion is unaffected. */
export class ConnectionLostError extends TracelineError {
  readonly code = 'CONNECTION_LOST';
  readonly statusCode = 500;

  constructor(
    readonly subscriberId: number,
    readonly reason: DisconnectReason,
    options?: { cause?: unknown },
  ) {
    super(`Subscriber ${subscriberId} disconnected: ${reason}`, options);
  }
}

/** Durable write failed after every retry. Surfaced to operators only. */
export class PersistenceFailureError extends TracelineError {
  readonly code = 'PERSISTENCE_FAILURE';
  readonly statusCode = 500;

  constructor(
    readonly eventId: number,
    readonly attempts: number,
    options?: { cause?: unknown },
  ) {
    super(`Event ${eventId} not persisted after ${attempts} attempts`, options);
  }
}

export class TraceNotFoundError extends TracelineError {
  readonly code = 'TRACE_NOT_FOUND';
  readonly statusCode = 404;

  constructor(readonly traceId: string) {
    super(`No events found for trace ID: ${traceId}`);
  }
}
