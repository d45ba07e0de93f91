import type { Event, NormalizedEvent } from '../domain/index.js';
import type { RawEvent } from './event-schema.js';
import type { IngestionHub } from './ingestion-hub.js';
import { normalizeEvent } from './normalizer.js';
import { describeError } from './error-details.js';

export interface TracerOptions {
  environment: string;
  maxPayloadBytes: number;
  now?: () => Date;
}

/**
 * In-process capture API: normalize, then ingest.
 *
 * Both errors a producer can see surface synchronously here:
 * `ValidationError` from normalization and `OverloadedError` from the hub.
 */
export class Tracer {
  constructor(
    private readonly hub: Pick<IngestionHub, 'ingest'>,
    private readonly options: TracerOptions,
  ) {}

  normalize(raw: RawEvent, traceId?: string): NormalizedEvent {
    return normalizeEvent(raw, {
      traceId,
      maxPayloadBytes: this.options.maxPayloadBytes,
      environment: this.options.environment,
      ...(this.options.now ? { now: this.options.now } : {}),
    });
  }

  capture(raw: RawEvent, traceId?: string): Event {
    return this.hub.ingest(this.normalize(raw, traceId));
  }

  /**
   * Captures a thrown value as an error event. Fields in `raw` win over
   * the ones derived from the error.
   */
  captureException(err: unknown, raw: RawEvent, traceId?: string): Event {
    const described = describeError(err);
    return this.capture(
      {
        severity: 'error',
        event_type: 'exception',
        details: described.details,
        stacktrace: described.stacktrace,
        file: described.file,
        line: described.line,
        source: described.source,
        ...raw,
      },
      traceId,
    );
  }
}
