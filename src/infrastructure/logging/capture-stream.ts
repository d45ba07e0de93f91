import type { DestinationStream } from 'pino';
import type { Severity } from '../../domain/index.js';
import { getTraceId } from '../../application/trace-context.js';
import type { Tracer } from '../../application/tracer.js';

export interface CaptureStreamOptions {
  /** `system` recorded on every captured event. */
  system?: string;
  /** Called when a line cannot be captured. Defaults to writing to stderr. */
  onError?: (err: unknown, line: string) => void;
}

/** pino numeric levels: 30 info, 40 warn, 50 error, 60 fatal. */
export function severityForLevel(level: number): Severity {
  if (level >= 50) return 'error';
  if (level >= 40) return 'warning';
  return 'info';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * pino destination that turns traced log lines into events.
 *
 * Lines without a trace id (neither in the record nor bound in the
 * calling context) are ignored. Combine with the application's own
 * destination through `pino.multistream`.
 */
export function createCaptureStream(
  tracer: Pick<Tracer, 'capture'>,
  options: CaptureStreamOptions = {},
): DestinationStream {
  const system = options.system ?? 'backend';
  const onError =
    options.onError ??
    ((err: unknown) => {
      process.stderr.write(`capture stream: ${String(err)}\n`);
    });

  return {
    write(line: string): void {
      try {
        const record: unknown = JSON.parse(line);
        if (!isRecord(record)) return;

        const traceId = stringField(record, 'trace_id') ?? getTraceId();
        if (traceId === undefined) return;

        const level = typeof record['level'] === 'number' ? record['level'] : 30;
        const err = isRecord(record['err']) ? record['err'] : undefined;
        const stack = err ? stringField(err, 'stack') : undefined;
        const component = stringField(record, 'component');

        tracer.capture(
          {
            system,
            event_type: 'log',
            severity: severityForLevel(level),
            ...(typeof record['time'] === 'number' ? { timestamp: record['time'] } : {}),
            ...(component !== undefined ? { source: component } : {}),
            details: stringField(record, 'msg') ?? null,
            stacktrace: stack ?? null,
          },
          traceId,
        );
      } catch (err: unknown) {
        onError(err, line);
      }
    },
  };
}

/** pino `mixin` that stamps the bound trace id on every log line. */
export function traceLogMixin(): Record<string, unknown> {
  const traceId = getTraceId();
  return traceId === undefined ? {} : { trace_id: traceId };
}
