import type { NormalizedEvent, EventLocals, ValidationIssue } from '../domain/index.js';
import { ValidationError } from '../domain/index.js';
import { rawEventSchema, traceIdSchema, type RawEvent } from './event-schema.js';
import { ensureTraceId } from './trace-context.js';

const NOT_SERIALIZABLE = '<not serializable>';
const DEFAULT_EVENT_TYPE = 'log';

export interface NormalizeOptions {
  /** Overrides any trace id in the payload or the bound context. */
  traceId?: string | undefined;
  maxPayloadBytes: number;
  /** Used when the payload carries no `environment`. */
  environment: string;
  now?: () => Date;
}

function payloadSize(raw: RawEvent): number {
  try {
    return Buffer.byteLength(JSON.stringify(raw), 'utf8');
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ValidationError(`Event payload is not serializable: ${reason}`);
  }
}

function explicitTraceId(traceId: string | undefined): string | undefined {
  if (traceId === undefined) return undefined;
  const parsed = traceIdSchema.safeParse(traceId);
  if (!parsed.success) {
    throw new ValidationError(
      'Invalid trace_id',
      parsed.error.issues.map((issue) => ({ path: ['trace_id', ...issue.path], message: issue.message })),
    );
  }
  return parsed.data;
}

function stringifyLocal(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === null || typeof value !== 'object') return String(value);
  try {
    return JSON.stringify(value);
  } catch {
    return NOT_SERIALIZABLE;
  }
}

function toLocals(locals: Record<string, unknown>): EventLocals {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(locals)) {
    out[key] = stringifyLocal(value);
  }
  return out;
}

function toStacktrace(stacktrace: string | string[]): string[] {
  const lines = typeof stacktrace === 'string' ? stacktrace.split('\n') : stacktrace;
  return lines.map((l) => l.trimEnd()).filter((l) => l.length > 0);
}

/**
 * Converts a loosely-structured payload into a canonical event.
 *
 * The single place where untyped input becomes a typed event. Trace id
 * resolution: explicit option, payload field, bound context, new id.
 * Performs no I/O.
 *
 * @throws ValidationError when the payload is oversized or malformed.
 */
export function normalizeEvent(raw: RawEvent, options: NormalizeOptions): NormalizedEvent {
  const size = payloadSize(raw);
  if (size > options.maxPayloadBytes) {
    throw new ValidationError(
      `Event payload is ${size} bytes, limit is ${options.maxPayloadBytes}`,
    );
  }

  const explicit = explicitTraceId(options.traceId);

  const parsed = rawEventSchema.safeParse(raw);
  if (!parsed.success) {
    const issues: ValidationIssue[] = parsed.error.issues.map((issue) => ({
      path: issue.path,
      message: issue.message,
    }));
    throw new ValidationError('Validation failed', issues);
  }

  const input = parsed.data;
  const now = options.now ?? (() => new Date());
  const traceId = explicit ?? input.trace_id ?? input.traceId ?? ensureTraceId();

  return {
    trace_id: traceId,
    system: input.system,
    event_type: input.event_type ?? DEFAULT_EVENT_TYPE,
    severity: input.severity ?? 'info',
    timestamp: input.timestamp ?? now().toISOString(),
    file: input.file ?? null,
    line: input.line ?? null,
    source: input.source ?? null,
    locals: input.locals ? toLocals(input.locals) : null,
    stacktrace: input.stacktrace ? toStacktrace(input.stacktrace) : null,
    response: input.response ?? null,
    details: input.details ?? null,
    environment: input.environment ?? options.environment,
  };
}
