import type { FastifyRequest } from 'fastify';
import type { ZodType } from 'zod';
import { ValidationError } from '../../domain/index.js';
import { traceIdSchema } from '../../application/index.js';

export const TRACE_ID_HEADER = 'x-trace-id';

/**
 * Trace id sent in the `X-Trace-ID` header, if any.
 * @throws ValidationError when the header is present but malformed.
 */
export function headerTraceId(request: FastifyRequest): string | undefined {
  const value = request.headers[TRACE_ID_HEADER];
  const first = Array.isArray(value) ? value[0] : value;
  if (first === undefined || first.trim() === '') return undefined;

  const parsed = traceIdSchema.safeParse(first);
  if (!parsed.success) {
    throw new ValidationError(`Invalid ${TRACE_ID_HEADER} header`, [
      { path: [TRACE_ID_HEADER], message: parsed.error.issues[0]?.message ?? 'Invalid value' },
    ]);
  }
  return parsed.data;
}

/** Parses `input` with `schema`, turning zod issues into a ValidationError. */
export function parseOrThrow<T>(schema: ZodType<T>, input: unknown, message = 'Validation failed'): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(
      message,
      parsed.error.issues.map((issue) => ({ path: issue.path, message: issue.message })),
    );
  }
  return parsed.data;
}

/**
 * Parses a querystring value to an integer.
 * Returns `undefined` for missing values, `NaN` for non-integers.
 */
export function safeInt(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n) || n !== Math.floor(n)) return NaN;
  return n;
}
