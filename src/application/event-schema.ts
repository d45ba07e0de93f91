import { z } from 'zod';
import { SEVERITIES } from '../domain/index.js';

const SEVERITY_ALIASES: Record<string, string> = {
  warn: 'warning',
  debug: 'info',
  trace: 'info',
  critical: 'error',
  fatal: 'error',
};

/** Accepts logging-level spellings and folds them onto the three severities. */
const severitySchema = z
  .string()
  .trim()
  .toLowerCase()
  .transform((value) => SEVERITY_ALIASES[value] ?? value)
  .pipe(z.enum(SEVERITIES));

/** ISO-8601 string (any offset), epoch milliseconds or a Date. Output is canonical UTC. */
const timestampSchema = z
  .union([
    z.string().datetime({ offset: true, message: 'Must be a valid ISO-8601 datetime' }),
    z.number().int().nonnegative(),
    z.date(),
  ])
  .transform((value, ctx) => {
    const date = value instanceof Date ? value : new Date(value);
    if (Number.isNaN(date.getTime())) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Timestamp out of range' });
      return z.NEVER;
    }
    return date.toISOString();
  });

export const traceIdSchema = z.string().trim().min(1).max(128);

/**
 * Zod schema for a raw, producer-supplied event.
 *
 * - `system` is the only required field.
 * - `traceId` is the camelCase spelling older producers send.
 * - Unknown keys are stripped.
 */
export const rawEventSchema = z.object({
  trace_id: traceIdSchema.optional(),
  traceId: traceIdSchema.optional(),
  system: z.string().trim().min(1).max(64),
  event_type: z.string().trim().min(1).max(64).optional(),
  severity: severitySchema.optional(),
  timestamp: timestampSchema.optional(),
  file: z.string().max(1024).nullish(),
  line: z.number().int().nonnegative().nullish(),
  source: z.string().max(512).nullish(),
  locals: z.record(z.string(), z.unknown()).nullish(),
  stacktrace: z.union([z.string(), z.array(z.string())]).nullish(),
  response: z.string().max(255).nullish(),
  details: z.string().nullish(),
  environment: z.string().trim().min(1).max(64).optional(),
});

export type RawEventInput = z.infer<typeof rawEventSchema>;

/** Loose key/value payload accepted at the boundary. */
export const rawPayloadSchema = z.record(z.string(), z.unknown());

export type RawEvent = z.infer<typeof rawPayloadSchema>;

export const MAX_BATCH_SIZE = 500;

export const rawEventBatchSchema = z
  .array(rawPayloadSchema)
  .min(1, 'Batch must contain at least one event')
  .max(MAX_BATCH_SIZE, `Batch must contain at most ${MAX_BATCH_SIZE} events`);
