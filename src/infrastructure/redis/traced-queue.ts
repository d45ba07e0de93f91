import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import { captureSafely, type CaptureAdapter } from '../../application/capture-adapter.js';
import {
  TRACE_ID_FIELD,
  ensureTraceId,
  generateTraceId,
  runWithAttachedTrace,
} from '../../application/trace-context.js';
import type { Tracer } from '../../application/tracer.js';
import {
  runStreamConsumer,
  type EntryHandler,
  type StreamConsumerOptions,
  type StreamEntry,
} from '../worker/stream-consumer.js';

export interface JobRequest {
  name: string;
  payload: Record<string, unknown>;
}

/** A job as seen by its handler: the request plus stream id and trace id. */
export interface TracedJob extends JobRequest {
  id: string;
  trace_id: string;
}

export type JobHandler = (job: TracedJob) => Promise<void>;

/**
 * Enqueues a job on `stream`, carrying the caller's trace id.
 * Enqueueing outside any trace starts a new one in the caller's context.
 */
export async function enqueueTracedJob(
  redis: Redis,
  stream: string,
  job: JobRequest,
): Promise<{ streamId: string | null; trace_id: string }> {
  const traceId = ensureTraceId();
  const streamId = await redis.xadd(
    stream,
    '*',
    'name', job.name,
    'payload', JSON.stringify(job.payload),
    TRACE_ID_FIELD, traceId,
  );
  return { streamId, trace_id: traceId };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Rebuilds a job from its stream entry; `null` when the entry is unusable. */
export function parseJobEntry(entry: StreamEntry): TracedJob | null {
  const name = entry.fields.get('name');
  const payloadText = entry.fields.get('payload');
  if (name === undefined || payloadText === undefined) return null;

  let payload: unknown;
  try {
    payload = JSON.parse(payloadText);
  } catch {
    return null;
  }
  if (!isRecord(payload)) return null;

  const carried = entry.fields.get(TRACE_ID_FIELD);
  return {
    id: entry.id,
    name,
    payload,
    // Entries from untraced producers start a fresh trace.
    trace_id: carried !== undefined && carried.length > 0 ? carried : generateTraceId(),
  };
}

/** Job lifecycle → `job_start` / `job_success` / `job_error` events. */
export class JobCaptureAdapter implements CaptureAdapter<TracedJob> {
  constructor(
    private readonly tracer: Tracer,
    private readonly system = 'worker',
  ) {}

  captureStart(job: TracedJob): void {
    this.tracer.capture(
      {
        system: this.system,
        event_type: 'job_start',
        source: job.name,
        locals: job.payload,
        details: `Job started: ${job.name} [${job.id}]`,
      },
      job.trace_id,
    );
  }

  captureSuccess(job: TracedJob): void {
    this.tracer.capture(
      {
        system: this.system,
        event_type: 'job_success',
        source: job.name,
        response: 'success',
        details: `Job completed: ${job.name} [${job.id}]`,
      },
      job.trace_id,
    );
  }

  captureError(job: TracedJob, err: unknown): void {
    this.tracer.captureException(
      err,
      {
        system: this.system,
        event_type: 'job_error',
        source: job.name,
        response: 'fail',
      },
      job.trace_id,
    );
  }
}

/**
 * Handler for traced job entries. Runs each job inside its carried trace
 * and reports the lifecycle through `adapter`. A failing job is captured
 * and acknowledged; jobs are not retried.
 */
export function createJobEntryHandler(
  handlers: ReadonlyMap<string, JobHandler>,
  adapter: CaptureAdapter<TracedJob>,
  log: Logger,
): EntryHandler {
  return async (entry) => {
    const job = parseJobEntry(entry);
    if (job === null) {
      log.warn({ streamId: entry.id }, 'Malformed job entry, skipping');
      return 'ack';
    }

    const handler = handlers.get(job.name);
    if (handler === undefined) {
      log.warn({ streamId: entry.id, job: job.name }, 'No handler registered for job, skipping');
      return 'ack';
    }

    const context = { jobId: job.id, job: job.name, trace_id: job.trace_id };

    await runWithAttachedTrace(job, async () => {
      captureSafely(log, context, () => adapter.captureStart(job));
      try {
        await handler(job);
        captureSafely(log, context, () => adapter.captureSuccess(job));
      } catch (err: unknown) {
        log.error({ err, ...context }, 'Job failed');
        captureSafely(log, context, () => adapter.captureError(job, err));
      }
    });

    return 'ack';
  };
}

export interface TracedJobWorkerOptions extends StreamConsumerOptions {
  handlers: ReadonlyMap<string, JobHandler>;
  tracer: Tracer;
  system?: string;
}

/** Consumes `options.stream` until `signal` is aborted. */
export function startTracedJobWorker(
  redis: Redis,
  log: Logger,
  signal: AbortSignal,
  options: TracedJobWorkerOptions,
): Promise<void> {
  const { handlers, tracer, system, ...consumerOptions } = options;
  const workerLog = log.child({ component: 'job-worker', stream: options.stream });
  const adapter = new JobCaptureAdapter(tracer, system);
  return runStreamConsumer(
    redis,
    workerLog,
    signal,
    consumerOptions,
    createJobEntryHandler(handlers, adapter, workerLog),
  );
}
