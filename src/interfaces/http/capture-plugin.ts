import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { Severity } from '../../domain/index.js';
import {
  captureSafely,
  generateTraceId,
  runWithTrace,
  traceIdSchema,
  type CaptureAdapter,
  type Tracer,
} from '../../application/index.js';
import { TRACE_ID_HEADER } from './request-helpers.js';

export interface CapturePluginOptions {
  tracer: Pick<Tracer, 'capture' | 'captureException'>;
  /** `system` recorded on request events. */
  system?: string;
}

interface RequestUnit {
  request: FastifyRequest;
  reply: FastifyReply;
}

function outcomeSeverity(statusCode: number): Severity {
  if (statusCode >= 500) return 'error';
  if (statusCode >= 400) return 'warning';
  return 'info';
}

function routeLabel(request: FastifyRequest): string {
  return `${request.method} ${request.routeOptions.url ?? request.url}`;
}

/** Fastify request lifecycle → `request_start` / `request_end` / `request_error`. */
export class FastifyCaptureAdapter implements CaptureAdapter<RequestUnit> {
  constructor(
    private readonly tracer: CapturePluginOptions['tracer'],
    private readonly system: string,
  ) {}

  captureStart({ request }: RequestUnit): void {
    this.tracer.capture(
      {
        system: this.system,
        event_type: 'request_start',
        source: routeLabel(request),
        details: `${request.method} ${request.url}`,
      },
      request.traceId,
    );
  }

  captureSuccess({ request, reply }: RequestUnit): void {
    const status = reply.statusCode;
    this.tracer.capture(
      {
        system: this.system,
        event_type: 'request_end',
        severity: outcomeSeverity(status),
        source: routeLabel(request),
        response: status < 400 ? 'success' : 'fail',
        locals: { status_code: status, elapsed_ms: Math.round(reply.elapsedTime) },
        details: `${request.method} ${request.url} → ${status}`,
      },
      request.traceId,
    );
  }

  captureError({ request }: RequestUnit, err: unknown): void {
    this.tracer.captureException(
      err,
      {
        system: this.system,
        event_type: 'request_error',
        response: 'fail',
      },
      request.traceId,
    );
  }
}

function incomingTraceId(request: FastifyRequest): string {
  const value = request.headers[TRACE_ID_HEADER];
  const parsed = traceIdSchema.safeParse(Array.isArray(value) ? value[0] : value);
  return parsed.success ? parsed.data : generateTraceId();
}

/**
 * Traces every request of the host application.
 *
 * The trace id comes from `X-Trace-ID` (or is generated), is bound for
 * the whole request and echoed in the response header. Capture failures
 * are logged and never affect the response.
 */
async function capturePlugin(fastify: FastifyInstance, options: CapturePluginOptions): Promise<void> {
  const adapter = new FastifyCaptureAdapter(options.tracer, options.system ?? 'backend');

  fastify.decorateRequest('traceId', '');

  fastify.addHook('onRequest', (request, reply, done) => {
    const traceId = incomingTraceId(request);
    request.traceId = traceId;
    reply.header(TRACE_ID_HEADER, traceId);

    captureSafely(request.log, { trace_id: traceId }, () => adapter.captureStart({ request, reply }));
    runWithTrace(traceId, done);
  });

  fastify.addHook('onError', async (request, reply, error) => {
    captureSafely(request.log, { trace_id: request.traceId }, () =>
      adapter.captureError({ request, reply }, error),
    );
  });

  fastify.addHook('onResponse', async (request, reply) => {
    captureSafely(request.log, { trace_id: request.traceId }, () =>
      adapter.captureSuccess({ request, reply }),
    );
  });
}

export default fp(capturePlugin, {
  name: 'trace-capture',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyRequest {
    traceId: string;
  }
}
