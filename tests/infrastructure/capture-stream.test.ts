import { describe, it, expect, vi } from 'vitest';
import { pino } from 'pino';
import {
  createCaptureStream,
  severityForLevel,
  traceLogMixin,
} from '../../src/infrastructure/logging/capture-stream.js';
import { runWithTrace } from '../../src/application/trace-context.js';
import type { Event } from '../../src/domain/index.js';
import type { RawEvent } from '../../src/application/event-schema.js';
import { makeEvent } from '../helpers.js';

function fakeTracer() {
  return { capture: vi.fn((_raw: RawEvent, _traceId?: string): Event => makeEvent(1)) };
}

describe('severityForLevel', () => {
  it.each([
    [10, 'info'],
    [30, 'info'],
    [40, 'warning'],
    [50, 'error'],
    [60, 'error'],
  ])('maps level %i to %s', (level, severity) => {
    expect(severityForLevel(level)).toBe(severity);
  });
});

describe('traceLogMixin', () => {
  it('is empty outside a trace', () => {
    expect(traceLogMixin()).toEqual({});
  });

  it('stamps the bound trace id', () => {
    expect(runWithTrace('t-1', () => traceLogMixin())).toEqual({ trace_id: 't-1' });
  });
});

describe('createCaptureStream', () => {
  it('captures a traced log line', () => {
    const tracer = fakeTracer();
    const stream = createCaptureStream(tracer);

    stream.write(
      '{"level":40,"time":1772359200000,"msg":"slow query","trace_id":"t-2","component":"db"}\n',
    );

    expect(tracer.capture).toHaveBeenCalledWith(
      {
        system: 'backend',
        event_type: 'log',
        severity: 'warning',
        timestamp: 1772359200000,
        source: 'db',
        details: 'slow query',
        stacktrace: null,
      },
      't-2',
    );
  });

  it('uses the trace bound in the calling context', () => {
    const tracer = fakeTracer();
    const stream = createCaptureStream(tracer, { system: 'api' });

    runWithTrace('t-3', () => stream.write('{"level":30,"msg":"hello"}'));

    expect(tracer.capture).toHaveBeenCalledWith(
      { system: 'api', event_type: 'log', severity: 'info', details: 'hello', stacktrace: null },
      't-3',
    );
  });

  it('carries the error stack', () => {
    const tracer = fakeTracer();
    const stream = createCaptureStream(tracer);

    stream.write('{"level":50,"trace_id":"t-4","msg":"boom","err":{"stack":"Error: boom\\n    at run (a.js:1:1)"}}');

    expect(tracer.capture).toHaveBeenCalledWith(
      expect.objectContaining({ severity: 'error', stacktrace: 'Error: boom\n    at run (a.js:1:1)' }),
      't-4',
    );
  });

  it('ignores lines without a trace', () => {
    const tracer = fakeTracer();

    createCaptureStream(tracer).write('{"level":30,"msg":"startup"}');

    expect(tracer.capture).not.toHaveBeenCalled();
  });

  it('reports lines it cannot capture', () => {
    const tracer = fakeTracer();
    const onError = vi.fn();

    createCaptureStream(tracer, { onError }).write('not json');

    expect(onError).toHaveBeenCalledWith(expect.any(SyntaxError), 'not json');
    expect(tracer.capture).not.toHaveBeenCalled();
  });

  it('works as a pino destination', () => {
    const tracer = fakeTracer();
    const log = pino({ level: 'info', mixin: traceLogMixin }, createCaptureStream(tracer));

    runWithTrace('t-5', () => log.child({ component: 'checkout' }).error('payment declined'));
    log.info('untraced');

    expect(tracer.capture).toHaveBeenCalledOnce();
    expect(tracer.capture).toHaveBeenCalledWith(
      expect.objectContaining({
        severity: 'error',
        source: 'checkout',
        details: 'payment declined',
      }),
      't-5',
    );
  });
});
