import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import type { Redis } from 'ioredis';
import { createEventEntryHandler } from '../../src/infrastructure/worker/event-ingest-consumer.js';
import { publishRawEvent, EVENT_STREAM_KEY } from '../../src/infrastructure/redis/event-producer.js';
import { Tracer } from '../../src/application/tracer.js';
import { runInTraceScope, runWithTrace } from '../../src/application/trace-context.js';
import { OverloadedError, type Event, type NormalizedEvent } from '../../src/domain/index.js';
import type { StreamEntry } from '../../src/infrastructure/worker/stream-consumer.js';
import { asLogger, fakeLogger, type FakeLogger } from '../helpers.js';

function entry(id: string, event?: string): StreamEntry {
  return { id, fields: new Map(event === undefined ? [['other', 'x']] : [['event', event]]) };
}

let log: FakeLogger;
let ingest: Mock<(event: NormalizedEvent) => Event>;
let handle: ReturnType<typeof createEventEntryHandler>;

beforeEach(() => {
  log = fakeLogger();
  let id = 0;
  ingest = vi.fn((event: NormalizedEvent): Event => ({ id: ++id, ...event }));
  const tracer = new Tracer({ ingest }, { environment: 'test', maxPayloadBytes: 65_536 });
  handle = createEventEntryHandler(tracer, asLogger(log));
});

describe('createEventEntryHandler', () => {
  it('ingests a valid entry and acks it', async () => {
    const outcome = await handle(entry('1-0', '{"system":"web","trace_id":"t-1"}'));

    expect(outcome).toBe('ack');
    expect(ingest).toHaveBeenCalledWith(expect.objectContaining({ system: 'web', trace_id: 't-1' }));
  });

  it('gives each untraced entry its own trace', async () => {
    await handle(entry('1-0', '{"system":"web"}'));
    await handle(entry('2-0', '{"system":"web"}'));

    const [first, second] = ingest.mock.results.map((r) => (r.type === 'return' ? r.value.trace_id : ''));
    expect(first).not.toBe(second);
  });

  it.each([
    ['missing event field', undefined],
    ['malformed JSON', '{nope'],
    ['non-object payload', '[1,2]'],
    ['failed validation', '{"severity":"info"}'],
  ])('acks and skips an entry with %s', async (_label, body) => {
    const outcome = await handle(entry('1-0', body));

    expect(outcome).toBe('ack');
    expect(ingest).not.toHaveBeenCalled();
    expect(log.warn).toHaveBeenCalledOnce();
  });

  it('leaves the entry pending when the hub is overloaded', async () => {
    ingest.mockImplementation(() => {
      throw new OverloadedError(10);
    });

    expect(await handle(entry('1-0', '{"system":"web"}'))).toBe('retry');
  });

  it('propagates unexpected failures', async () => {
    ingest.mockImplementation(() => {
      throw new Error('bug');
    });

    await expect(handle(entry('1-0', '{"system":"web"}'))).rejects.toThrow('bug');
  });
});

describe('publishRawEvent', () => {
  it('appends the event with the caller trace attached', async () => {
    const redis = { xadd: vi.fn().mockResolvedValue('1-0') };

    const id = await runWithTrace('t-7', () =>
      publishRawEvent(redis as unknown as Redis, { system: 'billing', details: 'charged' }),
    );

    expect(id).toBe('1-0');
    expect(redis.xadd).toHaveBeenCalledWith(
      EVENT_STREAM_KEY,
      '*',
      'event',
      '{"system":"billing","details":"charged","trace_id":"t-7"}',
    );
  });

  it('keeps a camelCase trace id carried by the payload', async () => {
    const redis = { xadd: vi.fn().mockResolvedValue('3-0') };

    await runWithTrace('ctx-trace', () =>
      publishRawEvent(redis as unknown as Redis, { system: 'worker', traceId: 'payload-trace' }),
    );

    expect(redis.xadd).toHaveBeenCalledWith(
      EVENT_STREAM_KEY,
      '*',
      'event',
      '{"system":"worker","traceId":"payload-trace"}',
    );
  });

  it('ingests such an entry under the payload trace', async () => {
    await runWithTrace('ctx-trace', () =>
      handle(entry('3-0', '{"system":"worker","traceId":"payload-trace"}')),
    );

    expect(ingest).toHaveBeenCalledWith(expect.objectContaining({ trace_id: 'payload-trace' }));
  });

  it('publishes untraced events as they are', async () => {
    const redis = { xadd: vi.fn().mockResolvedValue('2-0') };

    await runInTraceScope(() => publishRawEvent(redis as unknown as Redis, { system: 'billing' }));

    expect(redis.xadd).toHaveBeenCalledWith(EVENT_STREAM_KEY, '*', 'event', '{"system":"billing"}');
  });
});
