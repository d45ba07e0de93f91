import { describe, it, expect, beforeEach, vi } from 'vitest';
import { IngestionHub, type HubOptions } from '../../src/application/ingestion-hub.js';
import type { CloseReason } from '../../src/application/subscription.js';
import {
  ConnectionLostError,
  OverloadedError,
  PersistenceFailureError,
  ValidationError,
  type Event,
} from '../../src/domain/index.js';
import { InMemoryEventStore } from '../../src/infrastructure/store/in-memory-event-store.js';
import {
  GatedStore,
  asLogger,
  deferred,
  fakeLogger,
  makeEvent,
  makeNormalized,
  tick,
  type FakeLogger,
} from '../helpers.js';

const FAST: Partial<HubOptions> = {
  retryBaseDelayMs: 1,
  writeTimeoutMs: 1_000,
  deliveryTimeoutMs: 1_000,
};

let log: FakeLogger;

beforeEach(() => {
  log = fakeLogger();
});

function newHub(store = new InMemoryEventStore(), options: Partial<HubOptions> = {}) {
  return new IngestionHub(store, asLogger(log), { ...FAST, ...options });
}

// ─── sequencing ──────────────────────────────────────────────

describe('IngestionHub — sequencing', () => {
  it('assigns gap-free increasing ids across concurrent producers', async () => {
    const store = new InMemoryEventStore();
    const hub = newHub(store);

    const producer = async (p: number): Promise<number[]> => {
      const ids: number[] = [];
      for (let i = 0; i < 20; i++) {
        await Promise.resolve();
        ids.push(hub.ingest(makeNormalized({ trace_id: `t-${p}` })).id);
      }
      return ids;
    };

    const perProducer = await Promise.all([0, 1, 2, 3, 4].map(producer));

    for (const ids of perProducer) {
      expect(ids).toEqual([...ids].sort((a, b) => a - b));
    }
    const all = perProducer.flat().sort((a, b) => a - b);
    expect(all).toEqual(Array.from({ length: 100 }, (_, i) => i + 1));

    await hub.flush();
    expect((await store.stats()).total_events).toBe(100);
  });

  it('returns a frozen event carrying the assigned id', () => {
    const hub = newHub();
    const event = hub.ingest(makeNormalized({ details: 'hello' }));

    expect(event).toEqual(makeEvent(1, { details: 'hello' }));
    expect(Object.isFrozen(event)).toBe(true);
  });

  it('resumes after the highest stored id', async () => {
    const store = new InMemoryEventStore();
    await store.append(makeEvent(41));
    const hub = newHub(store);

    await hub.start();

    expect(hub.ingest(makeNormalized()).id).toBe(42);
  });

  it('reports Overloaded without consuming an id', async () => {
    const store = new GatedStore();
    const hub = newHub(store, { maxPendingWrites: 2 });

    hub.ingest(makeNormalized());
    hub.ingest(makeNormalized());
    expect(() => hub.ingest(makeNormalized())).toThrow(OverloadedError);
    expect(hub.health().pending_writes).toBe(2);

    store.open();
    await hub.flush();

    expect(hub.ingest(makeNormalized()).id).toBe(3);
    await hub.flush();
  });
});

// ─── persistence ─────────────────────────────────────────────

describe('IngestionHub — persistence', () => {
  it('appends strictly in id order', async () => {
    const store = new GatedStore();
    const hub = newHub(store);

    for (let i = 0; i < 5; i++) hub.ingest(makeNormalized({ trace_id: `t-${i % 2}` }));
    store.open();
    await hub.flush();

    expect(store.appendCalls).toEqual([1, 2, 3, 4, 5]);
  });

  it('retries a failed append and then succeeds', async () => {
    const store = new InMemoryEventStore();
    const append = vi.spyOn(store, 'append')
      .mockRejectedValueOnce(new Error('connection reset'))
      .mockRejectedValueOnce(new Error('connection reset'));
    const hub = newHub(store, { writeRetries: 3 });

    hub.ingest(makeNormalized());
    await hub.flush();

    expect(append).toHaveBeenCalledTimes(3);
    expect(hub.health()).toMatchObject({ persisted: 1, unpersisted: 0, pending_writes: 0 });
    expect(await store.queryByTrace('trace-1')).toHaveLength(1);
  });

  it('treats a retried append that already landed as done', async () => {
    const store = new InMemoryEventStore();
    const original = store.append.bind(store);
    let calls = 0;
    vi.spyOn(store, 'append').mockImplementation(async (event: Event) => {
      const inserted = await original(event);
      calls++;
      if (calls === 1) throw new Error('ack lost');
      return inserted;
    });
    const hub = newHub(store);

    hub.ingest(makeNormalized());
    await hub.flush();

    expect(calls).toBe(2);
    expect(hub.health().persisted).toBe(1);
    expect(log.debug).toHaveBeenCalledWith({ id: 1, trace_id: 'trace-1' }, 'Duplicate event skipped');
    expect((await store.stats()).total_events).toBe(1);
  });

  it('gives up after the configured retries and keeps going', async () => {
    const store = new InMemoryEventStore();
    vi.spyOn(store, 'append').mockRejectedValue(new Error('disk full'));
    const hub = newHub(store, { writeRetries: 2 });

    const received: number[] = [];
    await hub.subscribe((event) => {
      received.push(event.id);
    });

    hub.ingest(makeNormalized());
    hub.ingest(makeNormalized());
    await hub.flush();

    expect(hub.health()).toMatchObject({
      persisted: 0,
      unpersisted: 2,
      pending_writes: 0,
      last_persistence_error: 'Event 2 not persisted after 3 attempts',
    });
    expect(log.error).toHaveBeenCalledWith(
      expect.objectContaining({ err: expect.any(PersistenceFailureError), id: 1 }),
      'Event not persisted',
    );
    // Live delivery is unaffected by persistence failures.
    expect(received).toEqual([1, 2]);
  });

  it('bounds each append with the write timeout', async () => {
    const store = new InMemoryEventStore();
    vi.spyOn(store, 'append').mockImplementation(() => new Promise<boolean>(() => undefined));
    const hub = newHub(store, { writeTimeoutMs: 10, writeRetries: 0 });

    hub.ingest(makeNormalized());
    await hub.flush();

    expect(hub.health().last_persistence_error).toBe('Event 1 not persisted after 1 attempts');
  });
});

// ─── live subscribers ────────────────────────────────────────

describe('IngestionHub — subscribers', () => {
  it('delivers every event in acceptance order', async () => {
    const hub = newHub();
    const received: number[] = [];
    await hub.subscribe((event) => {
      received.push(event.id);
    });

    for (let i = 0; i < 10; i++) hub.ingest(makeNormalized());

    await vi.waitFor(() => expect(received).toHaveLength(10));
    expect(received).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
  });

  it('filters by trace', async () => {
    const hub = newHub();
    const received: string[] = [];
    await hub.subscribe((event) => {
      received.push(`${event.id}:${event.trace_id}`);
    }, { traceId: 'b' });

    hub.ingest(makeNormalized({ trace_id: 'a' }));
    hub.ingest(makeNormalized({ trace_id: 'b' }));
    hub.ingest(makeNormalized({ trace_id: 'a' }));
    hub.ingest(makeNormalized({ trace_id: 'b' }));

    await vi.waitFor(() => expect(received).toHaveLength(2));
    expect(received).toEqual(['2:b', '4:b']);
  });

  it('drops a stalled subscriber without affecting the others', async () => {
    const hub = newHub(undefined, { subscriberBacklog: 3, deliveryTimeoutMs: 60_000 });

    const closes: Array<[CloseReason, ConnectionLostError | null]> = [];
    const stalled = await hub.subscribe(() => new Promise<void>(() => undefined), {
      onClose: (reason, error) => closes.push([reason, error]),
    });

    const received: number[] = [];
    await hub.subscribe((event) => {
      received.push(event.id);
    });

    for (let i = 0; i < 10; i++) {
      hub.ingest(makeNormalized());
      await tick();
    }

    await vi.waitFor(() => expect(received).toHaveLength(10));
    expect(received).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);

    expect(stalled.closeReason).toBe('backlog_overflow');
    expect(closes).toHaveLength(1);
    expect(closes[0]?.[1]?.message).toBe(`Subscriber ${stalled.id} disconnected: backlog_overflow`);
    expect(hub.health()).toMatchObject({ subscribers: 1, disconnected_subscribers: 1 });
  });

  it('drops a subscriber whose delivery times out', async () => {
    const hub = newHub(undefined, { deliveryTimeoutMs: 10 });
    const sub = await hub.subscribe(() => new Promise<void>(() => undefined));

    hub.ingest(makeNormalized());

    await vi.waitFor(() => expect(sub.closeReason).toBe('delivery_timeout'));
  });

  it('drops a subscriber whose sink throws', async () => {
    const hub = newHub();
    const sub = await hub.subscribe(() => {
      throw new Error('socket gone');
    });

    hub.ingest(makeNormalized());

    await vi.waitFor(() => expect(sub.closeReason).toBe('delivery_failed'));
    expect(hub.health().disconnected_subscribers).toBe(1);
  });

  it('stops delivering after unsubscribe', async () => {
    const hub = newHub();
    const received: number[] = [];
    const sub = await hub.subscribe((event) => {
      received.push(event.id);
    });

    hub.ingest(makeNormalized());
    await vi.waitFor(() => expect(received).toEqual([1]));

    sub.unsubscribe();
    hub.ingest(makeNormalized());
    await tick();

    expect(received).toEqual([1]);
    expect(hub.health()).toMatchObject({ subscribers: 0, disconnected_subscribers: 0 });
  });
});

// ─── replay ──────────────────────────────────────────────────

describe('IngestionHub — replay', () => {
  it('requires a trace id', async () => {
    const hub = newHub();
    await expect(hub.subscribe(() => undefined, { replay: true })).rejects.toThrow(ValidationError);
  });

  it('replays persisted and still-pending events, then continues live', async () => {
    const store = new GatedStore();
    const hub = newHub(store);

    hub.ingest(makeNormalized({ trace_id: 'r' }));
    hub.ingest(makeNormalized({ trace_id: 'other' }));
    hub.ingest(makeNormalized({ trace_id: 'r' }));

    // Nothing persisted yet: the replay comes from the pending queue.
    const received: number[] = [];
    await hub.subscribe((event) => {
      received.push(event.id);
    }, { traceId: 'r', replay: true });

    hub.ingest(makeNormalized({ trace_id: 'r' }));
    store.open();

    await vi.waitFor(() => expect(received).toHaveLength(3));
    expect(received).toEqual([1, 3, 4]);
    await hub.flush();
  });

  it('has no gap or duplicate when events arrive during the store read', async () => {
    const store = new InMemoryEventStore();
    const hub = newHub(store);

    hub.ingest(makeNormalized({ trace_id: 'r' }));
    await hub.flush();

    const readGate = deferred();
    const query = store.queryByTrace.bind(store);
    vi.spyOn(store, 'queryByTrace').mockImplementation(async (traceId: string) => {
      await readGate.promise;
      return query(traceId);
    });

    const received: number[] = [];
    const subscribing = hub.subscribe((event) => {
      received.push(event.id);
    }, { traceId: 'r', replay: true });

    // Accepted while the replay read is in flight; persisted before it returns.
    hub.ingest(makeNormalized({ trace_id: 'r' }));
    await hub.flush();
    readGate.resolve();
    await subscribing;

    hub.ingest(makeNormalized({ trace_id: 'r' }));

    await vi.waitFor(() => expect(received).toHaveLength(3));
    await tick();
    expect(received).toEqual([1, 2, 3]);
  });

  it('drops the subscriber when the replay read fails', async () => {
    const store = new InMemoryEventStore();
    vi.spyOn(store, 'queryByTrace').mockRejectedValue(new Error('db down'));
    const hub = newHub(store);

    const subscribing = hub.subscribe(() => undefined, { traceId: 'r', replay: true });

    await expect(subscribing).rejects.toThrow(ConnectionLostError);
    await expect(subscribing).rejects.toThrow(/replay_failed/);
    expect(hub.health()).toMatchObject({ subscribers: 0, disconnected_subscribers: 1 });
  });
});

// ─── round trip & shutdown ───────────────────────────────────

describe('IngestionHub — round trip and close', () => {
  it('persists exactly what it returned to the producer', async () => {
    const store = new InMemoryEventStore();
    const hub = newHub(store);

    const accepted = hub.ingest(makeNormalized({
      trace_id: 'rt',
      locals: { user: '42' },
      stacktrace: ['Error: x'],
      severity: 'error',
    }));
    await hub.flush();

    expect(await store.queryByTrace('rt')).toEqual([accepted]);
  });

  it('keeps persisted events immutable through every reference handed out', async () => {
    const store = new InMemoryEventStore();
    const hub = newHub(store);
    const locals = { user: 'alice' };
    const stacktrace = ['Error: x'];

    const accepted = hub.ingest(makeNormalized({ trace_id: 'frozen', locals, stacktrace }));
    await hub.flush();
    const [stored] = await store.queryByTrace('frozen');

    locals.user = 'mallory';
    stacktrace.push('injected');
    expect(Reflect.set(stored?.locals ?? {}, 'user', 'mallory')).toBe(false);
    expect(Reflect.set(accepted, 'system', 'other')).toBe(false);

    expect(await store.queryByTrace('frozen')).toEqual([
      expect.objectContaining({ system: 'web', locals: { user: 'alice' }, stacktrace: ['Error: x'] }),
    ]);
    expect(Object.isFrozen(accepted.locals)).toBe(true);
    expect(Object.isFrozen(accepted.stacktrace)).toBe(true);
  });

  it('rejects subscribers once closed', async () => {
    const hub = newHub();
    await hub.close();

    await expect(hub.subscribe(() => undefined)).rejects.toThrow(ConnectionLostError);
    expect(hub.health().subscribers).toBe(0);
  });

  it('closes every subscription and drains pending writes', async () => {
    const store = new GatedStore();
    const hub = newHub(store);
    const reasons: CloseReason[] = [];
    await hub.subscribe(() => undefined, { onClose: (reason) => reasons.push(reason) });

    hub.ingest(makeNormalized());
    const closing = hub.close();
    store.open();
    await closing;

    expect(reasons).toEqual(['hub_closed']);
    expect(hub.health()).toMatchObject({ subscribers: 0, pending_writes: 0, persisted: 1 });
  });
});
