import type { Logger } from 'pino';
import type { Event, NormalizedEvent } from '../domain/index.js';
import {
  ConnectionLostError,
  OverloadedError,
  PersistenceFailureError,
  ValidationError,
} from '../domain/index.js';
import type { EventStore } from './event-store.js';
import { sleep, withTimeout } from './async-utils.js';
import {
  Subscription,
  type CloseReason,
  type EventSink,
  type SubscribeOptions,
} from './subscription.js';

export interface HubOptions {
  /** Accepted events waiting for a durable write before `ingest` reports Overloaded. */
  maxPendingWrites: number;
  /** Per-subscriber live backlog bound. */
  subscriberBacklog: number;
  writeTimeoutMs: number;
  /** Extra attempts after the first failed append. */
  writeRetries: number;
  retryBaseDelayMs: number;
  deliveryTimeoutMs: number;
}

export const DEFAULT_HUB_OPTIONS: HubOptions = {
  maxPendingWrites: 10_000,
  subscriberBacklog: 1_000,
  writeTimeoutMs: 5_000,
  writeRetries: 3,
  retryBaseDelayMs: 100,
  deliveryTimeoutMs: 10_000,
};

export interface HubHealth {
  last_sequence: number;
  pending_writes: number;
  persisted: number;
  unpersisted: number;
  subscribers: number;
  disconnected_subscribers: number;
  last_persistence_error: string | null;
}

/** Deep-freezes an accepted event; nested values are copied so the producer keeps no writable alias. */
function freezeEvent(id: number, event: NormalizedEvent): Event {
  return Object.freeze({
    id,
    ...event,
    locals: event.locals === null ? null : Object.freeze({ ...event.locals }),
    stacktrace: event.stacktrace === null ? null : Object.freeze([...event.stacktrace]),
  });
}

function mergeById(...sources: ReadonlyArray<readonly Event[]>): Event[] {
  const byId = new Map<number, Event>();
  for (const source of sources) {
    for (const event of source) {
      byId.set(event.id, event);
    }
  }
  return [...byId.values()].sort((a, b) => a.id - b.id);
}

/**
 * Accepts normalized events, assigns the global sequence number and
 * commits each event to the persistence queue and to every live
 * subscriber.
 *
 * `ingest()` is synchronous: the `++sequence` it performs is the single
 * serialization point of the whole system. Persistence runs in one drain
 * loop that appends strictly in id order; each subscriber has its own
 * bounded queue. Neither path is ever awaited by a producer.
 *
 * Errors on already-accepted events (failed writes, dropped subscribers)
 * are logged and counted in `health()`, never reported to the producer.
 */
export class IngestionHub {
  private readonly store: EventStore;
  private readonly log: Logger;
  private readonly options: HubOptions;

  private sequence = 0;
  private closed = false;
  private readonly pending: Event[] = [];
  private draining: Promise<void> | null = null;

  private readonly subscriptions = new Set<Subscription>();
  private nextSubscriberId = 1;

  private persisted = 0;
  private unpersisted = 0;
  private disconnected = 0;
  private lastPersistenceError: string | null = null;

  constructor(store: EventStore, log: Logger, options: Partial<HubOptions> = {}) {
    this.store = store;
    this.log = log.child({ component: 'ingestion-hub' });
    this.options = { ...DEFAULT_HUB_OPTIONS, ...options };
  }

  /** Resumes the sequence after the highest stored id so ids are never reused. */
  async start(): Promise<void> {
    const last = await this.store.lastSequence();
    this.sequence = Math.max(this.sequence, last);
    this.log.info({ lastSequence: this.sequence }, 'Ingestion hub started');
  }

  /**
   * Accepts one event.
   *
   * @throws OverloadedError when the persistence queue is full. No
   *   sequence number is consumed in that case.
   */
  ingest(event: NormalizedEvent): Event {
    if (this.pending.length >= this.options.maxPendingWrites) {
      throw new OverloadedError(this.pending.length);
    }

    const accepted = freezeEvent(++this.sequence, event);

    this.pending.push(accepted);
    this.scheduleDrain();

    for (const sub of this.subscriptions) {
      sub.offer(accepted);
    }

    return accepted;
  }

  /**
   * Attaches a live subscriber.
   *
   * The subscriber is registered before this call first yields, so it
   * receives every event accepted from that moment on. With `replay`,
   * events of the trace accepted earlier are read from the store plus the
   * not-yet-persisted queue and delivered first.
   *
   * @throws ConnectionLostError (`hub_closed`) once `close()` was called.
   */
  async subscribe(sink: EventSink, options: SubscribeOptions = {}): Promise<Subscription> {
    const { traceId } = options;
    if (options.replay === true && traceId === undefined) {
      throw new ValidationError('Replay requires a trace_id');
    }
    if (this.closed) {
      throw new ConnectionLostError(this.nextSubscriberId++, 'hub_closed');
    }

    const sub = new Subscription(
      this.nextSubscriberId++,
      sink,
      {
        backlog: this.options.subscriberBacklog,
        deliveryTimeoutMs: this.options.deliveryTimeoutMs,
      },
      options,
      (closed, reason, error) => this.detach(closed, reason, error),
    );

    this.subscriptions.add(sub);
    this.log.debug({ subscriberId: sub.id, traceId, replay: options.replay === true }, 'Subscriber attached');

    if (options.replay !== true || traceId === undefined) {
      return sub;
    }

    // Snapshot before the store read: an event persisted and dequeued while
    // the read is in flight is then still covered by one of the two sources.
    const unpersisted = this.pending.filter((e) => e.trace_id === traceId);

    try {
      const stored = await this.store.queryByTrace(traceId);
      sub.completeReplay(mergeById(stored, unpersisted));
    } catch (err: unknown) {
      throw sub.fail('replay_failed', err);
    }

    return sub;
  }

  /** Resolves once every accepted event has been written or given up on. */
  async flush(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  health(): HubHealth {
    return {
      last_sequence: this.sequence,
      pending_writes: this.pending.length,
      persisted: this.persisted,
      unpersisted: this.unpersisted,
      subscribers: this.subscriptions.size,
      disconnected_subscribers: this.disconnected,
      last_persistence_error: this.lastPersistenceError,
    };
  }

  /** Drops every subscriber, then waits for pending writes. */
  async close(): Promise<void> {
    this.closed = true;
    for (const sub of [...this.subscriptions]) {
      sub.fail('hub_closed');
    }
    await this.flush();
    this.log.info({ ...this.health() }, 'Ingestion hub closed');
  }

  private detach(sub: Subscription, reason: CloseReason, error: ConnectionLostError | null): void {
    this.subscriptions.delete(sub);

    if (error === null) {
      this.log.debug({ subscriberId: sub.id }, 'Subscriber detached');
      return;
    }

    this.disconnected++;
    this.log.warn(
      { err: error, subscriberId: sub.id, reason, subscriberCount: this.subscriptions.size },
      'Subscriber disconnected',
    );
  }

  private scheduleDrain(): void {
    if (this.draining) return;
    this.draining = this.drain().finally(() => {
      this.draining = null;
      if (this.pending.length > 0) this.scheduleDrain();
    });
  }

  /** Writes pending events one at a time, in id order. Never rejects. */
  private async drain(): Promise<void> {
    for (;;) {
      const event = this.pending[0];
      if (event === undefined) return;
      await this.persist(event);
      this.pending.shift();
    }
  }

  private async persist(event: Event): Promise<void> {
    const attempts = this.options.writeRetries + 1;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        const inserted = await withTimeout(
          () => this.store.append(event),
          this.options.writeTimeoutMs,
          'append',
        );
        this.persisted++;
        if (!inserted) {
          this.log.debug({ id: event.id, trace_id: event.trace_id }, 'Duplicate event skipped');
        }
        return;
      } catch (err: unknown) {
        if (attempt < attempts) {
          const delayMs = this.options.retryBaseDelayMs * 2 ** (attempt - 1);
          this.log.warn(
            { err, id: event.id, trace_id: event.trace_id, attempt, delayMs },
            'Event append failed — retrying',
          );
          await sleep(delayMs);
          continue;
        }

        const failure = new PersistenceFailureError(event.id, attempts, { cause: err });
        this.unpersisted++;
        this.lastPersistenceError = failure.message;
        this.log.error(
          { err: failure, id: event.id, trace_id: event.trace_id },
          'Event not persisted',
        );
      }
    }
  }
}
