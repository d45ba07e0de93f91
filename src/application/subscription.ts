import type { Event, DisconnectReason } from '../domain/index.js';
import { ConnectionLostError } from '../domain/index.js';
import { TimeoutError, withTimeout } from './async-utils.js';

/** Receives accepted events one at a time, in acceptance order. */
export type EventSink = (event: Event) => void | Promise<void>;

export type CloseReason = DisconnectReason | 'unsubscribed';

export type CloseHandler = (reason: CloseReason, error: ConnectionLostError | null) => void;

export interface SubscribeOptions {
  /** Deliver only events of this trace. */
  traceId?: string | undefined;
  /** Deliver the trace's already-accepted events before live ones. Requires `traceId`. */
  replay?: boolean | undefined;
  onClose?: CloseHandler | undefined;
}

export interface SubscriptionLimits {
  /** Live events that may wait for delivery before the subscriber is dropped. */
  backlog: number;
  deliveryTimeoutMs: number;
}

/**
 * One live subscriber of the ingestion hub.
 *
 * Owns a bounded queue and its own delivery pump, so a slow sink only
 * ever delays itself. `offer()` is O(1) and never runs sink code.
 *
 * Replayed events sit in a separate queue that is drained first and does
 * not count toward the backlog bound. Live events with an id at or below
 * the last replayed id are discarded, so the replay→live boundary has
 * neither gaps nor duplicates.
 */
export class Subscription {
  private readonly live: Event[] = [];
  private replayQueue: Event[] = [];
  private holding: boolean;
  private pumping = false;
  private closedWith: CloseReason | null = null;
  private floor = 0;

  constructor(
    readonly id: number,
    private readonly sink: EventSink,
    private readonly limits: SubscriptionLimits,
    private readonly options: SubscribeOptions,
    private readonly onDetach: (sub: Subscription, reason: CloseReason, error: ConnectionLostError | null) => void,
  ) {
    this.holding = options.replay === true;
  }

  get traceId(): string | undefined {
    return this.options.traceId;
  }

  get closed(): boolean {
    return this.closedWith !== null;
  }

  get closeReason(): CloseReason | null {
    return this.closedWith;
  }

  /** Live events waiting for delivery. */
  get backlog(): number {
    return this.live.length;
  }

  /** Queues an accepted event. Drops the subscriber when the backlog bound is hit. */
  offer(event: Event): void {
    if (this.closedWith !== null) return;
    if (this.options.traceId !== undefined && event.trace_id !== this.options.traceId) return;
    if (event.id <= this.floor) return;

    if (this.live.length >= this.limits.backlog) {
      this.fail('backlog_overflow');
      return;
    }

    this.live.push(event);
    this.schedulePump();
  }

  /**
   * Ends the replay phase. `events` must be sorted by id.
   * Live events already covered by the replay are discarded.
   */
  completeReplay(events: readonly Event[]): void {
    if (this.closedWith !== null) return;

    const lastReplayed = events[events.length - 1];
    if (lastReplayed !== undefined) {
      this.floor = Math.max(this.floor, lastReplayed.id);
    }
    let head = this.live[0];
    while (head !== undefined && head.id <= this.floor) {
      this.live.shift();
      head = this.live[0];
    }

    this.replayQueue = [...events];
    this.holding = false;
    this.schedulePump();
  }

  unsubscribe(): void {
    this.close('unsubscribed', null);
  }

  /** Drops the subscriber involuntarily and returns the error describing why. */
  fail(reason: DisconnectReason, cause?: unknown): ConnectionLostError {
    const error = new ConnectionLostError(this.id, reason, { cause });
    this.close(reason, error);
    return error;
  }

  private close(reason: CloseReason, error: ConnectionLostError | null): void {
    if (this.closedWith !== null) return;
    this.closedWith = reason;
    this.live.length = 0;
    this.replayQueue = [];
    this.onDetach(this, reason, error);
    this.options.onClose?.(reason, error);
  }

  private schedulePump(): void {
    if (this.pumping || this.holding) return;
    this.pumping = true;
    queueMicrotask(() => {
      void this.pump();
    });
  }

  /** Never rejects: delivery failures close the subscription. */
  private async pump(): Promise<void> {
    try {
      for (;;) {
        if (this.closedWith !== null) return;
        const event = this.replayQueue.shift() ?? this.live.shift();
        if (event === undefined) return;

        try {
          await withTimeout(() => this.sink(event), this.limits.deliveryTimeoutMs, 'delivery');
        } catch (err: unknown) {
          this.fail(err instanceof TimeoutError ? 'delivery_timeout' : 'delivery_failed', err);
          return;
        }
      }
    } finally {
      this.pumping = false;
    }
  }
}
