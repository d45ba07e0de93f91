import { vi } from 'vitest';
import type { Logger } from 'pino';
import type { Event, NormalizedEvent } from '../src/domain/index.js';
import { InMemoryEventStore } from '../src/infrastructure/store/in-memory-event-store.js';

/** Minimal fake logger; `child()` returns the same fake so calls stay observable. */
export function fakeLogger() {
  const fake = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
    child: vi.fn(),
  };
  fake.child.mockImplementation(() => fake);
  return fake;
}

export type FakeLogger = ReturnType<typeof fakeLogger>;

export function asLogger(fake: FakeLogger): Logger {
  return fake as unknown as Logger;
}

export const BASE_TIME = '2026-03-01T10:00:00.000Z';

/**
 * Factory for normalized events with sensible defaults.
 * Override any field via the partial parameter.
 */
export function makeNormalized(overrides: Partial<NormalizedEvent> = {}): NormalizedEvent {
  return {
    trace_id: 'trace-1',
    system: 'web',
    event_type: 'log',
    severity: 'info',
    timestamp: BASE_TIME,
    file: null,
    line: null,
    source: null,
    locals: null,
    stacktrace: null,
    response: null,
    details: null,
    environment: 'test',
    ...overrides,
  };
}

export function makeEvent(id: number, overrides: Partial<NormalizedEvent> = {}): Event {
  return { id, ...makeNormalized(overrides) };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** In-memory store whose appends wait until `open()` is called. */
export class GatedStore extends InMemoryEventStore {
  private gate = deferred();
  readonly appendCalls: number[] = [];

  open(): void {
    this.gate.resolve();
  }

  override async append(event: Event): Promise<boolean> {
    this.appendCalls.push(event.id);
    await this.gate.promise;
    return super.append(event);
  }
}

/** Lets queued microtasks and I/O callbacks run. */
export function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
