import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

/**
 * Trace id propagation.
 *
 * Each logical execution unit (request, job) runs inside its own
 * AsyncLocalStorage scope holding a mutable cell. Async continuations
 * created inside the scope see the same cell; sibling scopes never do.
 */

interface TraceCell {
  traceId: string | undefined;
}

const traceStorage = new AsyncLocalStorage<TraceCell>();

/** Field name used to carry the trace id on queued work items. */
export const TRACE_ID_FIELD = 'trace_id';

export function generateTraceId(): string {
  return randomUUID();
}

export function getTraceId(): string | undefined {
  return traceStorage.getStore()?.traceId;
}

/**
 * Binds `traceId` to the current execution unit.
 *
 * Outside any scope a fresh cell is entered for the current async
 * resource, so the binding never leaks into unrelated callers.
 */
export function setTraceId(traceId: string): void {
  const cell = traceStorage.getStore();
  if (cell) {
    cell.traceId = traceId;
    return;
  }
  traceStorage.enterWith({ traceId });
}

/** Runs `fn` in a new scope with `traceId` bound. */
export function runWithTrace<T>(traceId: string | undefined, fn: () => T): T {
  return traceStorage.run({ traceId }, fn);
}

/** Runs `fn` in a new, unbound scope. */
export function runInTraceScope<T>(fn: () => T): T {
  return runWithTrace(undefined, fn);
}

/** Returns the bound id, binding a freshly generated one when absent. */
export function ensureTraceId(): string {
  const current = getTraceId();
  if (current !== undefined) return current;
  const traceId = generateTraceId();
  setTraceId(traceId);
  return traceId;
}

/** camelCase spelling some producers put on their payloads. */
const LEGACY_TRACE_ID_FIELD = 'traceId';

/**
 * Copies the current trace id onto an outgoing work item.
 * An id already present on the item, in either spelling, wins.
 */
export function attachTraceId<T extends object>(
  item: T,
): T & { [TRACE_ID_FIELD]?: string } {
  if (readAttachedTraceId(item) !== undefined) return item;
  const traceId = getTraceId();
  if (traceId === undefined) return item;
  return { ...item, [TRACE_ID_FIELD]: traceId };
}

function stringAt(item: object, key: string): string | undefined {
  const value: unknown = Reflect.get(item, key);
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function readAttachedTraceId(item: object): string | undefined {
  return stringAt(item, TRACE_ID_FIELD) ?? stringAt(item, LEGACY_TRACE_ID_FIELD);
}

/**
 * Restores the trace id carried by a dequeued work item and runs `fn`
 * in its own scope. Items without an id start a new trace.
 */
export function runWithAttachedTrace<T>(item: object, fn: (traceId: string) => T): T {
  const traceId = readAttachedTraceId(item) ?? generateTraceId();
  return runWithTrace(traceId, () => fn(traceId));
}
