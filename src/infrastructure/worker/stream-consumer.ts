import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import { sleep } from '../../application/async-utils.js';

/** One stream entry, fields flattened into a map. */
export interface StreamEntry {
  id: string;
  fields: Map<string, string>;
}

/**
 * `ack` — done with the entry (processed or deliberately skipped).
 * `retry` — leave it pending; the loop backs off and re-reads its
 * pending entries list before taking new ones.
 */
export type EntryOutcome = 'ack' | 'retry';

export type EntryHandler = (entry: StreamEntry) => Promise<EntryOutcome>;

export interface StreamConsumerOptions {
  stream: string;
  group: string;
  consumer: string;
  /** Max entries per read. */
  batchSize?: number;
  /** How long a read blocks waiting for new entries. */
  blockMs?: number;
  /** Back-off after a `retry` outcome or a handler failure. */
  retryDelayMs?: number;
}

const DEFAULT_BATCH_SIZE = 100;
const DEFAULT_BLOCK_MS = 5000;
const DEFAULT_RETRY_DELAY_MS = 1000;

function toFieldMap(raw: unknown): Map<string, string> {
  const map = new Map<string, string>();
  if (!Array.isArray(raw)) return map;
  for (let i = 0; i + 1 < raw.length; i += 2) {
    const key: unknown = raw[i];
    const value: unknown = raw[i + 1];
    if (typeof key === 'string' && typeof value === 'string') {
      map.set(key, value);
    }
  }
  return map;
}

/**
 * Flattens an XREADGROUP reply (`[[stream, [[id, [f, v, ...]], ...]], ...]`).
 * A `null` reply (block timeout) yields no entries.
 */
export function parseReadResponse(response: unknown): StreamEntry[] {
  if (!Array.isArray(response)) return [];

  const entries: StreamEntry[] = [];
  for (const stream of response) {
    if (!Array.isArray(stream)) continue;
    const items: unknown = stream[1];
    if (!Array.isArray(items)) continue;

    for (const item of items) {
      if (!Array.isArray(item)) continue;
      const id: unknown = item[0];
      if (typeof id !== 'string') continue;
      entries.push({ id, fields: toFieldMap(item[1]) });
    }
  }
  return entries;
}

/**
 * Ensures the consumer group exists on the stream.
 *
 * Start ID "$": only entries arriving after group creation are delivered.
 * MKSTREAM creates the stream if needed. BUSYGROUP (group already
 * exists) is not an error.
 */
export async function ensureConsumerGroup(
  redis: Redis,
  log: Logger,
  stream: string,
  group: string,
): Promise<void> {
  try {
    await redis.xgroup('CREATE', stream, group, '$', 'MKSTREAM');
    log.info({ group, stream }, 'Consumer group created (from $)');
  } catch (err: unknown) {
    if (err instanceof Error && err.message.includes('BUSYGROUP')) {
      log.debug({ group }, 'Consumer group already exists');
      return;
    }
    throw err;
  }
}

/**
 * Hands entries to `handle` one at a time. XACK only after an `ack`
 * outcome; stops at the first `retry` or handler failure so later
 * entries are not acknowledged ahead of it.
 */
export async function processEntries(
  redis: Redis,
  log: Logger,
  options: Pick<StreamConsumerOptions, 'stream' | 'group'>,
  entries: readonly StreamEntry[],
  handle: EntryHandler,
): Promise<EntryOutcome> {
  for (const entry of entries) {
    let outcome: EntryOutcome;
    try {
      // Already-acknowledged entries come back from the pending list with no fields.
      outcome = entry.fields.size === 0 ? 'ack' : await handle(entry);
    } catch (err: unknown) {
      log.error({ err, streamId: entry.id }, 'Stream entry handler failed — leaving entry pending');
      return 'retry';
    }

    if (outcome === 'retry') return 'retry';
    await redis.xack(options.stream, options.group, entry.id);
  }
  return 'ack';
}

/**
 * Main consumer loop.
 *
 * Starts from this consumer's pending entries list (crash recovery), then
 * reads new entries with BLOCK. After a `retry` it backs off and goes
 * back to the pending list, so entries are handled in stream order.
 *
 * The loop runs until `signal` is aborted.
 */
export async function runStreamConsumer(
  redis: Redis,
  log: Logger,
  signal: AbortSignal,
  options: StreamConsumerOptions,
  handle: EntryHandler,
): Promise<void> {
  const { stream, group, consumer } = options;
  const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
  const blockMs = options.blockMs ?? DEFAULT_BLOCK_MS;
  const retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;

  await ensureConsumerGroup(redis, log, stream, group);
  log.info({ consumer, group, stream }, 'Consumer started');

  let cursor: '0' | '>' = '0';

  while (!signal.aborted) {
    try {
      const response: unknown = await redis.xreadgroup(
        'GROUP', group, consumer,
        'COUNT', batchSize,
        'BLOCK', blockMs,
        'STREAMS', stream,
        cursor,
      );

      const entries = parseReadResponse(response);
      if (entries.length === 0) {
        cursor = '>';
        continue;
      }

      const outcome = await processEntries(redis, log, options, entries, handle);
      if (outcome === 'retry') {
        cursor = '0';
        await sleep(retryDelayMs);
      }
    } catch (err: unknown) {
      if (signal.aborted) break;
      log.error({ err }, 'Consumer loop error — retrying');
      await sleep(retryDelayMs);
    }
  }

  log.info({ consumer }, 'Consumer stopped');
}
