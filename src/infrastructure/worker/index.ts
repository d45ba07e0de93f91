export { runStreamConsumer, ensureConsumerGroup, parseReadResponse, processEntries } from './stream-consumer.js';
export type { StreamEntry, EntryOutcome, EntryHandler, StreamConsumerOptions } from './stream-consumer.js';
export { startEventIngestConsumer, createEventEntryHandler } from './event-ingest-consumer.js';
