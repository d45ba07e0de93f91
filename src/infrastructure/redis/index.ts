export { default as redisIngestPlugin } from './redis-plugin.js';
export type { RedisIngestPluginOptions } from './redis-plugin.js';
export { publishRawEvent, EVENT_STREAM_KEY } from './event-producer.js';
export {
  enqueueTracedJob,
  startTracedJobWorker,
  createJobEntryHandler,
  parseJobEntry,
  JobCaptureAdapter,
} from './traced-queue.js';
export type { JobRequest, TracedJob, JobHandler, TracedJobWorkerOptions } from './traced-queue.js';
