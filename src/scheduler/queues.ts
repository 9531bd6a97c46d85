import { Queue, type ConnectionOptions } from 'bullmq';
import { QUEUE_NAMES } from './constants.js';

export function redisConnection(host: string, port: number): ConnectionOptions {
  return { host, port };
}

/** A run already isolates its own failures, so BullMQ does not retry it. */
export function createIngestQueue(connection: ConnectionOptions): Queue {
  return new Queue(QUEUE_NAMES.INGEST, {
    connection,
    defaultJobOptions: {
      attempts: 1,
      removeOnComplete: { count: 100 },
      removeOnFail: { count: 500 },
    },
  });
}
