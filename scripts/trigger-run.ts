/**
 * Enqueue one ingest run outside the daily schedule.
 * The long-running process (npm start) picks it up.
 * Usage: npx tsx scripts/trigger-run.ts
 */
import { loadConfig } from '../src/config.js';
import { createIngestQueue, redisConnection } from '../src/scheduler/queues.js';
import { triggerIngestNow } from '../src/scheduler/index.js';

const config = loadConfig();
const queue = createIngestQueue(redisConnection(config.REDIS_HOST, config.REDIS_PORT));

try {
  await triggerIngestNow(queue);
} finally {
  await queue.close();
}
