import { loadConfig } from './config.js';
import { createPipeline } from './bootstrap.js';
import { createServer } from './api/server.js';
import { createIngestQueue, redisConnection } from './scheduler/queues.js';
import { startScheduler } from './scheduler/index.js';
import { createIngestWorker } from './workers/ingest-worker.js';
import { logger } from './utils/logger.js';

async function main(): Promise<void> {
  const config = loadConfig();
  logger.info('Starting daily-news-digest...');

  const { sql, repository, dailyJob } = createPipeline(config);

  const connection = redisConnection(config.REDIS_HOST, config.REDIS_PORT);
  const queue = createIngestQueue(connection);
  const worker = createIngestWorker(dailyJob, connection);

  const pattern = await startScheduler(queue, {
    hour: config.DAILY_RUN_HOUR,
    minute: config.DAILY_RUN_MINUTE,
  });
  logger.info({ pattern }, 'Daily ingest scheduled');

  const server = await createServer({ repository, logLevel: config.LOG_LEVEL });
  await server.listen({ port: config.PORT, host: '0.0.0.0' });

  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);
    await server.close();
    await worker.close();
    await queue.close();
    await sql.end();
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

main().catch((err) => {
  logger.fatal(err, 'Failed to start');
  process.exit(1);
});
