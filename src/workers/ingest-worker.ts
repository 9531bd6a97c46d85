import { Worker, type ConnectionOptions, type Job } from 'bullmq';
import type { DailyJob } from '../jobs/daily-job.js';
import type { RunSummary } from '../types/job.js';
import { QUEUE_NAMES } from '../scheduler/constants.js';
import { logger } from '../utils/logger.js';

interface IngestJobData {
  manual?: boolean;
}

/** Runs are sequential: one worker, concurrency 1. */
export function createIngestWorker(dailyJob: DailyJob, connection: ConnectionOptions) {
  const worker = new Worker<IngestJobData, RunSummary | null>(
    QUEUE_NAMES.INGEST,
    async (job: Job<IngestJobData>) => {
      const log = logger.child({ job: job.id, manual: job.data.manual ?? false });
      log.info('Starting daily ingest run');
      const summary = await dailyJob.run();
      if (!summary) log.info('Previous run still in progress, nothing done');
      return summary;
    },
    {
      connection,
      concurrency: 1,
    },
  );

  worker.on('failed', (job, err) => {
    logger.error({ job: job?.id, err: err.message }, 'Ingest job failed');
  });

  return worker;
}
