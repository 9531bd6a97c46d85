import type { Queue } from 'bullmq';
import { JOB_NAMES, SCHEDULER_IDS } from './constants.js';
import { logger } from '../utils/logger.js';

/** 5-field cron pattern firing once a day at hour:minute (server time). */
export function dailyCronPattern(hour: number, minute: number): string {
  if (!Number.isInteger(hour) || hour < 0 || hour > 23) {
    throw new RangeError(`Invalid run hour: ${hour}`);
  }
  if (!Number.isInteger(minute) || minute < 0 || minute > 59) {
    throw new RangeError(`Invalid run minute: ${minute}`);
  }
  return `${minute} ${hour} * * *`;
}

/**
 * Registers the daily ingest as a repeatable job.
 * Uses upsertJobScheduler so restarts (and changed run times) are idempotent.
 */
export async function startScheduler(
  queue: Queue,
  runAt: { hour: number; minute: number },
): Promise<string> {
  const pattern = dailyCronPattern(runAt.hour, runAt.minute);

  await queue.upsertJobScheduler(
    SCHEDULER_IDS.DAILY_INGEST,
    { pattern },
    {
      name: JOB_NAMES.DAILY_INGEST,
      data: {},
    },
  );

  logger.info({ schedulerId: SCHEDULER_IDS.DAILY_INGEST, pattern }, 'Registered job scheduler');
  return pattern;
}

/** Enqueues one run now, outside the daily schedule. */
export async function triggerIngestNow(queue: Queue): Promise<void> {
  const job = await queue.add(JOB_NAMES.DAILY_INGEST, { manual: true });
  logger.info({ job: job.id }, 'Enqueued manual ingest run');
}
