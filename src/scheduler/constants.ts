export const QUEUE_NAMES = {
  INGEST: 'ingest-queue',
} as const;

export const JOB_NAMES = {
  DAILY_INGEST: 'daily-ingest',
} as const;

export const SCHEDULER_IDS = {
  DAILY_INGEST: 'daily-ingest',
} as const;
