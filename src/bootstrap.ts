import { toPipelineConfig, type AppConfig } from './config.js';
import { createSql, type Sql } from './db/pool.js';
import { PostgresArticleRepository } from './db/queries.js';
import { createHttpClient } from './workers/http-client.js';
import { createOpenAISummarizer } from './summarizer/index.js';
import { DailyJob } from './jobs/daily-job.js';
import { logger } from './utils/logger.js';

export interface Pipeline {
  sql: Sql;
  repository: PostgresArticleRepository;
  dailyJob: DailyJob;
}

/** Wires the production collaborators of a run from the parsed config. */
export function createPipeline(config: AppConfig): Pipeline {
  logger.level = config.LOG_LEVEL;

  const pipelineConfig = toPipelineConfig(config);
  const sql = createSql(config.DATABASE_URL);
  const repository = new PostgresArticleRepository(sql);
  const dailyJob = new DailyJob(pipelineConfig, {
    http: createHttpClient({ delayMs: pipelineConfig.requestDelayMs }),
    repository,
    summarizer: createOpenAISummarizer({
      apiKey: config.OPENAI_API_KEY,
      model: config.OPENAI_MODEL,
    }),
  });

  return { sql, repository, dailyJob };
}
