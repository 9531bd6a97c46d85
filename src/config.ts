import { z } from 'zod';
import { ConfigError } from './errors.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('true')
  .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_URL: z.string().trim().min(1, 'DATABASE_URL is required'),
  OPENAI_API_KEY: z.string().trim().min(1, 'OPENAI_API_KEY is required'),
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  REDIS_HOST: z.string().default('127.0.0.1'),
  REDIS_PORT: z.coerce.number().int().positive().default(6379),
  DAILY_RUN_HOUR: z.coerce.number().int().min(0).max(23).default(9),
  DAILY_RUN_MINUTE: z.coerce.number().int().min(0).max(59).default(0),
  SCRAPER_DELAY_SECONDS: z.coerce.number().min(0).default(2),
  LOG_LEVEL: z
    .string()
    .toLowerCase()
    .pipe(z.enum(['trace', 'debug', 'info', 'warn', 'error']))
    .default('info'),
  MAX_ARTICLES_PER_SOURCE: z.coerce.number().int().positive().default(25),
  MAX_ARTICLES_PER_RUN: z.coerce.number().int().positive().default(100),
  SKIP_EXISTING_URLS: booleanFlag,
  SUMMARY_FAILURE_POLICY: z.enum(['store', 'skip']).default('store'),
});

export type AppConfig = z.infer<typeof envSchema>;

export type SummaryFailurePolicy = AppConfig['SUMMARY_FAILURE_POLICY'];

/** Options the job runner is constructed with. */
export interface PipelineConfig {
  requestDelayMs: number;
  maxArticlesPerSource: number;
  maxArticlesPerRun: number;
  skipExistingUrls: boolean;
  summaryFailurePolicy: SummaryFailurePolicy;
}

function configError(error: z.ZodError): ConfigError {
  const issues = error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
  return new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
}

/**
 * Parses the environment. Missing credentials or malformed values raise a
 * ConfigError listing every offending variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw configError(result.error);
  }
  return result.data;
}

const databaseEnvSchema = envSchema.pick({ DATABASE_URL: true, LOG_LEVEL: true });

/** For tools that only touch the database (migrations). */
export function loadDatabaseConfig(
  env: NodeJS.ProcessEnv = process.env,
): z.infer<typeof databaseEnvSchema> {
  const result = databaseEnvSchema.safeParse(env);
  if (!result.success) {
    throw configError(result.error);
  }
  return result.data;
}

export function toPipelineConfig(config: AppConfig): PipelineConfig {
  return {
    requestDelayMs: Math.round(config.SCRAPER_DELAY_SECONDS * 1000),
    maxArticlesPerSource: config.MAX_ARTICLES_PER_SOURCE,
    maxArticlesPerRun: config.MAX_ARTICLES_PER_RUN,
    skipExistingUrls: config.SKIP_EXISTING_URLS,
    summaryFailurePolicy: config.SUMMARY_FAILURE_POLICY,
  };
}
