import postgres from 'postgres';
import { loadDatabaseConfig } from '../src/config.js';
import { runMigrations } from '../migrations/runner.js';
import { logger } from '../src/utils/logger.js';

const config = loadDatabaseConfig();
logger.level = config.LOG_LEVEL;

const sql = postgres(config.DATABASE_URL, { max: 1 });
try {
  logger.info('Running migrations...');
  await runMigrations(sql);
} finally {
  await sql.end();
}
