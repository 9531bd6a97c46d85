/**
 * Process every active source once and exit.
 * Usage: npx tsx src/scripts/run-once.ts
 *
 * Exits 0 after a completed run, even when individual articles failed;
 * exits 1 on bad configuration or when the run itself cannot proceed.
 */
import { loadConfig } from '../config.js';
import { createPipeline } from '../bootstrap.js';
import { logger } from '../utils/logger.js';

async function main(): Promise<number> {
  const config = loadConfig();
  const { sql, dailyJob } = createPipeline(config);

  try {
    logger.info('Starting daily news job');
    const summary = await dailyJob.run();
    if (summary) {
      console.log(
        `Sources: ${summary.sources}, candidates: ${summary.candidates}, ` +
          `stored: ${summary.stored} (${summary.inserted} new), skipped: ${summary.skipped}, ` +
          `failed: ${summary.failed}, without summary: ${summary.unsummarized} ` +
          `(${summary.durationMs}ms)`,
      );
    }
    return 0;
  } finally {
    await sql.end();
  }
}

main().then(
  (code) => process.exit(code),
  (err) => {
    logger.fatal(err, 'Daily job failed');
    process.exit(1);
  },
);
