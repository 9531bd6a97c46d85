import type { PipelineConfig } from '../config.js';
import type { ArticleRepository } from '../db/repository.js';
import type { Summarizer } from '../summarizer/index.js';
import type { HttpClient } from '../workers/http-client.js';
import type { ArticleCandidate, ExtractedContent } from '../types/article.js';
import type { JobState, RunSummary } from '../types/job.js';
import type { Source } from '../types/source.js';
import { resolveSources } from '../sources/registry.js';
import { fetchCandidates } from '../fetchers/index.js';
import { extractArticle, DEFAULT_STRATEGIES, type ExtractionStrategy } from '../extractor/index.js';
import { toArticle } from '../pipeline/normalizer.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

export interface DailyJobDeps {
  http: HttpClient;
  repository: ArticleRepository;
  summarizer: Summarizer;
  strategies?: readonly ExtractionStrategy[];
  logger?: Logger;
}

type CandidateOutcome =
  | { status: 'stored'; inserted: boolean; summarized: boolean }
  | { status: 'skipped' }
  | { status: 'failed' };

function emptySummary(): RunSummary {
  return {
    sources: 0,
    candidates: 0,
    stored: 0,
    inserted: 0,
    skipped: 0,
    failed: 0,
    unsummarized: 0,
    durationMs: 0,
  };
}

/**
 * One pass over the source registry:
 * fetch candidates → extract → summarize → upsert, sequentially.
 *
 * A failing source or article is logged and skipped; only a failure to read
 * the registry itself rejects the run.
 */
export class DailyJob {
  private state: JobState = 'idle';
  private running = false;
  private readonly log: Logger;
  private readonly strategies: readonly ExtractionStrategy[];

  constructor(
    private readonly config: PipelineConfig,
    private readonly deps: DailyJobDeps,
  ) {
    this.log = deps.logger ?? rootLogger.child({ component: 'daily-job' });
    this.strategies = deps.strategies ?? DEFAULT_STRATEGIES;
  }

  getState(): JobState {
    return this.state;
  }

  isRunning(): boolean {
    return this.running;
  }

  /** Resolves with null when a run is already in progress. */
  async run(): Promise<RunSummary | null> {
    if (this.running) {
      this.log.info('Daily job already running, skipping this execution');
      return null;
    }

    this.running = true;
    const startTime = Date.now();
    const summary = emptySummary();

    try {
      this.transition('fetching-sources');
      const sources = resolveSources(await this.deps.repository.getActiveSources());
      summary.sources = sources.length;

      if (sources.length === 0) {
        this.log.warn('No active sources found; seed the sources table first');
      }

      for (const source of sources) {
        if (this.reachedRunCap(summary)) {
          this.log.info(
            { maxArticlesPerRun: this.config.maxArticlesPerRun },
            'Reached per-run article cap',
          );
          break;
        }
        await this.runSource(source, summary);
      }

      summary.durationMs = Date.now() - startTime;
      this.log.info(summary, 'Daily job finished');
      return summary;
    } finally {
      this.running = false;
      this.transition('idle');
    }
  }

  private reachedRunCap(summary: RunSummary): boolean {
    return summary.stored >= this.config.maxArticlesPerRun;
  }

  private async runSource(source: Source, summary: RunSummary): Promise<void> {
    const log = this.log.child({ source: source.name });
    this.transition('fetching');

    let taken = 0;
    for await (const candidate of fetchCandidates(source, this.deps.http, log)) {
      if (taken >= this.config.maxArticlesPerSource) break;
      if (this.reachedRunCap(summary)) break;
      taken++;
      summary.candidates++;

      let outcome: CandidateOutcome;
      try {
        outcome = await this.processCandidate(source, candidate, log);
      } catch (err) {
        log.error({ err, url: candidate.articleUrl }, 'Unexpected failure processing article');
        outcome = { status: 'failed' };
      }

      switch (outcome.status) {
        case 'stored':
          summary.stored++;
          if (outcome.inserted) summary.inserted++;
          if (!outcome.summarized) summary.unsummarized++;
          break;
        case 'skipped':
          summary.skipped++;
          break;
        case 'failed':
          summary.failed++;
          break;
      }

      this.transition('fetching');
    }
  }

  private async processCandidate(
    source: Source,
    candidate: ArticleCandidate,
    sourceLog: Logger,
  ): Promise<CandidateOutcome> {
    const url = candidate.articleUrl;
    const log = sourceLog.child({ url });

    if (this.config.skipExistingUrls && (await this.isKnown(url, log))) {
      log.debug('Skipping already stored URL');
      return { status: 'skipped' };
    }

    this.transition('extracting');
    let content: ExtractedContent;
    try {
      content = await extractArticle(url, this.deps.http, this.strategies);
    } catch (err) {
      log.warn({ err }, 'Article extraction failed');
      return { status: 'failed' };
    }

    this.transition('summarizing');
    let summaryText: string | null = null;
    try {
      summaryText = await this.deps.summarizer.summarize(candidate.title, content.fullText);
    } catch (err) {
      if (this.config.summaryFailurePolicy === 'skip') {
        log.warn({ err }, 'Summarization failed, skipping article');
        return { status: 'skipped' };
      }
      log.warn({ err }, 'Summarization failed, storing article without summary');
    }

    this.transition('persisting');
    try {
      const result = await this.deps.repository.upsertArticle(
        toArticle(source, candidate, content, summaryText),
      );
      log.info(
        { inserted: result.inserted, strategy: content.strategy, title: candidate.title.slice(0, 60) },
        'Article stored',
      );
      return { status: 'stored', inserted: result.inserted, summarized: summaryText !== null };
    } catch (err) {
      log.error({ err }, 'Article upsert failed');
      return { status: 'failed' };
    }
  }

  private async isKnown(url: string, log: Logger): Promise<boolean> {
    try {
      return await this.deps.repository.hasArticle(url);
    } catch (err) {
      log.warn({ err }, 'Existing-URL check failed, processing article anyway');
      return false;
    }
  }

  private transition(next: JobState): void {
    if (next === this.state) return;
    this.log.trace({ from: this.state, to: next }, 'Job state');
    this.state = next;
  }
}
