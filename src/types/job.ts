export type JobState =
  | 'idle'
  | 'fetching-sources'
  | 'fetching'
  | 'extracting'
  | 'summarizing'
  | 'persisting';

export interface RunSummary {
  sources: number;
  candidates: number;
  /** Upserted rows, new or refreshed */
  stored: number;
  /** Of `stored`, rows that did not exist before */
  inserted: number;
  /** Already-seen URLs and candidates dropped by the summary failure policy */
  skipped: number;
  failed: number;
  /** Stored without a summary */
  unsummarized: number;
  durationMs: number;
}
