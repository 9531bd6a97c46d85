import type { Article, StoredArticle } from '../types/article.js';
import type { SourceRow } from '../types/source.js';

export interface UpsertResult {
  id: number;
  /** False when an existing row with the same URL was overwritten */
  inserted: boolean;
}

export interface ArticleQuery {
  /** Dashboard tab; omitted or "All" means every category */
  category?: string;
  limit: number;
}

/**
 * Storage seen by the job runner and the API. Articles are keyed by
 * `articleUrl`: upserting a known URL overwrites the stored row.
 */
export interface ArticleRepository {
  getActiveSources(): Promise<SourceRow[]>;
  hasArticle(articleUrl: string): Promise<boolean>;
  /** Rejects with PersistenceError */
  upsertArticle(article: Article): Promise<UpsertResult>;
  getCategories(): Promise<string[]>;
  getArticles(query: ArticleQuery): Promise<StoredArticle[]>;
  ping(): Promise<boolean>;
}

/** The "News" tab also lists general and world news. */
const TAB_CATEGORIES: Record<string, string[]> = {
  news: ['News', 'General', 'World'],
};

/** Categories an article must have to appear under `tab`; null means no filter. */
export function categoriesForTab(tab: string | undefined): string[] | null {
  const trimmed = tab?.trim();
  if (!trimmed || trimmed.toLowerCase() === 'all') return null;
  return TAB_CATEGORIES[trimmed.toLowerCase()] ?? [trimmed];
}
