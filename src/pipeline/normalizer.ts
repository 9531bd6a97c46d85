import type { Article, ArticleCandidate, ExtractedContent } from '../types/article.js';
import type { Source } from '../types/source.js';
import { computeContentHash } from './dedup.js';

/**
 * Merges what the listing or feed said about an article with what its page
 * said. Page image first, listing date first.
 */
export function toArticle(
  source: Source,
  candidate: ArticleCandidate,
  content: ExtractedContent,
  summary: string | null,
): Article {
  return {
    articleUrl: candidate.articleUrl,
    title: candidate.title,
    fullContent: content.fullText,
    summary,
    imageUrl: content.imageUrl ?? candidate.imageUrl,
    sourceId: source.id,
    sourceName: source.name,
    category: source.category,
    contentHash: computeContentHash(content.fullText, candidate.articleUrl),
    publishedAt: candidate.publishedAt ?? content.publishedAt,
  };
}
