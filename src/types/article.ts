/** Produced by a fetcher; lives for a single run. */
export interface ArticleCandidate {
  title: string;
  articleUrl: string;
  imageUrl: string | null;
  /** Source name */
  source: string;
  publishedAt: Date | null;
}

export interface ExtractedContent {
  fullText: string;
  imageUrl: string | null;
  publishedAt: Date | null;
  /** Name of the extraction strategy that produced the text */
  strategy: string;
}

export interface Article {
  articleUrl: string;
  title: string;
  fullContent: string;
  summary: string | null;
  imageUrl: string | null;
  sourceId: number | null;
  sourceName: string;
  category: string;
  contentHash: string;
  publishedAt: Date | null;
}

export interface StoredArticle extends Article {
  id: number;
  createdAt: Date;
  updatedAt: Date;
}
