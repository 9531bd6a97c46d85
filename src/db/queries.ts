import type { Sql } from './pool.js';
import type { Article, StoredArticle } from '../types/article.js';
import type { SourceRow } from '../types/source.js';
import {
  categoriesForTab,
  type ArticleQuery,
  type ArticleRepository,
  type UpsertResult,
} from './repository.js';
import { PersistenceError, errorMessage } from '../errors.js';
import { logger } from '../utils/logger.js';

interface ArticleRow {
  id: number;
  article_url: string;
  title: string;
  full_content: string;
  summary: string | null;
  image_url: string | null;
  source_id: number | null;
  source_name: string;
  category: string;
  content_hash: string;
  published_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

function toStoredArticle(row: ArticleRow): StoredArticle {
  return {
    id: row.id,
    articleUrl: row.article_url,
    title: row.title,
    fullContent: row.full_content,
    summary: row.summary,
    imageUrl: row.image_url,
    sourceId: row.source_id,
    sourceName: row.source_name,
    category: row.category,
    contentHash: row.content_hash,
    publishedAt: row.published_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class PostgresArticleRepository implements ArticleRepository {
  constructor(private readonly sql: Sql) {}

  async getActiveSources(): Promise<SourceRow[]> {
    return this.sql<SourceRow[]>`
      SELECT id, name, feed_url, base_url, COALESCE(category, 'General') AS category, is_active
      FROM sources
      WHERE is_active = TRUE
      ORDER BY name
    `;
  }

  async hasArticle(articleUrl: string): Promise<boolean> {
    const [row] = await this.sql<{ id: number }[]>`
      SELECT id FROM articles WHERE article_url = ${articleUrl} LIMIT 1
    `;
    return row !== undefined;
  }

  async upsertArticle(article: Article): Promise<UpsertResult> {
    try {
      const [row] = await this.sql<{ id: number; inserted: boolean }[]>`
        INSERT INTO articles (
          article_url, title, full_content, summary, image_url,
          source_id, source_name, category, content_hash, published_at
        )
        VALUES (
          ${article.articleUrl}, ${article.title}, ${article.fullContent},
          ${article.summary}, ${article.imageUrl}, ${article.sourceId},
          ${article.sourceName}, ${article.category}, ${article.contentHash},
          ${article.publishedAt}
        )
        ON CONFLICT (article_url) DO UPDATE SET
          title = EXCLUDED.title,
          full_content = EXCLUDED.full_content,
          summary = EXCLUDED.summary,
          image_url = EXCLUDED.image_url,
          source_id = EXCLUDED.source_id,
          source_name = EXCLUDED.source_name,
          category = EXCLUDED.category,
          content_hash = EXCLUDED.content_hash,
          published_at = EXCLUDED.published_at,
          updated_at = NOW()
        RETURNING id, (xmax = 0) AS inserted
      `;
      if (!row) throw new Error('Upsert returned no row');
      return { id: row.id, inserted: row.inserted };
    } catch (err) {
      throw new PersistenceError(article.articleUrl, `Article upsert failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  async getCategories(): Promise<string[]> {
    const rows = await this.sql<{ category: string }[]>`
      SELECT DISTINCT COALESCE(category, 'General') AS category
      FROM sources
      WHERE is_active = TRUE
      ORDER BY category
    `;
    return rows.map((r) => r.category);
  }

  async getArticles(query: ArticleQuery): Promise<StoredArticle[]> {
    const categories = categoriesForTab(query.category);
    const rows = await this.sql<ArticleRow[]>`
      SELECT
        id, article_url, title, full_content, summary, image_url,
        source_id, source_name, category, content_hash,
        published_at, created_at, updated_at
      FROM articles
      ${categories ? this.sql`WHERE category IN ${this.sql(categories)}` : this.sql``}
      ORDER BY published_at DESC NULLS LAST, created_at DESC
      LIMIT ${query.limit}
    `;
    return rows.map(toStoredArticle);
  }

  async ping(): Promise<boolean> {
    const check = await this.sql`SELECT 1 AS ok`.catch((err: unknown) => {
      logger.warn({ err }, 'Database ping failed');
      return null;
    });
    return check !== null;
  }
}
