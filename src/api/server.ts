import Fastify from 'fastify';
import type { ArticleRepository } from '../db/repository.js';
import { healthRoutes } from './routes/health.js';
import { articlesRoutes } from './routes/articles.js';
import { categoriesRoutes } from './routes/categories.js';

export interface ServerOptions {
  repository: ArticleRepository;
  /** Request logging level; omit to disable */
  logLevel?: string;
}

/** Read-only JSON API over the stored articles, consumed by the dashboard. */
export async function createServer(options: ServerOptions) {
  const app = Fastify({
    logger: options.logLevel ? { level: options.logLevel } : false,
  });

  const { repository } = options;
  await app.register(healthRoutes, { repository });
  await app.register(articlesRoutes, { prefix: '/articles', repository });
  await app.register(categoriesRoutes, { prefix: '/categories', repository });

  return app;
}
