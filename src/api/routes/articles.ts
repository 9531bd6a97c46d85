import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { ArticleRepository } from '../../db/repository.js';

const articlesQuery = z.object({
  category: z.string().trim().optional(),
  limit: z.coerce.number().int().min(1).max(200).default(50),
});

export const articlesRoutes: FastifyPluginAsync<{ repository: ArticleRepository }> = async (
  app,
  { repository },
) => {
  // GET /articles?category=Technology&limit=20 — newest first
  app.get('/', async (request, reply) => {
    const parsed = articlesQuery.safeParse(request.query);
    if (!parsed.success) {
      return reply.code(400).send({
        error: 'Invalid query',
        issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      });
    }

    const data = await repository.getArticles(parsed.data);
    return { data };
  });
};
