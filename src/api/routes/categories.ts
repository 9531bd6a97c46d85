import type { FastifyPluginAsync } from 'fastify';
import type { ArticleRepository } from '../../db/repository.js';

export const categoriesRoutes: FastifyPluginAsync<{ repository: ArticleRepository }> = async (
  app,
  { repository },
) => {
  app.get('/', async () => {
    const data = await repository.getCategories();
    return { data };
  });
};
