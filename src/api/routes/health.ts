import type { FastifyPluginAsync } from 'fastify';
import type { ArticleRepository } from '../../db/repository.js';

export const healthRoutes: FastifyPluginAsync<{ repository: ArticleRepository }> = async (
  app,
  { repository },
) => {
  app.get('/health', async () => {
    const dbUp = await repository.ping();
    return {
      status: dbUp ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      services: {
        database: dbUp ? 'up' : 'down',
      },
    };
  });
};
