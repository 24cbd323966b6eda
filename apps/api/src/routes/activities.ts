import { FastifyPluginAsync } from 'fastify';
import { activityQuerySchema } from '@tokenboard/shared';

export const activityRoutes: FastifyPluginAsync = async (app) => {
  /**
   * GET /activities
   * Recent activity, newest first; optionally for one user
   */
  app.get<{
    Querystring: { limit?: string; userId?: string };
  }>('/', async (request) => {
    const { limit, userId } = activityQuerySchema.parse(request.query);
    const items = await app.ledger.recentActivity({ limit, userId });

    return {
      success: true,
      data: { items },
    };
  });
};
