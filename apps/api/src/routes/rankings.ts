import { FastifyPluginAsync } from 'fastify';
import { rankingParamsSchema } from '@tokenboard/shared';

export const rankingRoutes: FastifyPluginAsync = async (app) => {
  /**
   * GET /rankings/:period
   * Leaderboard by tokens received: total | daily | weekly | monthly
   */
  app.get<{ Params: { period: string } }>('/:period', async (request) => {
    const { period } = rankingParamsSchema.parse(request.params);
    const items = await app.ledger.rankings(period);

    return {
      success: true,
      data: { period, items },
    };
  });
};
