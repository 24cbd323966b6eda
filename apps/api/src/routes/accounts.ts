import { FastifyPluginAsync } from 'fastify';
import { accountParamsSchema } from '@tokenboard/shared';

export const accountRoutes: FastifyPluginAsync = async (app) => {
  /**
   * GET /accounts/me
   * Current caller's counters (rolled over) and live pending total
   */
  app.get('/me', { preValidation: app.authenticate }, async (request) => {
    const account = await app.ledger.getAccount(request.userId);
    const pendingTotal = await app.ledger.pendingTotal(request.userId);

    return {
      success: true,
      data: { ...account, pendingTotal },
    };
  });

  /**
   * GET /accounts/me/pending
   * Transfers waiting for the caller to accept, oldest first
   */
  app.get('/me/pending', { preValidation: app.authenticate }, async (request) => {
    const items = await app.ledger.listPending(request.userId);

    return {
      success: true,
      data: {
        items,
        total: items.reduce((acc, t) => acc + t.amount, 0),
      },
    };
  });

  /**
   * GET /accounts/:userId
   * Public view of another account
   */
  app.get<{ Params: { userId: string } }>('/:userId', async (request) => {
    const { userId } = accountParamsSchema.parse(request.params);
    const account = await app.ledger.getAccount(userId);

    return {
      success: true,
      data: {
        userId: account.userId,
        name: account.name,
        product: account.product,
        allTimeReceived: account.allTimeReceived,
        allTimeGiven: account.allTimeGiven,
        weeklyReceived: account.weeklyReceived,
        monthlyReceived: account.monthlyReceived,
      },
    };
  });
};
