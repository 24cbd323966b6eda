import { FastifyPluginAsync } from 'fastify';
import {
  sendTransferSchema,
  transferParamsSchema,
  type SendTransferInput,
} from '@tokenboard/shared';

export const transferRoutes: FastifyPluginAsync = async (app) => {
  // All routes act on behalf of the caller
  app.addHook('preValidation', app.authenticate);

  /**
   * POST /transfers
   * Offer tokens to another user; they arrive once the recipient accepts
   */
  app.post<{ Body: SendTransferInput }>('/', async (request, reply) => {
    const { toUserId, amount, note } = sendTransferSchema.parse(request.body);

    const transfer = await app.ledger.send(request.userId, { toUserId, amount, note });

    request.log.info({ transferId: transfer.id, amount, to: toUserId }, 'Transfer offered');

    return reply.status(201).send({
      success: true,
      data: { transfer },
    });
  });

  /**
   * POST /transfers/accept-all
   * Accept every pending transfer addressed to the caller
   */
  app.post('/accept-all', async (request) => {
    const result = await app.ledger.acceptAll(request.userId);

    return {
      success: true,
      data: { amount: result.totalAmount, count: result.count },
    };
  });

  /**
   * POST /transfers/:id/accept
   * Accept one transfer; only the recipient can settle it
   */
  app.post<{ Params: { id: string } }>('/:id/accept', async (request) => {
    const { id } = transferParamsSchema.parse(request.params);

    const result = await app.ledger.acceptOne(id, { recipientId: request.userId });

    return {
      success: true,
      data: result,
    };
  });
};
