import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { ERROR_CODES, userIdSchema } from '@tokenboard/shared';

/**
 * Caller identity decorator.
 * The upstream gateway authenticates the caller and forwards the user id in a
 * trusted header; this only reads it and sets request.userId.
 */
export async function registerAuthMiddleware(app: FastifyInstance, userIdHeader: string) {
  app.decorateRequest('userId', '');

  app.decorate('authenticate', async function (
    request: FastifyRequest,
    reply: FastifyReply
  ) {
    const raw = request.headers[userIdHeader];
    const parsed = userIdSchema.safeParse(Array.isArray(raw) ? raw[0] : raw);

    if (!parsed.success) {
      request.log.warn({ url: request.url, header: userIdHeader }, 'Missing or invalid caller identity');
      return reply.status(401).send({
        success: false,
        error: {
          code: ERROR_CODES.UNAUTHORIZED,
          message: 'Missing or invalid caller identity',
        },
      });
    }

    request.userId = parsed.data;
  });
}

// Augment Fastify types
declare module 'fastify' {
  interface FastifyInstance {
    authenticate: (request: FastifyRequest, reply: FastifyReply) => Promise<void>;
  }
  interface FastifyRequest {
    userId: string;
  }
}
