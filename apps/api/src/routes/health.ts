import { FastifyPluginAsync } from 'fastify';
import { pingRedis } from '../lib/redis.js';

export const healthRoutes: FastifyPluginAsync = async (app) => {
  // Basic health check
  app.get('/', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
    };
  });

  // Detailed health check (for monitoring)
  app.get('/detailed', async (_request, reply) => {
    const checks: Record<string, { status: string; latency?: number; error?: string }> = {};

    // Check SQLite
    const dbStart = Date.now();
    try {
      app.ledger.ping();
      checks.database = { status: 'ok', latency: Date.now() - dbStart };
    } catch (err) {
      checks.database = { status: 'error', error: err instanceof Error ? err.message : String(err) };
    }

    // Check Redis (only when the rate limiter uses it)
    if (app.redis) {
      checks.redis = await pingRedis(app.redis);
    }

    const allOk = Object.values(checks).every((c) => c.status === 'ok');

    return reply.status(allOk ? 200 : 503).send({
      status: allOk ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      checks,
    });
  });
};
