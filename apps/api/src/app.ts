import Fastify from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import type { Redis } from 'ioredis';
import { ZodError } from 'zod';

import { ERROR_CODES, RATE_LIMITS } from '@tokenboard/shared';
import { loadConfig, type AppConfig } from './lib/config.js';
import { createLoggerConfig } from './lib/logger.js';
import { openDatabase } from './lib/db.js';
import { createRedis } from './lib/redis.js';
import { LedgerError, type LedgerErrorCode } from './ledger/errors.js';
import { LedgerService } from './ledger/ledgerService.js';
import { registerAuthMiddleware } from './middleware/auth.js';

// Routes
import { healthRoutes } from './routes/health.js';
import { accountRoutes } from './routes/accounts.js';
import { transferRoutes } from './routes/transfers.js';
import { rankingRoutes } from './routes/rankings.js';
import { activityRoutes } from './routes/activities.js';

const LEDGER_ERROR_STATUS: Record<LedgerErrorCode, number> = {
  [ERROR_CODES.UNKNOWN_ACCOUNT]: 404,
  [ERROR_CODES.INVALID_AMOUNT]: 400,
  [ERROR_CODES.SELF_TRANSFER]: 400,
  [ERROR_CODES.TRANSFER_NOT_FOUND]: 404,
  [ERROR_CODES.NO_PENDING_TRANSFERS]: 409,
  [ERROR_CODES.CONCURRENCY_CONFLICT]: 409,
};

export interface BuildAppOptions {
  config?: AppConfig;
  /** Use an existing ledger (tests); otherwise one is opened from config */
  ledger?: LedgerService;
  /** Pass null to force the in-memory rate limiter */
  redis?: Redis | null;
  logger?: boolean;
  /** Requests per minute per client; defaults to RATE_LIMITS.API_REQUESTS_PER_MINUTE */
  rateLimitMax?: number;
}

function statusCodeOf(error: Error): number | undefined {
  return 'statusCode' in error && typeof error.statusCode === 'number' ? error.statusCode : undefined;
}

export async function buildApp(options: BuildAppOptions = {}) {
  const config = options.config ?? loadConfig();

  const app = Fastify({
    logger: options.logger === false ? false : createLoggerConfig(config.logLevel, !config.isProduction),
  });

  const ownsLedger = !options.ledger;
  const ledger =
    options.ledger ??
    new LedgerService({
      db: openDatabase(config.databasePath, { busyTimeoutMs: config.busyTimeoutMs }),
      timeZone: config.timeZone,
    });
  const redis = options.redis === undefined ? createRedis(config.redisUrl) : options.redis;

  // -------------------- Plugins --------------------

  // CORS
  await app.register(cors, {
    origin: config.corsOrigin ? config.corsOrigin.split(',').map((o) => o.trim()) : true,
    credentials: true,
  });

  // Security headers
  await app.register(helmet, {
    contentSecurityPolicy: false,
  });

  // Rate limiting
  await app.register(rateLimit, {
    max: options.rateLimitMax ?? RATE_LIMITS.API_REQUESTS_PER_MINUTE,
    timeWindow: '1 minute',
    ...(redis && { redis }),
  });

  // -------------------- Decorators --------------------

  app.decorate('ledger', ledger);
  app.decorate('redis', redis);

  // Caller identity from the gateway header
  await registerAuthMiddleware(app, config.userIdHeader);

  // -------------------- Hooks --------------------

  // Request logging
  app.addHook('onRequest', async (request) => {
    request.log.info({ url: request.url, method: request.method }, 'incoming request');
  });

  // Error handler
  app.setErrorHandler((error: Error, request, reply) => {
    if (error instanceof LedgerError) {
      request.log.warn({ code: error.code, details: error.details }, error.message);
      return reply.status(LEDGER_ERROR_STATUS[error.code]).send({
        success: false,
        error: {
          code: error.code,
          message: error.message,
          ...(error.details && { details: error.details }),
        },
      });
    }

    // Zod validation errors
    if (error instanceof ZodError) {
      request.log.info({ issues: error.issues }, 'request validation failed');
      return reply.status(400).send({
        success: false,
        error: {
          code: ERROR_CODES.VALIDATION_ERROR,
          message: 'Invalid request data',
          details: error.flatten(),
        },
      });
    }

    const statusCode = statusCodeOf(error) ?? 500;

    if (statusCode === 429) {
      return reply.status(429).send({
        success: false,
        error: {
          code: ERROR_CODES.RATE_LIMIT_EXCEEDED,
          message: error.message,
        },
      });
    }

    if (statusCode < 500) {
      request.log.info({ err: error }, 'bad request');
      return reply.status(statusCode).send({
        success: false,
        error: {
          code: ERROR_CODES.VALIDATION_ERROR,
          message: error.message,
        },
      });
    }

    request.log.error(error);
    return reply.status(statusCode).send({
      success: false,
      error: {
        code: ERROR_CODES.INTERNAL_ERROR,
        message: config.isProduction ? 'An unexpected error occurred' : error.message || 'Unknown error',
      },
    });
  });

  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      success: false,
      error: {
        code: ERROR_CODES.NOT_FOUND,
        message: `Route ${request.method} ${request.url} not found`,
      },
    });
  });

  // -------------------- Routes --------------------

  await app.register(healthRoutes, { prefix: '/health' });
  await app.register(accountRoutes, { prefix: '/accounts' });
  await app.register(transferRoutes, { prefix: '/transfers' });
  await app.register(rankingRoutes, { prefix: '/rankings' });
  await app.register(activityRoutes, { prefix: '/activities' });

  // Root route
  app.get('/', async () => {
    return {
      name: 'Tokenboard API',
      version: '0.1.0',
    };
  });

  // -------------------- Lifecycle --------------------

  app.addHook('onClose', async () => {
    if (ownsLedger) ledger.close();
    redis?.disconnect();
  });

  return app;
}

// Type augmentation for Fastify
declare module 'fastify' {
  interface FastifyInstance {
    ledger: LedgerService;
    redis: Redis | null;
  }
}
