import { Redis } from 'ioredis';
import { logger } from './logger.js';

/**
 * Redis backs the API rate limiter when REDIS_URL is configured, so several
 * API processes share one request budget. Without it the limiter keeps its
 * counters in memory.
 */
export function createRedis(url: string | undefined): Redis | null {
  if (!url) return null;

  const redis = new Redis(url, {
    maxRetriesPerRequest: 3,
    lazyConnect: true,
  });

  redis.on('connect', () => {
    logger.info('Redis connected');
  });

  redis.on('error', (err) => {
    logger.error({ err }, 'Redis error');
  });

  return redis;
}

/**
 * Round-trip latency in ms, or the error message if Redis is unreachable
 */
export async function pingRedis(redis: Redis): Promise<{ status: 'ok'; latency: number } | { status: 'error'; error: string }> {
  const start = Date.now();
  try {
    await redis.ping();
    return { status: 'ok', latency: Date.now() - start };
  } catch (err) {
    return { status: 'error', error: err instanceof Error ? err.message : String(err) };
  }
}
