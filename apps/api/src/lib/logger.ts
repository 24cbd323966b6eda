import pino from 'pino';
import type { LoggerOptions } from 'pino';
import type { FastifyLoggerOptions } from 'fastify';

export function createLoggerConfig(
  level: string = process.env.LOG_LEVEL || 'info',
  pretty: boolean = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test'
): FastifyLoggerOptions & LoggerOptions {
  return {
    level,
    transport: pretty
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
  };
}

// Standalone logger instance for non-Fastify use (e.g., the ledger core, scripts)
export const logger = pino(createLoggerConfig());
