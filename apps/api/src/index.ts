import 'dotenv/config';
import { buildApp } from './app.js';
import { ConfigError, loadConfig, type AppConfig } from './lib/config.js';
import { logger } from './lib/logger.js';

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.fatal({ issues: err.issues }, 'Env validation failed');
      process.exit(1);
    }
    throw err;
  }
}

async function main() {
  const config = readConfig();

  // Log environment configuration at startup (without exposing secrets)
  logger.info({
    nodeEnv: process.env.NODE_ENV,
    databasePath: config.databasePath,
    timeZone: config.timeZone,
    hasRedisUrl: !!config.redisUrl,
    userIdHeader: config.userIdHeader,
  }, 'Server startup configuration');

  const app = await buildApp({ config });

  // Graceful shutdown
  const signals = ['SIGINT', 'SIGTERM'] as const;
  signals.forEach((signal) => {
    process.once(signal, () => {
      logger.info(`Received ${signal}, shutting down gracefully...`);
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error({ err }, 'Error during shutdown');
          process.exit(1);
        }
      );
    });
  });

  try {
    await app.listen({ port: config.port, host: config.host });
    logger.info(`Tokenboard API running at http://${config.host}:${config.port}`);
  } catch (err) {
    logger.error({ err }, 'Failed to start server');
    await app.close();
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Startup failed');
  process.exit(1);
});
