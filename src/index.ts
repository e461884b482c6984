import { createApplication } from './app';
import { loadConfig } from './config';
import { db } from './database/connection';
import { initSchema } from './database/schema';
import { errorMessage } from './utils/errors';
import { createLogger } from './utils/logger';

const logger = createLogger('Main');

const SHUTDOWN_TIMEOUT_MS = 10000;

const main = async (): Promise<void> => {
  const config = loadConfig();

  await db.connect();
  await initSchema(db);

  const app = createApplication(config);
  await app.start();

  logger.info(`Environment: ${config.nodeEnv}`);

  // Graceful shutdown
  let shuttingDown = false;
  const gracefulShutdown = (signal: string): void => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info(`Received ${signal}. Starting graceful shutdown...`);

    // Force shutdown after the timeout
    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS).unref();

    app
      .stop()
      .then(() => db.disconnect())
      .then(() => {
        logger.info('Shutdown complete');
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error('Shutdown failed', { error: errorMessage(error) });
        process.exit(1);
      });
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));
};

// Handle uncaught exceptions
process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught Exception', { error: error.message, stack: error.stack });
  process.exit(1);
});

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled Rejection', { reason: errorMessage(reason) });
  process.exit(1);
});

main().catch((error: unknown) => {
  logger.error('Startup failed', { error: errorMessage(error) });
  process.exit(1);
});
