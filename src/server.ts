// Load environment variables before any configuration is read
import 'dotenv/config';

import { createApp } from './api/app';
import { createDependencies } from './container';
import { logger } from './utils/logger';
import { errorMessage } from './utils/error';
import configManager from './config/app';
import database from './config/database';
import redis from './config/redis';

const appConfig = configManager.getAppConfig();
const PORT = appConfig.port;
const NODE_ENV = appConfig.nodeEnv;

async function startServer(): Promise<void> {
  logger.info('Starting Contacts API server', {
    port: PORT,
    environment: NODE_ENV,
    nodeVersion: process.version,
  });

  await database.connect();
  logger.info('Database connection established');

  await redis.connect();
  logger.info('Redis connection established');

  const app = createApp(createDependencies());

  const server = app.listen(PORT, () => {
    logger.info('API server started successfully', {
      port: PORT,
      environment: NODE_ENV,
      processId: process.pid,
    });
  });

  const closeConnections = async (): Promise<void> => {
    await database.close();
    logger.info('Database connections closed');

    await redis.close();
    logger.info('Redis connections closed');
  };

  const gracefulShutdown = (signal: string) => {
    logger.info(`Received ${signal}, starting graceful shutdown`);

    server.close(() => {
      logger.info('HTTP server closed');

      closeConnections()
        .then(() => {
          logger.info('API server graceful shutdown completed');
          process.exit(0);
        })
        .catch(error => {
          logger.error('Error during API server shutdown', { error: errorMessage(error) });
          process.exit(1);
        });
    });

    // Force shutdown after 30 seconds
    setTimeout(() => {
      logger.error('Forced API server shutdown due to timeout');
      process.exit(1);
    }, 30000).unref();
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));

  process.on('uncaughtException', error => {
    logger.error('Uncaught exception in API server', {
      error: error.message,
      stack: error.stack,
    });
    process.exit(1);
  });

  process.on('unhandledRejection', reason => {
    logger.error('Unhandled promise rejection in API server', {
      reason: errorMessage(reason),
    });
    process.exit(1);
  });
}

startServer().catch(error => {
  logger.error('Failed to start API server', { error: errorMessage(error) });
  process.exit(1);
});
