import 'reflect-metadata';
import 'tsconfig-paths/register';
import type Redis from 'ioredis';
import { settings } from './config/constants';
import { initializeDatabase, closeDatabase, AppDataSource } from './config/database';
import { createRedisConnection, closeRedis } from './config/redis';
import { logger } from './config/logger';
import { createApp } from './app';
import { createContainer } from './container';
import { createRouter } from './router';

async function startServer() {
  let redis: Redis | undefined;

  try {
    await initializeDatabase();
    logger.info('Database initialized successfully');

    if (settings.RATE_LIMIT_STORE === 'redis') {
      redis = createRedisConnection();
    }

    const container = createContainer(settings, { dataSource: AppDataSource, redis });
    const app = createApp(createRouter(container, AppDataSource), settings.TRUST_PROXY);

    const server = app.listen(settings.PORT, () => {
      logger.info(`Server is running on port ${settings.PORT}`);
      logger.info(`Environment: ${settings.NODE_ENV}`);
    });

    // Graceful shutdown
    const gracefulShutdown = (signal: string) => {
      logger.info(`${signal} received. Starting graceful shutdown...`);

      // Stop accepting new connections
      server.close(() => {
        logger.info('HTTP server closed');

        const closeAll = async () => {
          container.generationService.shutdown();
          container.smsGateway.shutdown();
          await closeDatabase();
          if (redis) {
            await closeRedis(redis);
          }
        };

        closeAll()
          .then(() => {
            logger.info('All connections closed. Exiting...');
            process.exit(0);
          })
          .catch((error: unknown) => {
            logger.error({ error }, 'Error during graceful shutdown');
            process.exit(1);
          });
      });

      // Force shutdown after 30 seconds
      setTimeout(() => {
        logger.error('Forceful shutdown after timeout');
        process.exit(1);
      }, 30000).unref();
    };

    process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
    process.on('SIGINT', () => gracefulShutdown('SIGINT'));
  } catch (error) {
    logger.error({ error }, 'Failed to start server');
    process.exit(1);
  }
}

void startServer();
