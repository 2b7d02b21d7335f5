import 'reflect-metadata';
import 'tsconfig-paths/register';
import type Redis from 'ioredis';
import { settings } from './config/constants';
import { initializeDatabase, closeDatabase, AppDataSource } from './config/database';
import { createRedisConnection, closeRedis } from './config/redis';
import { logCriticalOperation, logger } from './config/logger';
import { createContainer } from './container';
import { EventName } from './infra/events/event.types';
import { CronJobs } from './infra/scheduling/cron-jobs';

async function startWorker() {
  let redis: Redis | undefined;

  try {
    await initializeDatabase();
    logger.info('Database initialized for worker');

    if (settings.RATE_LIMIT_STORE === 'redis') {
      redis = createRedisConnection();
    }

    const container = createContainer(settings, { dataSource: AppDataSource, redis });

    // Terminal failures are surfaced to monitoring through the log pipeline
    container.eventBus.on(EventName.DELIVERY_FAILED, event => {
      logger.error(
        {
          trace_id: event.traceId,
          subscriberId: event.data.subscriberId,
          deliveryId: event.data.failure.deliveryId,
          attempts: event.data.failure.attempts,
          lastError: event.data.failure.lastError,
          type: 'terminal_failure',
        },
        'Delivery failed permanently'
      );
    });

    container.eventBus.on(EventName.DELIVERY_CANCELLED, event => {
      logCriticalOperation(event.traceId ?? 'unknown', 'delivery_cancelled_event', event.data);
    });

    const jobs = new CronJobs(container.scheduler, container.worker, {
      scheduleCron: settings.SCHEDULE_CRON,
      tickCron: settings.DELIVERY_TICK_CRON,
    });
    jobs.start();

    // Catch up on startup instead of waiting for the first hourly trigger
    await jobs.scheduleJob.run();

    // Graceful shutdown
    const gracefulShutdown = async (signal: string) => {
      logger.info({ signal }, 'Shutdown signal received. Starting graceful shutdown...');

      try {
        await jobs.stop();

        container.generationService.shutdown();
        container.smsGateway.shutdown();
        container.eventBus.removeAllListeners();

        await closeDatabase();
        if (redis) {
          await closeRedis(redis);
        }

        logger.info('All connections closed. Exiting...');
        process.exit(0);
      } catch (error) {
        logger.error({ error }, 'Error during graceful shutdown');
        process.exit(1);
      }
    };

    process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
    process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

    logger.info({ workerId: container.worker.workerId }, 'Worker and scheduler ready');
  } catch (error) {
    logger.error({ error }, 'Failed to start worker');
    process.exit(1);
  }
}

void startWorker();
