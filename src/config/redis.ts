import Redis from 'ioredis';
import { config } from 'dotenv';
import { logger } from './logger';

config();

/**
 * Connection for the shared rate-limit buckets. Commands fail after
 * REDIS_COMMAND_TIMEOUT_MS instead of queueing while Redis is unreachable.
 */
export const createRedisConnection = (): Redis => {
  const connection = new Redis({
    host: process.env.REDIS_HOST || 'localhost',
    port: parseInt(process.env.REDIS_PORT || '6379'),
    password: process.env.REDIS_PASSWORD || undefined,
    commandTimeout: parseInt(process.env.REDIS_COMMAND_TIMEOUT_MS || '2000'),
    maxRetriesPerRequest: 1,
    retryStrategy: (times: number) => {
      const delay = Math.min(times * 50, 2000);
      return delay;
    },
  });

  connection.on('connect', () => {
    logger.info('Redis connection established');
  });

  connection.on('error', error => {
    logger.error({ error: error.message }, 'Redis connection error');
  });

  return connection;
};

export const closeRedis = async (connection: Redis): Promise<void> => {
  await connection.quit();
  logger.info('Redis connection closed');
};
