import 'reflect-metadata';
import { DataSource } from 'typeorm';
import { config } from 'dotenv';
import { logger } from './logger';

config();

// Import entities AFTER reflect-metadata and dotenv config
import { ScheduledDelivery } from '@/domains/delivery/delivery.model';
import { MessageHistory } from '@/domains/message-history/message-history.model';
import { SubscriberEntity } from '@/domains/subscriber/subscriber.model';
import { CreateSubscribersTable1717000000000 } from '@/infra/migrations/1717000000000-CreateSubscribersTable';
import { CreateScheduledDeliveriesTable1717000100000 } from '@/infra/migrations/1717000100000-CreateScheduledDeliveriesTable';
import { CreateMessageHistoryTable1717000200000 } from '@/infra/migrations/1717000200000-CreateMessageHistoryTable';

export const AppDataSource = new DataSource({
  type: 'postgres',
  host: process.env.DATABASE_HOST || 'localhost',
  port: parseInt(process.env.DATABASE_PORT || '5432'),
  username: process.env.DATABASE_USER || 'postgres',
  password: process.env.DATABASE_PASSWORD || 'postgres',
  database: process.env.DATABASE_NAME || 'daily_dispatch',
  synchronize: false, // Always use migrations
  logging: process.env.NODE_ENV === 'development',
  entities: [SubscriberEntity, ScheduledDelivery, MessageHistory],
  migrations: [
    CreateSubscribersTable1717000000000,
    CreateScheduledDeliveriesTable1717000100000,
    CreateMessageHistoryTable1717000200000,
  ],
  subscribers: [],
  extra: {
    max: parseInt(process.env.DATABASE_POOL_MAX || '10'),
    min: parseInt(process.env.DATABASE_POOL_MIN || '2'),
  },
});

export const initializeDatabase = async (): Promise<void> => {
  try {
    await AppDataSource.initialize();

    const entities = AppDataSource.entityMetadatas.map(e => e.name);
    logger.info({ entities }, 'Database connection established successfully');
  } catch (error) {
    logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Error connecting to database');
    throw error;
  }
};

export const closeDatabase = async (): Promise<void> => {
  if (AppDataSource.isInitialized) {
    await AppDataSource.destroy();
    logger.info('Database connection closed');
  }
};
