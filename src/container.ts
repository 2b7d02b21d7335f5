import type Redis from 'ioredis';
import { DataSource } from 'typeorm';
import { Settings } from '@/config/constants';
import { logger } from '@/config/logger';
import { DeliveryRepository } from '@/domains/delivery/delivery.repository';
import { DeliveryService } from '@/domains/delivery/delivery.service';
import { MessageHistoryRepository } from '@/domains/message-history/message-history.repository';
import { SubscriberRepository } from '@/domains/subscriber/subscriber.repository';
import { DeliveryWorker, workerOptionsFromSettings } from '@/infra/delivery/delivery-worker';
import { EventBus } from '@/infra/events/event-bus';
import { GenerationService } from '@/infra/generation/generation.service';
import { LocalBucketStore } from '@/infra/rate-limiting/local-bucket-store';
import { BucketStore } from '@/infra/rate-limiting/rate-limit.types';
import { RateLimiter, bucketConfigFromSettings } from '@/infra/rate-limiting/rate-limiter';
import { RedisBucketStore } from '@/infra/rate-limiting/redis-bucket-store';
import { DailyScheduler } from '@/infra/scheduling/scheduler.service';
import { SmsGatewayService } from '@/infra/sms/sms-gateway.service';

export interface ContainerResources {
  dataSource: DataSource;
  /**
   * Required when RATE_LIMIT_STORE is redis
   */
  redis?: Redis;
}

export interface Container {
  settings: Settings;
  eventBus: EventBus;
  rateLimiter: RateLimiter;
  deliveryRepository: DeliveryRepository;
  subscriberRepository: SubscriberRepository;
  historyRepository: MessageHistoryRepository;
  generationService: GenerationService;
  smsGateway: SmsGatewayService;
  scheduler: DailyScheduler;
  worker: DeliveryWorker;
  deliveryService: DeliveryService;
}

const createBucketStore = (settings: Settings, redis: Redis | undefined): BucketStore => {
  if (settings.RATE_LIMIT_STORE === 'memory') {
    logger.warn(
      { store: 'memory' },
      'Rate limits are per process: with N processes the aggregate rate can reach N times the configured limit'
    );
    return new LocalBucketStore();
  }

  if (!redis) {
    throw new Error('RATE_LIMIT_STORE=redis requires a Redis connection');
  }
  return new RedisBucketStore(redis);
};

/**
 * Build the object graph once per process
 */
export const createContainer = (settings: Settings, resources: ContainerResources): Container => {
  const { dataSource } = resources;

  const worstCaseAttemptMs = settings.GENERATION_TIMEOUT_MS + settings.SEND_TIMEOUT_MS + 4 * settings.STORE_TIMEOUT_MS;
  if (settings.CLAIM_TIMEOUT_MS <= worstCaseAttemptMs) {
    logger.warn(
      { claimTimeoutMs: settings.CLAIM_TIMEOUT_MS, worstCaseAttemptMs },
      'CLAIM_TIMEOUT_MS does not exceed the longest attempt; live claims may be recovered as stale'
    );
  }

  const eventBus = new EventBus();
  const rateLimiter = new RateLimiter(createBucketStore(settings, resources.redis), bucketConfigFromSettings(settings), {
    timeoutMs: settings.STORE_TIMEOUT_MS,
  });

  const deliveryRepository = new DeliveryRepository(dataSource);
  const subscriberRepository = new SubscriberRepository(dataSource, {
    startHour: settings.DELIVERY_WINDOW_START_HOUR,
    endHour: settings.DELIVERY_WINDOW_END_HOUR,
  });
  const historyRepository = new MessageHistoryRepository(dataSource, settings.HISTORY_RETENTION_DAYS);

  const generationService = new GenerationService({
    url: settings.GENERATION_API_URL,
    apiKey: settings.GENERATION_API_KEY,
    timeoutMs: settings.GENERATION_TIMEOUT_MS,
  });
  const smsGateway = new SmsGatewayService({
    url: settings.SMS_GATEWAY_URL,
    token: settings.SMS_GATEWAY_TOKEN,
    timeoutMs: settings.SEND_TIMEOUT_MS,
  });

  const scheduler = new DailyScheduler(deliveryRepository, subscriberRepository, {
    storeTimeoutMs: settings.STORE_TIMEOUT_MS,
  });

  const worker = new DeliveryWorker(
    {
      store: deliveryRepository,
      directory: subscriberRepository,
      generator: generationService,
      sender: smsGateway,
      history: historyRepository,
      rateLimiter,
      eventBus,
    },
    workerOptionsFromSettings(settings)
  );

  const deliveryService = new DeliveryService(deliveryRepository, eventBus);

  logger.info({ rateLimitStore: rateLimiter.mode, workerId: worker.workerId }, 'Container initialized');

  return {
    settings,
    eventBus,
    rateLimiter,
    deliveryRepository,
    subscriberRepository,
    historyRepository,
    generationService,
    smsGateway,
    scheduler,
    worker,
    deliveryService,
  };
};
