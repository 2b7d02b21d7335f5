import { logger } from '@/config/logger';
import {
  RESOURCE_GENERATION,
  RESOURCE_HTTP_STATUS,
  RESOURCE_SMS,
  RESOURCE_SMS_DAILY,
  Settings,
} from '@/config/constants';
import { RateLimitConfigError } from '@/shared/errors';
import { Clock, systemClock } from '@/shared/types';
import { withTimeout } from '@/shared/utils';
import { AcquireResult, BucketConfig, BucketStore, RateLimitStoreMode } from './rate-limit.types';

export interface RateLimiterOptions {
  clock?: Clock;
  /**
   * Upper bound on a single store round trip
   */
  timeoutMs?: number;
}

export const bucketConfigFromSettings = (settings: Settings): Record<string, BucketConfig> => ({
  [RESOURCE_GENERATION]: {
    capacity: settings.GENERATION_RATE_CAPACITY,
    refillPerSecond: settings.GENERATION_RATE_PER_SECOND,
  },
  [RESOURCE_SMS]: {
    capacity: settings.SMS_RATE_CAPACITY,
    refillPerSecond: settings.SMS_RATE_PER_SECOND,
  },
  [RESOURCE_SMS_DAILY]: {
    capacity: settings.SMS_DAILY_CAPACITY,
    refillPerSecond: settings.SMS_DAILY_PER_SECOND,
  },
  [RESOURCE_HTTP_STATUS]: {
    capacity: settings.HTTP_STATUS_RATE_CAPACITY,
    refillPerSecond: settings.HTTP_STATUS_RATE_PER_SECOND,
  },
});

/**
 * Token-bucket limiter for named resources.
 *
 * A resource such as `http:status:203.0.113.9` gets its own bucket and uses the
 * configuration of the longest configured prefix (`http:status`) when it has none of its own.
 */
export class RateLimiter {
  private readonly clock: Clock;
  private readonly timeoutMs: number | undefined;

  constructor(
    private readonly store: BucketStore,
    private readonly buckets: Readonly<Record<string, BucketConfig>>,
    options: RateLimiterOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.timeoutMs = options.timeoutMs;

    for (const [resource, config] of Object.entries(buckets)) {
      if (!Number.isFinite(config.capacity) || config.capacity <= 0) {
        throw new RateLimitConfigError(`Capacity for ${resource} must be positive`);
      }
      if (!Number.isFinite(config.refillPerSecond) || config.refillPerSecond < 0) {
        throw new RateLimitConfigError(`Refill rate for ${resource} must not be negative`);
      }
    }
  }

  get mode(): RateLimitStoreMode {
    return this.store.mode;
  }

  tryAcquire = async (resource: string, cost = 1): Promise<AcquireResult> => {
    const config = this.configFor(resource);

    if (!Number.isInteger(cost) || cost <= 0) {
      throw new RateLimitConfigError(`Cost must be a positive integer, got ${cost}`);
    }
    if (cost > config.capacity) {
      throw new RateLimitConfigError(
        `Cost ${cost} exceeds capacity ${config.capacity} of ${resource} and can never be granted`
      );
    }

    const take = this.store.take(resource, config, cost, this.clock().getTime());
    const result = this.timeoutMs === undefined ? await take : await withTimeout(take, this.timeoutMs, `rate limiter ${resource}`);

    if (!result.allowed) {
      logger.debug({ resource, cost, retryAfterMs: result.retryAfterMs }, 'Rate limit reached');
    }

    return result;
  };

  private configFor = (resource: string): BucketConfig => {
    const exact = this.buckets[resource];
    if (exact) {
      return exact;
    }

    let inherited: BucketConfig | undefined;
    let matched = '';
    for (const [base, config] of Object.entries(this.buckets)) {
      if (resource.startsWith(`${base}:`) && base.length > matched.length) {
        inherited = config;
        matched = base;
      }
    }
    if (inherited) {
      return inherited;
    }

    throw new RateLimitConfigError(`No rate limit configured for resource ${resource}`);
  };
}
