import { DateTime } from 'luxon';
import { z } from 'zod';
import { logger, logCriticalOperation, newTraceId } from '@/config/logger';
import { DeliveryStore } from '@/domains/delivery/delivery.types';
import { SchedulingError, TimezoneError } from '@/shared/errors';
import { Clock, Subscriber, SubscriberDirectory, systemClock } from '@/shared/types';
import { generateIdempotencyKey, withTimeout } from '@/shared/utils';
import { isValidDay, resolveDeliveryWindow } from './timezone-resolver';

export const DAILY_MESSAGE_TYPE = 'daily';

const subscriberSchema = z.object({
  id: z.string().min(1),
  phoneNumber: z.string(),
  timezone: z.string().min(1),
  windowStartHour: z.number(),
  windowEndHour: z.number(),
  active: z.boolean(),
});

const subscriberListSchema = z.array(subscriberSchema);

export interface ScheduleDaySummary {
  total: number;
  created: number;
  skippedExisting: number;
  skippedInactive: number;
  skippedWindowElapsed: number;
  skippedInvalid: { subscriberId: string; reason: string }[];
}

export interface DailySchedulerOptions {
  clock?: Clock;
  random?: () => number;
  storeTimeoutMs: number;
}

type SubscriberOutcome = 'created' | 'existing' | 'inactive' | 'elapsed';

export class DailyScheduler {
  private readonly clock: Clock;
  private readonly random: () => number;

  constructor(
    private readonly store: DeliveryStore,
    private readonly directory: SubscriberDirectory,
    private readonly options: DailySchedulerOptions
  ) {
    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? Math.random;
  }

  /**
   * Create one pending delivery per active subscriber for a local calendar day.
   * Safe to run repeatedly or concurrently: the idempotency key admits one record per subscriber and day.
   */
  scheduleDay = async (subscribers: unknown, day: string, trace_id = newTraceId('schedule')): Promise<ScheduleDaySummary> => {
    if (typeof day !== 'string' || !isValidDay(day)) {
      throw new SchedulingError(`Invalid day: ${String(day)}, expected yyyy-MM-dd`);
    }

    const parsed = subscriberListSchema.safeParse(subscribers);
    if (!parsed.success) {
      throw new SchedulingError(`Invalid subscriber list: ${parsed.error.issues[0]?.message ?? 'malformed'}`);
    }

    const seen = new Set<string>();
    for (const subscriber of parsed.data) {
      if (seen.has(subscriber.id)) {
        throw new SchedulingError(`Duplicate subscriber id: ${subscriber.id}`);
      }
      seen.add(subscriber.id);
    }

    logger.info({ trace_id, day, count: parsed.data.length }, 'Scheduling daily deliveries');

    const summary: ScheduleDaySummary = {
      total: parsed.data.length,
      created: 0,
      skippedExisting: 0,
      skippedInactive: 0,
      skippedWindowElapsed: 0,
      skippedInvalid: [],
    };

    for (const subscriber of parsed.data) {
      let outcome: SubscriberOutcome;
      try {
        outcome = await this.scheduleSubscriber(subscriber, day, trace_id);
      } catch (error) {
        if (error instanceof TimezoneError) {
          logger.warn(
            { trace_id, subscriberId: subscriber.id, timezone: subscriber.timezone, error: error.message },
            'Skipping subscriber with invalid timezone or window'
          );
          summary.skippedInvalid.push({ subscriberId: subscriber.id, reason: error.message });
          continue;
        }
        throw error;
      }

      switch (outcome) {
        case 'created':
          summary.created++;
          break;
        case 'existing':
          summary.skippedExisting++;
          break;
        case 'inactive':
          summary.skippedInactive++;
          break;
        case 'elapsed':
          summary.skippedWindowElapsed++;
          break;
      }
    }

    logger.info(
      { trace_id, day, ...summary, skippedInvalid: summary.skippedInvalid.length },
      'Daily scheduling completed'
    );

    return summary;
  };

  /**
   * Schedule every active subscriber from the directory
   */
  scheduleActive = async (day: string): Promise<ScheduleDaySummary> => {
    const trace_id = newTraceId('schedule');
    const subscribers = await withTimeout(
      this.directory.listActiveSubscribers(),
      this.options.storeTimeoutMs,
      'list active subscribers'
    );
    return await this.scheduleDay(subscribers, day, trace_id);
  };

  private scheduleSubscriber = async (
    subscriber: Subscriber,
    day: string,
    trace_id: string
  ): Promise<SubscriberOutcome> => {
    if (!subscriber.active) {
      return 'inactive';
    }

    const { windowStart, windowEnd } = resolveDeliveryWindow(
      subscriber.timezone,
      subscriber.windowStartHour,
      subscriber.windowEndHour,
      day
    );

    // Never schedule into the past: draw from what is left of the window
    const now = this.clock().getTime();
    if (now >= windowEnd.getTime()) {
      logger.debug({ trace_id, subscriberId: subscriber.id, day }, 'Delivery window already elapsed');
      return 'elapsed';
    }
    const from = Math.max(windowStart.getTime(), now);
    const span = windowEnd.getTime() - from;
    const scheduledAt = new Date(from + Math.min(Math.floor(this.random() * span), span - 1));

    const idempotencyKey = generateIdempotencyKey(subscriber.id, DAILY_MESSAGE_TYPE, day);
    const created = await withTimeout(
      this.store.insertIfAbsent({
        subscriberId: subscriber.id,
        deliveryDate: day,
        idempotencyKey,
        scheduledAt,
        windowEndsAt: windowEnd,
      }),
      this.options.storeTimeoutMs,
      'insert delivery'
    );

    if (!created) {
      return 'existing';
    }

    logCriticalOperation(trace_id, 'delivery_scheduled', {
      subscriberId: subscriber.id,
      timezone: subscriber.timezone,
      day,
      idempotencyKey,
      scheduledAt: DateTime.fromJSDate(scheduledAt).toUTC().toISO(),
    });

    return 'created';
  };
}
