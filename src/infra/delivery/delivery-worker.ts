import { randomUUID } from 'crypto';
import { hostname } from 'os';
import { RESOURCE_GENERATION, RESOURCE_SMS, RESOURCE_SMS_DAILY, Settings } from '@/config/constants';
import { errorMessage, logCriticalOperation, logError, logger, newTraceId } from '@/config/logger';
import { DeliveryStatus, ScheduledDelivery } from '@/domains/delivery/delivery.model';
import { DeliveryStore } from '@/domains/delivery/delivery.types';
import { EventBus } from '@/infra/events/event-bus';
import { EventName } from '@/infra/events/event.types';
import { RateLimiter } from '@/infra/rate-limiting/rate-limiter';
import { SendError, TerminalFailure, ThrottledError } from '@/shared/errors';
import {
  Clock,
  GeneratedMessage,
  HistoryStore,
  MessageGenerator,
  MessageSender,
  SubscriberDirectory,
  systemClock,
} from '@/shared/types';
import { mapWithConcurrency, withTimeout } from '@/shared/utils';
import { BackoffOptions, computeBackoff } from './backoff';

export type DeliveryOutcome =
  | 'sent'
  | 'retried'
  | 'failed'
  | 'throttled'
  | 'cancelled'
  | 'lost'
  | 'skipped'
  | 'error';

export interface TickSummary {
  due: number;
  claimed: number;
  sent: number;
  retried: number;
  failed: number;
  throttled: number;
  cancelled: number;
  lost: number;
  recovered: number;
  errors: number;
}

export interface DeliveryWorkerDeps {
  store: DeliveryStore;
  directory: SubscriberDirectory;
  generator: MessageGenerator;
  sender: MessageSender;
  history: HistoryStore;
  rateLimiter: RateLimiter;
  eventBus: EventBus;
}

export interface DeliveryWorkerOptions {
  workerId?: string;
  maxAttempts: number;
  backoff: BackoffOptions;
  batchSize: number;
  concurrency: number;
  /**
   * An in_progress claim older than this is treated as a failed attempt
   */
  claimTimeoutMs: number;
  generationTimeoutMs: number;
  sendTimeoutMs: number;
  storeTimeoutMs: number;
  historyLookupLimit: number;
  clock?: Clock;
  random?: () => number;
}

export const workerOptionsFromSettings = (settings: Settings): DeliveryWorkerOptions => ({
  maxAttempts: settings.MAX_RETRY_ATTEMPTS,
  backoff: {
    baseDelayMs: settings.RETRY_BACKOFF_DELAY,
    maxDelayMs: settings.RETRY_BACKOFF_MAX,
  },
  batchSize: settings.DELIVERY_BATCH_SIZE,
  concurrency: settings.DELIVERY_CONCURRENCY,
  claimTimeoutMs: settings.CLAIM_TIMEOUT_MS,
  generationTimeoutMs: settings.GENERATION_TIMEOUT_MS,
  sendTimeoutMs: settings.SEND_TIMEOUT_MS,
  storeTimeoutMs: settings.STORE_TIMEOUT_MS,
  historyLookupLimit: settings.HISTORY_LOOKUP_LIMIT,
});

/**
 * The claim was taken over (cancelled externally or recovered as stale)
 * between two steps of an attempt
 */
class ClaimLostError extends Error {
  constructor(
    readonly deliveryId: string,
    readonly step: string
  ) {
    super(`Claim on delivery ${deliveryId} lost while ${step}`);
    this.name = 'ClaimLostError';
  }
}

class WindowElapsedError extends Error {
  constructor(readonly deliveryId: string) {
    super(`Delivery window of ${deliveryId} closed before the send`);
    this.name = 'WindowElapsedError';
  }
}

const asError = (error: unknown): Error => (error instanceof Error ? error : new Error(String(error)));

export class DeliveryWorker {
  readonly workerId: string;
  private readonly clock: Clock;
  private readonly random: () => number;

  constructor(
    private readonly deps: DeliveryWorkerDeps,
    private readonly options: DeliveryWorkerOptions
  ) {
    this.workerId = options.workerId ?? `${hostname()}-${process.pid}`;
    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? Math.random;
  }

  /**
   * One pass over due deliveries. Contains no loop or sleep; the host triggers it.
   */
  tick = async (): Promise<TickSummary> => {
    const trace_id = newTraceId(`tick-${this.workerId}`);
    const summary: TickSummary = {
      due: 0,
      claimed: 0,
      sent: 0,
      retried: 0,
      failed: 0,
      throttled: 0,
      cancelled: 0,
      lost: 0,
      recovered: 0,
      errors: 0,
    };

    summary.recovered = await this.recoverStaleClaims(trace_id);

    const due = await this.withStoreTimeout(
      this.deps.store.findDue(this.clock(), this.options.batchSize),
      'find due deliveries'
    );
    summary.due = due.length;

    const results = await mapWithConcurrency(due, this.options.concurrency, delivery =>
      this.processDelivery(delivery, trace_id)
    );

    for (const { claimed, outcome } of results) {
      if (claimed) {
        summary.claimed++;
      }
      switch (outcome) {
        case 'sent':
          summary.sent++;
          break;
        case 'retried':
          summary.retried++;
          break;
        case 'failed':
          summary.failed++;
          break;
        case 'throttled':
          summary.throttled++;
          break;
        case 'cancelled':
          summary.cancelled++;
          break;
        case 'lost':
          summary.lost++;
          break;
        case 'error':
          summary.errors++;
          break;
        case 'skipped':
          break;
      }
    }

    if (summary.due > 0 || summary.recovered > 0) {
      logger.info({ trace_id, workerId: this.workerId, ...summary }, 'Delivery tick completed');
    }

    return summary;
  };

  private processDelivery = async (
    delivery: ScheduledDelivery,
    trace_id: string
  ): Promise<{ claimed: boolean; outcome: DeliveryOutcome }> => {
    const token = randomUUID();

    let claimed: boolean;
    try {
      claimed = await this.withStoreTimeout(
        this.deps.store.claim(delivery.id, { token, workerId: this.workerId, now: this.clock() }),
        'claim delivery'
      );
    } catch (error) {
      logError(trace_id, asError(error), { deliveryId: delivery.id, step: 'claim' });
      return { claimed: false, outcome: 'error' };
    }

    if (!claimed) {
      logger.debug({ trace_id, deliveryId: delivery.id }, 'Delivery claimed by another worker, skipping');
      return { claimed: false, outcome: 'skipped' };
    }

    try {
      return { claimed: true, outcome: await this.attempt(delivery.id, token, trace_id) };
    } catch (error) {
      if (error instanceof ClaimLostError) {
        return { claimed: true, outcome: await this.claimLost(error, trace_id) };
      }
      // The row stays in_progress until stale-claim recovery counts the attempt
      logError(trace_id, asError(error), { deliveryId: delivery.id, step: 'attempt' });
      return { claimed: true, outcome: 'error' };
    }
  };

  private attempt = async (id: string, token: string, trace_id: string): Promise<DeliveryOutcome> => {
    const current = await this.withStoreTimeout(this.deps.store.findById(id), 'load delivery');
    if (!current) {
      throw new ClaimLostError(id, 'loading the claimed delivery');
    }
    this.assertClaimed(current, token, 'starting the attempt');

    const subscriber = await this.withStoreTimeout(
      this.deps.directory.findSubscriber(current.subscriberId),
      'load subscriber'
    );
    if (!subscriber || !subscriber.active) {
      return await this.cancelClaimed(current, token, 'subscriber inactive', trace_id);
    }

    if (this.windowElapsed(current)) {
      return await this.finalizeFailed(current, token, 'delivery window elapsed', false, trace_id);
    }

    let message: GeneratedMessage;
    let receiptId: string;
    try {
      message = await this.ensureContent(current, token, trace_id);

      const latest = await this.withStoreTimeout(this.deps.store.findById(id), 'reload delivery');
      if (!latest) {
        throw new ClaimLostError(id, 'reloading before send');
      }
      this.assertClaimed(latest, token, 'preparing to send');
      // Generation may have outlasted the window
      if (this.windowElapsed(latest)) {
        throw new WindowElapsedError(id);
      }

      await this.acquire(RESOURCE_SMS);
      await this.acquire(RESOURCE_SMS_DAILY);
      receiptId = await withTimeout(
        this.deps.sender.send(subscriber.phoneNumber, message.content),
        this.options.sendTimeoutMs,
        'send message'
      );
    } catch (error) {
      if (error instanceof ClaimLostError) {
        throw error;
      }
      if (error instanceof WindowElapsedError) {
        return await this.finalizeFailed(current, token, 'delivery window elapsed', false, trace_id);
      }
      if (error instanceof ThrottledError) {
        return await this.releaseThrottled(current, token, error, trace_id);
      }
      return await this.handleFailure(current, token, error, trace_id);
    }

    // Accepted by the gateway: from here a store error must not count as a failed send
    return await this.completeSent(current, token, receiptId, message.fingerprint, trace_id);
  };

  private windowElapsed = (delivery: ScheduledDelivery): boolean =>
    this.clock().getTime() >= delivery.windowEndsAt.getTime();

  /**
   * Cancelled or taken over since the claim: abort before any further external call
   */
  private assertClaimed = (delivery: ScheduledDelivery, token: string, step: string): void => {
    if (delivery.status !== DeliveryStatus.IN_PROGRESS || delivery.claimToken !== token) {
      throw new ClaimLostError(delivery.id, step);
    }
  };

  /**
   * Content from an earlier failed send is reused so that a retry repeats the same message
   */
  private ensureContent = async (
    delivery: ScheduledDelivery,
    token: string,
    trace_id: string
  ): Promise<GeneratedMessage> => {
    if (delivery.content !== null && delivery.contentFingerprint !== null) {
      return { content: delivery.content, fingerprint: delivery.contentFingerprint };
    }

    await this.acquire(RESOURCE_GENERATION);

    const recent = await this.withStoreTimeout(
      this.deps.history.recentFingerprints(delivery.subscriberId, this.options.historyLookupLimit),
      'load message history'
    );
    const generated = await withTimeout(
      this.deps.generator.generateMessage(delivery.subscriberId, recent),
      this.options.generationTimeoutMs,
      'generate message'
    );

    const saved = await this.withStoreTimeout(
      this.deps.store.saveContent(delivery.id, token, generated.content, generated.fingerprint),
      'save content'
    );
    if (!saved) {
      throw new ClaimLostError(delivery.id, 'saving generated content');
    }

    logger.debug(
      { trace_id, deliveryId: delivery.id, fingerprint: generated.fingerprint },
      'Message content generated'
    );
    return generated;
  };

  private acquire = async (resource: string): Promise<void> => {
    const result = await this.deps.rateLimiter.tryAcquire(resource, 1);
    if (!result.allowed) {
      throw new ThrottledError(resource, result.retryAfterMs);
    }
  };

  private completeSent = async (
    delivery: ScheduledDelivery,
    token: string,
    receiptId: string,
    fingerprint: string,
    trace_id: string
  ): Promise<DeliveryOutcome> => {
    const marked = await this.withStoreTimeout(
      this.deps.store.markSent(delivery.id, token, receiptId, this.clock()),
      'mark sent'
    );
    if (!marked) {
      logger.error(
        { trace_id, deliveryId: delivery.id, receiptId },
        'Message accepted by the gateway after the claim was lost'
      );
      return 'lost';
    }

    try {
      await this.withStoreTimeout(this.deps.history.record(delivery.subscriberId, fingerprint), 'record history');
    } catch (error) {
      logError(trace_id, asError(error), {
        deliveryId: delivery.id,
        context: 'Failed to record message history after send',
      });
    }

    const attempts = delivery.attemptCount + 1;
    logCriticalOperation(trace_id, 'delivery_sent', {
      deliveryId: delivery.id,
      subscriberId: delivery.subscriberId,
      receiptId,
      attempts,
    });

    this.deps.eventBus.emit({
      name: EventName.DELIVERY_SENT,
      timestamp: this.clock(),
      traceId: trace_id,
      data: { deliveryId: delivery.id, subscriberId: delivery.subscriberId, receiptId, attempts },
    });

    return 'sent';
  };

  /**
   * A throttle is not a failure: back to pending without counting an attempt
   */
  private releaseThrottled = async (
    delivery: ScheduledDelivery,
    token: string,
    throttle: ThrottledError,
    trace_id: string
  ): Promise<DeliveryOutcome> => {
    const delayMs = Math.min(throttle.retryAfterMs, this.options.backoff.maxDelayMs);
    const nextAttemptAt = new Date(this.clock().getTime() + delayMs);

    const released = await this.withStoreTimeout(
      this.deps.store.release(delivery.id, token, nextAttemptAt),
      'release delivery'
    );
    if (!released) {
      throw new ClaimLostError(delivery.id, 'releasing after throttle');
    }

    logger.info(
      {
        trace_id,
        deliveryId: delivery.id,
        resource: throttle.resource,
        nextAttemptAt: nextAttemptAt.toISOString(),
      },
      'Rate limit reached, delivery released'
    );
    return 'throttled';
  };

  private handleFailure = async (
    delivery: ScheduledDelivery,
    token: string,
    error: unknown,
    trace_id: string
  ): Promise<DeliveryOutcome> => {
    const attempts = delivery.attemptCount + 1;
    const message = errorMessage(error);
    const permanent = error instanceof SendError && !error.shouldRetry;

    if (permanent || attempts >= this.options.maxAttempts) {
      return await this.finalizeFailed(delivery, token, message, true, trace_id);
    }

    const delayMs = computeBackoff(attempts, this.options.backoff, this.random);
    const retryAt = new Date(this.clock().getTime() + delayMs);

    const recorded = await this.withStoreTimeout(
      this.deps.store.recordFailure(delivery.id, token, { error: message, retryAt, countAttempt: true }),
      'record failure'
    );
    if (!recorded) {
      throw new ClaimLostError(delivery.id, 'recording a failed attempt');
    }

    logger.warn(
      {
        trace_id,
        deliveryId: delivery.id,
        attempts,
        error: message,
        retryAt: retryAt.toISOString(),
      },
      'Delivery attempt failed, retry scheduled'
    );
    return 'retried';
  };

  private finalizeFailed = async (
    delivery: ScheduledDelivery,
    token: string,
    message: string,
    countAttempt: boolean,
    trace_id: string
  ): Promise<DeliveryOutcome> => {
    const recorded = await this.withStoreTimeout(
      this.deps.store.recordFailure(delivery.id, token, { error: message, retryAt: null, countAttempt }),
      'finalize failure'
    );
    if (!recorded) {
      throw new ClaimLostError(delivery.id, 'finalizing a failure');
    }

    const failure = new TerminalFailure(delivery.id, delivery.attemptCount + (countAttempt ? 1 : 0), message);

    logCriticalOperation(trace_id, 'delivery_failed_permanently', {
      deliveryId: delivery.id,
      subscriberId: delivery.subscriberId,
      attempts: failure.attempts,
      errorMessage: message,
    });

    this.deps.eventBus.emit({
      name: EventName.DELIVERY_FAILED,
      timestamp: this.clock(),
      traceId: trace_id,
      data: { subscriberId: delivery.subscriberId, failure },
    });

    return 'failed';
  };

  private cancelClaimed = async (
    delivery: ScheduledDelivery,
    token: string,
    reason: string,
    trace_id: string
  ): Promise<DeliveryOutcome> => {
    const cancelled = await this.withStoreTimeout(this.deps.store.cancel(delivery.id, token), 'cancel delivery');
    if (!cancelled) {
      throw new ClaimLostError(delivery.id, 'cancelling');
    }

    logCriticalOperation(trace_id, 'delivery_cancelled', {
      deliveryId: delivery.id,
      subscriberId: delivery.subscriberId,
      reason,
    });

    this.deps.eventBus.emit({
      name: EventName.DELIVERY_CANCELLED,
      timestamp: this.clock(),
      traceId: trace_id,
      data: { deliveryId: delivery.id, subscriberId: delivery.subscriberId, reason },
    });

    return 'cancelled';
  };

  /**
   * An external cancellation counts as cancelled; any other takeover as lost
   */
  private claimLost = async (error: ClaimLostError, trace_id: string): Promise<DeliveryOutcome> => {
    let latest: ScheduledDelivery | null = null;
    try {
      latest = await this.withStoreTimeout(this.deps.store.findById(error.deliveryId), 'load delivery');
    } catch (lookupError) {
      logError(trace_id, asError(lookupError), { deliveryId: error.deliveryId, step: 'inspect lost claim' });
    }
    const cancelled = latest?.status === DeliveryStatus.CANCELLED;

    logger.warn(
      { trace_id, deliveryId: error.deliveryId, step: error.step, status: latest?.status },
      cancelled ? 'Delivery cancelled during attempt, abandoned' : 'Delivery claim lost, attempt abandoned'
    );
    return cancelled ? 'cancelled' : 'lost';
  };

  /**
   * A worker that died or hung mid-attempt leaves its claim behind; count that as a failed attempt
   */
  private recoverStaleClaims = async (trace_id: string): Promise<number> => {
    const cutoff = new Date(this.clock().getTime() - this.options.claimTimeoutMs);
    const stale = await this.withStoreTimeout(
      this.deps.store.findStaleClaims(cutoff, this.options.batchSize),
      'find stale claims'
    );

    let recovered = 0;
    for (const delivery of stale) {
      if (delivery.claimToken === null) {
        continue;
      }

      try {
        await this.handleFailure(delivery, delivery.claimToken, new Error('claim timed out'), trace_id);
        recovered++;
      } catch (error) {
        if (error instanceof ClaimLostError) {
          logger.warn({ trace_id, deliveryId: delivery.id }, 'Stale claim already resolved elsewhere');
          continue;
        }
        logError(trace_id, asError(error), { deliveryId: delivery.id, step: 'recover stale claim' });
      }
    }

    if (recovered > 0) {
      logCriticalOperation(trace_id, 'stale_claims_recovered', { count: recovered, workerId: this.workerId });
    }
    return recovered;
  };

  private withStoreTimeout = <T>(promise: Promise<T>, operation: string): Promise<T> =>
    withTimeout(promise, this.options.storeTimeoutMs, operation);
}
