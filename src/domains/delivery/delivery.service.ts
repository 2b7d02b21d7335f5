import { logCriticalOperation, newTraceId } from '@/config/logger';
import { EventBus } from '@/infra/events/event-bus';
import { EventName } from '@/infra/events/event.types';
import { isValidDay } from '@/infra/scheduling/timezone-resolver';
import { DAILY_MESSAGE_TYPE } from '@/infra/scheduling/scheduler.service';
import { NotFoundError, SchedulingError } from '@/shared/errors';
import { Clock, systemClock } from '@/shared/types';
import { generateIdempotencyKey } from '@/shared/utils';
import { ScheduledDelivery } from './delivery.model';
import { DeliveryStatusDto, DeliveryStore } from './delivery.types';

export const toStatusDto = (delivery: ScheduledDelivery): DeliveryStatusDto => ({
  id: delivery.id,
  subscriberId: delivery.subscriberId,
  deliveryDate: delivery.deliveryDate,
  scheduledAt: delivery.scheduledAt.toISOString(),
  status: delivery.status,
  attemptCount: delivery.attemptCount,
  nextAttemptAt: delivery.nextAttemptAt ? delivery.nextAttemptAt.toISOString() : null,
  lastError: delivery.lastError,
  contentFingerprint: delivery.contentFingerprint,
  receiptId: delivery.receiptId,
  sentAt: delivery.sentAt ? delivery.sentAt.toISOString() : null,
});

export class DeliveryService {
  private readonly clock: Clock;

  constructor(
    private readonly store: DeliveryStore,
    private readonly eventBus: EventBus,
    clock?: Clock
  ) {
    this.clock = clock ?? systemClock;
  }

  getDeliveryStatus = async (subscriberId: string, day: string): Promise<DeliveryStatusDto> => {
    const delivery = await this.findForDay(subscriberId, day);
    return toStatusDto(delivery);
  };

  /**
   * External cancellation. Only pending or in-progress deliveries can be cancelled;
   * a worker holding the claim notices before its next external call.
   */
  cancelDelivery = async (subscriberId: string, day: string, reason = 'cancelled by request'): Promise<DeliveryStatusDto> => {
    const delivery = await this.findForDay(subscriberId, day);

    const cancelled = await this.store.cancel(delivery.id);
    if (!cancelled) {
      throw new SchedulingError(`Delivery for ${subscriberId} on ${day} is already ${delivery.status}`);
    }

    const trace_id = newTraceId('cancel');
    logCriticalOperation(trace_id, 'delivery_cancelled', { deliveryId: delivery.id, subscriberId, day, reason });

    this.eventBus.emit({
      name: EventName.DELIVERY_CANCELLED,
      timestamp: this.clock(),
      traceId: trace_id,
      data: { deliveryId: delivery.id, subscriberId, reason },
    });

    return toStatusDto(await this.findForDay(subscriberId, day));
  };

  private findForDay = async (subscriberId: string, day: string): Promise<ScheduledDelivery> => {
    if (!isValidDay(day)) {
      throw new SchedulingError(`Invalid day: ${day}, expected yyyy-MM-dd`);
    }

    const delivery = await this.store.findByIdempotencyKey(
      generateIdempotencyKey(subscriberId, DAILY_MESSAGE_TYPE, day)
    );
    if (!delivery) {
      throw new NotFoundError(`Delivery not found for subscriber ${subscriberId} on ${day}`);
    }
    return delivery;
  };
}
