import { TerminalFailure } from '@/shared/errors';

/**
 * Event names available in the system
 */
export enum EventName {
  DELIVERY_SENT = 'delivery:sent',
  DELIVERY_FAILED = 'delivery:failed',
  DELIVERY_CANCELLED = 'delivery:cancelled',
}

export interface BaseEvent {
  name: EventName;
  timestamp: Date;
  traceId?: string;
}

export interface DeliverySentEvent extends BaseEvent {
  name: EventName.DELIVERY_SENT;
  data: {
    deliveryId: string;
    subscriberId: string;
    receiptId: string;
    attempts: number;
  };
}

/**
 * Terminal failure, surfaced to monitoring. Nothing retries it afterwards.
 */
export interface DeliveryFailedEvent extends BaseEvent {
  name: EventName.DELIVERY_FAILED;
  data: {
    subscriberId: string;
    failure: TerminalFailure;
  };
}

export interface DeliveryCancelledEvent extends BaseEvent {
  name: EventName.DELIVERY_CANCELLED;
  data: {
    deliveryId: string;
    subscriberId: string;
    reason: string;
  };
}

/**
 * Union of all event types
 */
export type DomainEvent = DeliverySentEvent | DeliveryFailedEvent | DeliveryCancelledEvent;

/**
 * Event handler function type
 */
export type EventHandler<T extends DomainEvent = DomainEvent> = (event: T) => Promise<void> | void;
