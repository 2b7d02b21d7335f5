import { logger } from '@/config/logger';
import { EventBus } from '@/infra/events/event-bus';
import {
  DeliveryCancelledEvent,
  DeliveryFailedEvent,
  DeliverySentEvent,
  EventName,
} from '@/infra/events/event.types';
import { TerminalFailure } from '@/shared/errors';

jest.mock('@/config/logger', () => ({
  logger: {
    debug: jest.fn(),
    error: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
  },
}));

const flushHandlers = () => new Promise<void>(resolve => setImmediate(resolve));

describe('EventBus', () => {
  let eventBus: EventBus;
  const mockLogger = jest.mocked(logger);

  const sentEvent = (overrides?: Partial<DeliverySentEvent['data']>): DeliverySentEvent => ({
    name: EventName.DELIVERY_SENT,
    timestamp: new Date('2024-03-09T19:00:00Z'),
    traceId: 'tick-worker-a-1',
    data: { deliveryId: 'delivery-1', subscriberId: 'sub-1', receiptId: 'receipt-1', attempts: 1, ...overrides },
  });

  beforeEach(() => {
    eventBus = new EventBus();
  });

  describe('on', () => {
    it('should register handlers and count them per event', () => {
      eventBus.on(EventName.DELIVERY_SENT, jest.fn());
      eventBus.on(EventName.DELIVERY_SENT, jest.fn());

      expect(mockLogger.debug).toHaveBeenLastCalledWith(
        { eventName: EventName.DELIVERY_SENT, handlerCount: 2 },
        'Event handler registered'
      );
    });
  });

  describe('emit', () => {
    it('should deliver the event to every handler of that name', async () => {
      const first = jest.fn();
      const second = jest.fn();
      const other = jest.fn();
      eventBus.on(EventName.DELIVERY_SENT, first);
      eventBus.on(EventName.DELIVERY_SENT, second);
      eventBus.on(EventName.DELIVERY_CANCELLED, other);

      const event = sentEvent();
      eventBus.emit(event);
      await flushHandlers();

      expect(first).toHaveBeenCalledWith(event);
      expect(second).toHaveBeenCalledWith(event);
      expect(other).not.toHaveBeenCalled();
    });

    it('should run handlers after emit returns', async () => {
      const handler = jest.fn();
      eventBus.on(EventName.DELIVERY_SENT, handler);

      eventBus.emit(sentEvent());

      expect(handler).not.toHaveBeenCalled();
      await flushHandlers();
      expect(handler).toHaveBeenCalledTimes(1);
    });

    it('should carry the terminal failure to failure handlers', async () => {
      const handler = jest.fn<void, [DeliveryFailedEvent]>();
      eventBus.on(EventName.DELIVERY_FAILED, handler);

      const failure = new TerminalFailure('delivery-7', 5, 'gateway 503');
      eventBus.emit<DeliveryFailedEvent>({
        name: EventName.DELIVERY_FAILED,
        timestamp: new Date('2024-03-09T19:00:00Z'),
        data: { subscriberId: 'sub-7', failure },
      });
      await flushHandlers();

      const [event] = handler.mock.calls[0];
      expect(event.data.failure).toBe(failure);
      expect(event.data.failure.message).toBe('Delivery delivery-7 failed permanently after 5 attempt(s): gateway 503');
    });

    it('should log a failing handler without affecting the emitter or other handlers', async () => {
      const failing = jest.fn(async () => {
        throw new Error('audit sink down');
      });
      const healthy = jest.fn();
      eventBus.on(EventName.DELIVERY_SENT, failing);
      eventBus.on(EventName.DELIVERY_SENT, healthy);

      expect(() => eventBus.emit(sentEvent())).not.toThrow();
      await flushHandlers();

      expect(healthy).toHaveBeenCalledTimes(1);
      expect(mockLogger.error).toHaveBeenCalledWith(
        expect.objectContaining({
          eventName: EventName.DELIVERY_SENT,
          error: 'audit sink down',
          traceId: 'tick-worker-a-1',
        }),
        'Event handler failed'
      );
    });

    it('should log a handler that throws synchronously', async () => {
      eventBus.on(EventName.DELIVERY_CANCELLED, () => {
        throw new Error('boom');
      });

      const event: DeliveryCancelledEvent = {
        name: EventName.DELIVERY_CANCELLED,
        timestamp: new Date('2024-03-09T19:00:00Z'),
        data: { deliveryId: 'delivery-2', subscriberId: 'sub-2', reason: 'subscriber inactive' },
      };
      eventBus.emit(event);
      await flushHandlers();

      expect(mockLogger.error).toHaveBeenCalledWith(
        expect.objectContaining({ eventName: EventName.DELIVERY_CANCELLED, error: 'boom' }),
        'Event handler failed'
      );
    });
  });

  describe('removeAllListeners', () => {
    it('should drop every handler', async () => {
      const handler = jest.fn();
      eventBus.on(EventName.DELIVERY_SENT, handler);

      eventBus.removeAllListeners();
      eventBus.emit(sentEvent());
      await flushHandlers();

      expect(handler).not.toHaveBeenCalled();

      eventBus.on(EventName.DELIVERY_SENT, handler);
      expect(mockLogger.debug).toHaveBeenLastCalledWith(
        { eventName: EventName.DELIVERY_SENT, handlerCount: 1 },
        'Event handler registered'
      );
    });
  });

  it('should keep separate buses independent', async () => {
    const other = new EventBus();
    const handler = jest.fn();
    other.on(EventName.DELIVERY_SENT, handler);

    eventBus.emit(sentEvent());
    await flushHandlers();

    expect(handler).not.toHaveBeenCalled();
  });
});
