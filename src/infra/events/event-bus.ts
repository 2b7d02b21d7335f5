import { EventEmitter } from 'events';
import { logger } from '@/config/logger';
import { DomainEvent, EventHandler, EventName } from './event.types';

type EventOf<N extends EventName> = Extract<DomainEvent, { name: N }>;

/**
 * In-process pub/sub for delivery lifecycle events. Handlers run detached from
 * the emitter; a failing handler is logged and never reaches the worker.
 */
export class EventBus {
  private emitter: EventEmitter;
  private handlers: Map<EventName, number>;

  constructor() {
    this.emitter = new EventEmitter();
    this.handlers = new Map();
    this.emitter.setMaxListeners(50);
  }

  /**
   * Subscribe to an event
   */
  on = <N extends EventName>(eventName: N, handler: EventHandler<EventOf<N>>): void => {
    const handlerCount = (this.handlers.get(eventName) ?? 0) + 1;
    this.handlers.set(eventName, handlerCount);

    this.emitter.on(eventName, (event: EventOf<N>) => {
      Promise.resolve()
        .then(() => handler(event))
        .catch((error: unknown) => {
          logger.error(
            {
              eventName,
              error: error instanceof Error ? error.message : String(error),
              stack: error instanceof Error ? error.stack : undefined,
              traceId: event.traceId,
            },
            'Event handler failed'
          );
        });
    });

    logger.debug({ eventName, handlerCount }, 'Event handler registered');
  };

  /**
   * Emit an event
   */
  emit = <T extends DomainEvent>(event: T): void => {
    logger.debug(
      {
        eventName: event.name,
        traceId: event.traceId,
        timestamp: event.timestamp,
      },
      'Emitting event'
    );

    this.emitter.emit(event.name, event);
  };

  removeAllListeners = (): void => {
    this.emitter.removeAllListeners();
    this.handlers.clear();
  };
}
