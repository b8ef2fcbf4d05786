import type { Logger } from 'pino';
import type { EventType, EventPayload, DomainEvent } from '../domain/events/DomainEvents.js';
import { logger as rootLogger } from '../infrastructure/logging/logger.js';

type EventHandler<T extends EventType> = (event: EventPayload<T>) => void;

type Listener = (event: DomainEvent) => void;

function isEventOfType<T extends EventType>(event: DomainEvent, type: T): event is EventPayload<T> {
  return event.type === type;
}

/** Typed event bus for domain events. Subscribe with `on()`, publish with `emit()`. */
export class EventBus {
  /** Per event type, the registered handler mapped to its type-narrowing listener. */
  private readonly handlers = new Map<EventType, Map<object, Listener>>();

  constructor(private readonly logger: Logger = rootLogger.child({ component: 'EventBus' })) {}

  /** Subscribe to events of the given type. */
  on<T extends EventType>(type: T, handler: EventHandler<T>): void {
    const existing = this.handlers.get(type) ?? new Map<object, Listener>();
    existing.set(handler, (event) => {
      if (isEventOfType(event, type)) handler(event);
    });
    this.handlers.set(type, existing);
  }

  /** Unsubscribe a previously registered handler. */
  off<T extends EventType>(type: T, handler: EventHandler<T>): void {
    this.handlers.get(type)?.delete(handler);
  }

  /** Emit a domain event to all registered handlers. A throwing handler is logged and does not stop the others. */
  emit(event: DomainEvent): void {
    const listeners = this.handlers.get(event.type);
    if (!listeners) return;

    for (const listener of listeners.values()) {
      try {
        listener(event);
      } catch (error) {
        this.logger.error({ err: error, event: event.type }, 'Event handler threw');
      }
    }
  }
}
