import { Logger } from '@nestjs/common';
import { GatewayEventType } from '../domain/enums';
import {
  EventDispatcher,
  EventHandler,
  EventSubscription,
  GatewayEvent,
} from '../interfaces';

/**
 * Default EventDispatcher.
 * Handlers run concurrently; a throwing handler is logged and isolated.
 */
export class EventDispatcherImpl implements EventDispatcher {
  private readonly logger = new Logger(EventDispatcherImpl.name);
  private readonly handlers = new Map<GatewayEventType, Set<EventHandler>>();
  private readonly globalHandlers = new Set<EventHandler>();
  private subscriptionIdCounter = 0;

  on(eventType: GatewayEventType, handler: EventHandler): EventSubscription {
    let handlers = this.handlers.get(eventType);
    if (!handlers) {
      handlers = new Set();
      this.handlers.set(eventType, handlers);
    }
    handlers.add(handler);

    return {
      id: `sub_${++this.subscriptionIdCounter}`,
      unsubscribe: () => this.off(eventType, handler),
    };
  }

  onAll(handler: EventHandler): EventSubscription {
    this.globalHandlers.add(handler);

    return {
      id: `sub_${++this.subscriptionIdCounter}`,
      unsubscribe: () => {
        this.globalHandlers.delete(handler);
      },
    };
  }

  off(eventType: GatewayEventType, handler: EventHandler): void {
    const handlers = this.handlers.get(eventType);
    if (handlers) {
      handlers.delete(handler);
      if (handlers.size === 0) {
        this.handlers.delete(eventType);
      }
    }
  }

  async dispatch(event: GatewayEvent): Promise<void> {
    const specificHandlers = this.handlers.get(event.eventType) ?? new Set<EventHandler>();
    const allHandlers = [...specificHandlers, ...this.globalHandlers];

    const results = await Promise.allSettled(
      allHandlers.map(async (handler) => handler(event)),
    );

    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        const reason = result.reason instanceof Error ? result.reason.message : String(result.reason);
        this.logger.error(
          `Handler ${allHandlers[index]?.name || 'anonymous'} failed for ${event.eventType}: ${reason}`,
        );
      }
    });
  }

  getHandlerCount(eventType?: GatewayEventType): number {
    if (eventType) {
      return (this.handlers.get(eventType)?.size ?? 0) + this.globalHandlers.size;
    }
    let total = this.globalHandlers.size;
    for (const handlers of this.handlers.values()) {
      total += handlers.size;
    }
    return total;
  }
}
