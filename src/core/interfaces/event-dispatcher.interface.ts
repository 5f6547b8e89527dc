import { GatewayEventType, PaymentStatus } from '../domain/enums';

/**
 * Payload emitted for every gateway event
 */
export interface GatewayEvent {
  eventType: GatewayEventType;
  tenantId: string;
  providerName: string;
  paymentId?: string;
  status?: PaymentStatus;
  timestamp: Date;
  message?: string;
  metadata?: Record<string, string>;
}

export type EventHandler = (event: GatewayEvent) => Promise<void> | void;

export interface EventSubscription {
  id: string;
  unsubscribe(): void;
}

/**
 * Fan-out of gateway events. A failing handler never affects the others.
 */
export interface EventDispatcher {
  on(eventType: GatewayEventType, handler: EventHandler): EventSubscription;

  onAll(handler: EventHandler): EventSubscription;

  off(eventType: GatewayEventType, handler: EventHandler): void;

  dispatch(event: GatewayEvent): Promise<void>;

  getHandlerCount(eventType?: GatewayEventType): number;
}
