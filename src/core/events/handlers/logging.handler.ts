import { Logger } from '@nestjs/common';
import { GatewayEventType } from '../../domain/enums';
import { EventHandler, GatewayEvent } from '../../interfaces';

type LogLevel = 'verbose' | 'normal' | 'minimal';

/**
 * Logs every gateway event. Subscribe with dispatcher.onAll(handler.getHandler()).
 */
export class LoggingEventHandler {
  private readonly logger = new Logger('GatewayEvents');

  constructor(private readonly logLevel: LogLevel = 'normal') {}

  getHandler(): EventHandler {
    return (event: GatewayEvent) => {
      const line = this.format(event);
      switch (event.eventType) {
        case GatewayEventType.PAYMENT_FAILED:
        case GatewayEventType.WEBHOOK_REJECTED:
          this.logger.warn(line);
          break;
        case GatewayEventType.WEBHOOK_TASK_FAILED:
          this.logger.error(line);
          break;
        default:
          this.logger.log(line);
      }
    };
  }

  private format(event: GatewayEvent): string {
    const base = `[${event.eventType}] tenant=${event.tenantId} provider=${event.providerName}`;

    switch (this.logLevel) {
      case 'minimal':
        return base;
      case 'verbose':
        return `${base} payment=${event.paymentId ?? '-'} status=${event.status ?? '-'} at=${event.timestamp.toISOString()} ${JSON.stringify(event.metadata ?? {})}`;
      case 'normal':
      default:
        return `${base} payment=${event.paymentId ?? '-'} status=${event.status ?? '-'}${event.message ? ` ${event.message}` : ''}`;
    }
  }
}
