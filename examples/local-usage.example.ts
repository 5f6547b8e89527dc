/**
 * Example: Mounting the gateway in a host NestJS application
 *
 * Tenants store their own processor credentials through POST /config/:provider;
 * the host only supplies storage, the callback secret and its public URL.
 */

// app.module.ts
import { Inject, Injectable, Logger, Module } from '@nestjs/common';
import {
  Environment,
  GatewayEvent,
  GatewayEventType,
  GatewayModule,
  PAYMENT_ORCHESTRATION,
  PaymentOrchestrationService,
  PaymentResponse,
  PaymentStatus,
} from '../src';

const orderEvents = new Logger('Orders');

@Module({
  imports: [
    GatewayModule.forRoot({
      storage: {
        type: 'typeorm',
        options: {
          type: 'postgres',
          host: process.env.DB_HOST || 'localhost',
          port: parseInt(process.env.DB_PORT || '5432', 10),
          database: process.env.DB_NAME || 'shop',
          username: process.env.DB_USER || 'postgres',
          password: process.env.DB_PASSWORD || 'postgres',
          synchronize: process.env.NODE_ENV !== 'production',
        },
      },
      callback: {
        secret: process.env.CALLBACK_SECRET || 'change-me',
        publicBaseUrl: process.env.APP_URL || 'http://localhost:3000',
      },
      providers: {
        enabled: ['paystack'],
      },
      webhooks: {
        ipAllowlist: {
          paystack: ['52.31.139.75', '52.49.173.169', '52.214.14.220'],
        },
      },
      events: {
        handlers: [
          {
            eventType: GatewayEventType.PAYMENT_SUCCEEDED,
            handler: (event: GatewayEvent) => {
              orderEvents.log(`Fulfil order ${event.paymentId} for tenant ${event.tenantId}`);
            },
          },
          {
            eventType: GatewayEventType.PAYMENT_FAILED,
            handler: (event: GatewayEvent) => {
              orderEvents.warn(`Payment ${event.paymentId} failed: ${event.message ?? 'no reason given'}`);
            },
          },
        ],
      },
    }),
  ],
})
export class AppModule {}

// checkout.service.ts
@Injectable()
export class CheckoutService {
  constructor(
    @Inject(PAYMENT_ORCHESTRATION)
    private readonly payments: PaymentOrchestrationService,
  ) {}

  /**
   * Hosted checkout: the customer is sent to the processor and comes back
   * through /callback/paystack, which forwards them to the shop's return URL.
   */
  async startCheckout(tenantId: string, orderId: string, amount: number, email: string): Promise<string> {
    const response = await this.payments.createPayment(
      { tenantId, providerName: 'paystack', environment: Environment.SANDBOX },
      {
        referenceId: orderId,
        amount,
        currency: 'NGN',
        customer: { name: email, email },
        use3D: true,
        callbackUrl: `https://shop.example/orders/${orderId}/return`,
      },
    );

    if (!response.redirectUrl) {
      throw new Error(response.message ?? `Checkout for ${orderId} could not be started`);
    }
    return response.redirectUrl;
  }

  async isPaid(tenantId: string, orderId: string): Promise<boolean> {
    const response: PaymentResponse = await this.payments.getPaymentStatus(
      { tenantId, providerName: 'paystack', environment: Environment.SANDBOX },
      { paymentId: orderId },
    );
    return response.status === PaymentStatus.SUCCESSFUL;
  }
}
