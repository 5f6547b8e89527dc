import * as crypto from 'crypto';

export type PaystackWebhookEvent = 'charge.success' | 'charge.failed' | 'refund.processed';

export interface PaystackWebhookOptions {
  reference?: string;
  /**
   * Minor units (kobo)
   */
  amount?: number;
  currency?: string;
  email?: string;
  reason?: string;
}

export interface SignedPaystackWebhook {
  body: Buffer;
  headers: Record<string, string>;
  payload: PaystackWebhookBody;
}

export interface PaystackWebhookBody {
  event: PaystackWebhookEvent;
  data: {
    id: number;
    domain: string;
    status: string;
    reference: string;
    amount: number;
    currency: string;
    gateway_response: string;
    channel: string;
    created_at: string;
    customer: { email: string };
    metadata: Record<string, string>;
  };
}

const EVENT_STATUS: Record<PaystackWebhookEvent, string> = {
  'charge.success': 'success',
  'charge.failed': 'failed',
  'refund.processed': 'processed',
};

/**
 * Paystack Webhook Factory
 * Builds Paystack-shaped webhook bodies signed the way Paystack signs them
 */
export class PaystackWebhookFactory {
  private static sequence = 0;

  static chargeSuccess(options: PaystackWebhookOptions = {}, secret?: string): SignedPaystackWebhook {
    return this.generateSignedWebhook('charge.success', options, secret);
  }

  static chargeFailed(options: PaystackWebhookOptions = {}, secret?: string): SignedPaystackWebhook {
    return this.generateSignedWebhook('charge.failed', options, secret);
  }

  static refundProcessed(options: PaystackWebhookOptions = {}, secret?: string): SignedPaystackWebhook {
    return this.generateSignedWebhook('refund.processed', options, secret);
  }

  /**
   * HMAC-SHA512 of the body, hex
   */
  static sign(body: Buffer, secret: string): string {
    return crypto.createHmac('sha512', secret).update(body).digest('hex');
  }

  static generateSignedWebhook(
    event: PaystackWebhookEvent,
    options: PaystackWebhookOptions = {},
    secret: string = 'sk_test_secret_placeholder',
  ): SignedPaystackWebhook {
    const id = ++this.sequence;
    const payload: PaystackWebhookBody = {
      event,
      data: {
        id,
        domain: 'test',
        status: EVENT_STATUS[event],
        reference: options.reference ?? `ref_${id}`,
        amount: options.amount ?? 10000,
        currency: options.currency ?? 'NGN',
        gateway_response: options.reason ?? (event === 'charge.failed' ? 'Declined' : 'Successful'),
        channel: 'card',
        created_at: new Date().toISOString(),
        customer: { email: options.email ?? 'customer@example.com' },
        metadata: {},
      },
    };

    const body = Buffer.from(JSON.stringify(payload));
    return {
      body,
      headers: {
        'content-type': 'application/json',
        'x-paystack-signature': this.sign(body, secret),
      },
      payload,
    };
  }
}
