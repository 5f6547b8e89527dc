import { signMockWebhook } from '../adapters/providers/mock';

const DEFAULT_SECRET = 'test-secret';

/**
 * Factory for signed mock-processor webhooks
 * Used for testing webhook ingestion without a real processor
 */
export class MockWebhookFactory {
  private static sequence = 0;

  /**
   * Generate a payment successful webhook
   */
  static paymentSuccessful(options: MockWebhookOptions = {}): MockWebhook {
    return this.build('payment.succeeded', 'success', options);
  }

  /**
   * Generate a payment failed webhook
   */
  static paymentFailed(options: MockWebhookOptions = {}): MockWebhook {
    return this.build('payment.failed', 'failed', options, {
      failureReason: options.failureReason || 'Insufficient funds',
    });
  }

  /**
   * Generate a refund webhook
   */
  static refundProcessed(options: MockWebhookOptions = {}): MockWebhook {
    return this.build('refund.processed', 'refunded', options);
  }

  /**
   * Correctly shaped webhook signed with the wrong secret
   */
  static invalidSignature(options: MockWebhookOptions = {}): MockWebhook {
    return this.paymentSuccessful({ ...options, secret: 'wrong-secret' });
  }

  /**
   * Body that is neither JSON nor form-encoded key/value pairs
   */
  static malformedPayload(secret: string = DEFAULT_SECRET): MockWebhook {
    const body = Buffer.from('{"event": "payment.succeeded", "data": ');
    return {
      body,
      headers: {
        'content-type': 'application/json',
        'x-mock-signature': signMockWebhook(body, secret),
      },
      event: 'payment.succeeded',
      paymentId: '',
    };
  }

  /**
   * The same delivery repeated, byte for byte
   */
  static duplicate(webhook: MockWebhook, count: number = 2): MockWebhook[] {
    return Array.from({ length: count }, () => ({
      ...webhook,
      body: Buffer.from(webhook.body),
      headers: { ...webhook.headers },
    }));
  }

  /**
   * Distinct successful payments
   */
  static batch(count: number, options: MockWebhookOptions = {}): MockWebhook[] {
    return Array.from({ length: count }, () =>
      this.paymentSuccessful({ ...options, paymentId: undefined }),
    );
  }

  private static build(
    event: string,
    status: string,
    options: MockWebhookOptions,
    extra: Record<string, string> = {},
  ): MockWebhook {
    const paymentId = options.paymentId || `mock_pay_wh_${++this.sequence}`;
    const payload = {
      event,
      data: {
        paymentId,
        status,
        amount: options.amount ?? 100,
        currency: options.currency || 'USD',
        ...extra,
      },
    };
    const body = Buffer.from(JSON.stringify(payload));

    return {
      body,
      headers: {
        'content-type': 'application/json',
        'x-mock-signature': signMockWebhook(body, options.secret || DEFAULT_SECRET),
      },
      event,
      paymentId,
    };
  }
}

export interface MockWebhookOptions {
  paymentId?: string;
  amount?: number;
  currency?: string;
  failureReason?: string;
  /**
   * Signing secret; must match the tenant's webhookSecret (or secretKey)
   */
  secret?: string;
}

export interface MockWebhook {
  body: Buffer;
  headers: Record<string, string>;
  event: string;
  paymentId: string;
}
