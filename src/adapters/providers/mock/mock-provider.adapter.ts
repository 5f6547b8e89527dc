import * as crypto from 'crypto';
import {
  CallbackState,
  CallOptions,
  CancelRequest,
  CommissionInfo,
  CommissionInquiry,
  ConfigField,
  ConfigurationError,
  Environment,
  InstallmentInfo,
  InstallmentInquiry,
  Money,
  PaymentProviderAdapter,
  PaymentRequest,
  PaymentResponse,
  PaymentStatus,
  PaymentStatusRequest,
  ProviderCredentials,
  ProviderRegistry,
  RawProviderResponse,
  RefundRequest,
  RefundResponse,
  WebhookPayload,
  WebhookValidationResult,
  escapeHtml,
  normalizePaymentStatus,
  roundCurrency,
  validateConfigFields,
} from '../../../core';

export const MOCK_PROVIDER_NAME = 'mock';
export const MOCK_APPROVED_CARD = '4111111111111111';
export const MOCK_DECLINED_CARD = '4000000000000002';
export const MOCK_COMMISSION_RATE = 2.9;

const INSTALLMENT_SURCHARGES: ReadonlyArray<[count: number, rate: number]> = [
  [1, 0],
  [3, 2.5],
  [6, 5],
];

interface MockProviderConfig {
  apiKey: string;
  secretKey: string;
  webhookSecret: string;
  baseUrl: string;
  latencyMs: number;
}

/**
 * Entry in the in-memory payment book
 */
interface MockPayment {
  paymentId: string;
  transactionId: string;
  amount: number;
  currency: string;
  status: PaymentStatus;
  declined: boolean;
  refundedAmount: number;
  conversationId?: string;
  createdAt: Date;
}

/**
 * Sign a mock webhook body: HMAC-SHA256, hex
 */
export function signMockWebhook(body: Buffer | string, secret: string): string {
  return crypto.createHmac('sha256', secret).update(body).digest('hex');
}

/**
 * Deterministic in-process processor.
 *
 * Card 4111111111111111 is approved, 4000000000000002 is declined, anything
 * else is approved. 3D payments stay pending until the callback completes
 * them. Every instance keeps its own payment book, so two tenants never see
 * each other's payments.
 */
export class MockProviderAdapter implements PaymentProviderAdapter {
  readonly providerName = MOCK_PROVIDER_NAME;

  private config?: MockProviderConfig;
  private readonly payments = new Map<string, MockPayment>();
  private sequence = 0;

  getRequiredConfig(environment: Environment): ConfigField[] {
    return [
      {
        key: 'apiKey',
        required: true,
        type: 'string',
        description: 'API key issued by the mock processor',
        example: environment === Environment.PRODUCTION ? 'mock_live_key_123' : 'mock_test_key_123',
        minLength: 8,
        sensitive: true,
      },
      {
        key: 'secretKey',
        required: true,
        type: 'string',
        description: 'Secret used to sign API calls',
        minLength: 8,
        sensitive: true,
      },
      {
        key: 'webhookSecret',
        required: false,
        type: 'string',
        description: 'Webhook signing secret; defaults to secretKey',
        sensitive: true,
      },
      {
        key: 'baseUrl',
        required: false,
        type: 'url',
        description: 'Processor base URL used in 3D redirect links',
        example: 'https://sandbox.mock-processor.test',
      },
      {
        key: 'latencyMs',
        required: false,
        type: 'number',
        description: 'Artificial latency added to every call',
        example: '0',
      },
    ];
  }

  validateConfig(config: ProviderCredentials): void {
    validateConfigFields(this.providerName, config, this.getRequiredConfig(Environment.SANDBOX));
  }

  initialize(config: ProviderCredentials): void {
    this.config = {
      apiKey: config.apiKey,
      secretKey: config.secretKey,
      webhookSecret: config.webhookSecret || config.secretKey,
      baseUrl: (config.baseUrl || 'https://sandbox.mock-processor.test').replace(/\/+$/, ''),
      latencyMs: config.latencyMs ? Number(config.latencyMs) : 0,
    };
  }

  // ==================== Payments ====================

  async createPayment(request: PaymentRequest, options?: CallOptions): Promise<PaymentResponse> {
    await this.simulateLatency(options?.signal);

    const payment = this.book(request, false);
    payment.status = payment.declined ? PaymentStatus.FAILED : PaymentStatus.SUCCESSFUL;
    return this.toResponse(payment);
  }

  async create3DPayment(request: PaymentRequest, options?: CallOptions): Promise<PaymentResponse> {
    await this.simulateLatency(options?.signal);
    const { baseUrl } = this.requireConfig();

    const payment = this.book(request, true);
    const returnUrl = request.callbackUrl ?? '';
    const redirectUrl =
      `${baseUrl}/3ds/${encodeURIComponent(payment.paymentId)}` +
      `?returnUrl=${encodeURIComponent(returnUrl)}`;

    return {
      ...this.toResponse(payment),
      message: '3D Secure verification required',
      redirectUrl,
      html: [
        '<!DOCTYPE html>',
        '<html>',
        '<body onload="document.forms[0].submit()">',
        `  <form method="get" action="${escapeHtml(`${baseUrl}/3ds/${encodeURIComponent(payment.paymentId)}`)}">`,
        `    <input type="hidden" name="returnUrl" value="${escapeHtml(returnUrl)}">`,
        '  </form>',
        '</body>',
        '</html>',
      ].join('\n'),
    };
  }

  /**
   * The challenge page posts back `status=failed` when the cardholder fails
   * authentication; a declined card fails regardless.
   */
  async complete3DPayment(
    state: CallbackState,
    data: Record<string, string>,
    options?: CallOptions,
  ): Promise<PaymentResponse> {
    await this.simulateLatency(options?.signal);

    const payment = this.payments.get(state.paymentId);
    if (!payment) {
      return {
        success: false,
        status: PaymentStatus.FAILED,
        paymentId: state.paymentId,
        errorCode: 'payment_not_found',
        message: `Unknown payment ${state.paymentId}`,
        systemTime: new Date(),
        providerResponse: RawProviderResponse.none(),
      };
    }

    if (payment.status === PaymentStatus.PENDING) {
      const failed = payment.declined || data.status === 'failed';
      payment.status = failed ? PaymentStatus.FAILED : PaymentStatus.SUCCESSFUL;
    }
    return this.toResponse(payment);
  }

  async getPaymentStatus(
    request: PaymentStatusRequest,
    options?: CallOptions,
  ): Promise<PaymentResponse> {
    await this.simulateLatency(options?.signal);
    return this.toResponse(this.requirePayment(request.paymentId));
  }

  async cancelPayment(request: CancelRequest, options?: CallOptions): Promise<PaymentResponse> {
    await this.simulateLatency(options?.signal);
    const payment = this.requirePayment(request.paymentId);

    if (payment.status === PaymentStatus.REFUNDED || payment.status === PaymentStatus.FAILED) {
      return {
        ...this.toResponse(payment),
        success: false,
        errorCode: 'not_cancellable',
        message: `Payment in status ${payment.status} cannot be cancelled`,
      };
    }

    payment.status = PaymentStatus.CANCELLED;
    return { ...this.toResponse(payment), message: request.reason ?? 'Payment cancelled' };
  }

  async refundPayment(request: RefundRequest, options?: CallOptions): Promise<RefundResponse> {
    await this.simulateLatency(options?.signal);
    const payment = this.requirePayment(request.paymentId);

    if (payment.status !== PaymentStatus.SUCCESSFUL) {
      return {
        success: false,
        paymentId: payment.paymentId,
        status: payment.status,
        errorCode: 'not_refundable',
        message: `Payment in status ${payment.status} cannot be refunded`,
        systemTime: new Date(),
      };
    }

    const remaining = roundCurrency(payment.amount - payment.refundedAmount);
    const refundAmount = request.refundAmount ?? remaining;
    if (refundAmount > remaining) {
      return {
        success: false,
        paymentId: payment.paymentId,
        status: payment.status,
        errorCode: 'refund_exceeds_amount',
        message: `Refund of ${refundAmount} exceeds refundable ${remaining}`,
        systemTime: new Date(),
      };
    }

    payment.refundedAmount = roundCurrency(payment.refundedAmount + refundAmount);
    if (payment.refundedAmount >= payment.amount) {
      payment.status = PaymentStatus.REFUNDED;
    }

    const refundId = `mock_rfd_${++this.sequence}`;
    return {
      success: true,
      refundId,
      paymentId: payment.paymentId,
      status: payment.status,
      refundAmount,
      message: 'Refund processed',
      systemTime: new Date(),
      rawResponse: RawProviderResponse.json({ refundId, refundAmount, currency: payment.currency }),
    };
  }

  // ==================== Inquiries ====================

  async getInstallmentCount(
    inquiry: InstallmentInquiry,
    options?: CallOptions,
  ): Promise<InstallmentInfo> {
    await this.simulateLatency(options?.signal);

    return {
      currency: inquiry.currency.toUpperCase(),
      options: INSTALLMENT_SURCHARGES.map(([installmentCount, rate]) => {
        const totalAmount = roundCurrency(inquiry.amount * (1 + rate / 100));
        return {
          installmentCount,
          installmentAmount: roundCurrency(totalAmount / installmentCount),
          totalAmount,
        };
      }),
    };
  }

  async getCommission(inquiry: CommissionInquiry, options?: CallOptions): Promise<CommissionInfo> {
    await this.simulateLatency(options?.signal);

    const amount = new Money(inquiry.amount, inquiry.currency);
    const commission = amount.percentage(MOCK_COMMISSION_RATE);
    return {
      rate: MOCK_COMMISSION_RATE,
      commissionAmount: commission.amount,
      netAmount: roundCurrency(amount.amount - commission.amount),
      currency: amount.currency,
    };
  }

  // ==================== Webhooks ====================

  /**
   * Signature is HMAC-SHA256 (hex) of the raw body in x-mock-signature.
   * Body shape: { event, data: { paymentId, status, ... } }
   */
  async validateWebhook(
    payload: WebhookPayload,
    options?: CallOptions,
  ): Promise<WebhookValidationResult> {
    await this.simulateLatency(options?.signal);
    const { webhookSecret } = this.requireConfig();
    const { data, headers, rawBody } = payload;

    const signature = headers['x-mock-signature'];
    if (!signature) {
      return { valid: false, reason: 'Missing x-mock-signature header', data };
    }
    if (!rawBody) {
      return { valid: false, reason: 'Raw body is required for signature verification', data };
    }
    if (!this.timingSafeEqual(signature, signMockWebhook(rawBody, webhookSecret))) {
      return { valid: false, reason: 'Webhook signature mismatch', data };
    }

    return {
      valid: true,
      paymentId: data['data.paymentId'] || data.paymentId,
      status: normalizePaymentStatus(data['data.status'] ?? data.status),
      data,
    };
  }

  // ==================== Private Helpers ====================

  private book(request: PaymentRequest, pending: boolean): MockPayment {
    const seq = ++this.sequence;
    const cardNumber = request.cardInfo?.cardNumber.replace(/\s+/g, '');
    const payment: MockPayment = {
      paymentId: request.referenceId || request.id || `mock_pay_${seq}`,
      transactionId: `mock_txn_${seq}`,
      amount: request.amount,
      currency: request.currency.toUpperCase(),
      status: pending ? PaymentStatus.PENDING : PaymentStatus.PROCESSING,
      declined: cardNumber === MOCK_DECLINED_CARD,
      refundedAmount: 0,
      conversationId: request.conversationId,
      createdAt: new Date(),
    };
    this.payments.set(payment.paymentId, payment);
    return payment;
  }

  private requirePayment(paymentId: string): MockPayment {
    const payment = this.payments.get(paymentId);
    if (!payment) {
      throw new Error(`mock: payment ${paymentId} not found`);
    }
    return payment;
  }

  private toResponse(payment: MockPayment): PaymentResponse {
    const failed = payment.status === PaymentStatus.FAILED;
    return {
      success: !failed,
      status: payment.status,
      paymentId: payment.paymentId,
      transactionId: payment.transactionId,
      amount: payment.amount,
      currency: payment.currency,
      errorCode: failed ? 'card_declined' : undefined,
      message: failed ? 'Card declined' : undefined,
      systemTime: new Date(),
      providerResponse: RawProviderResponse.json({
        paymentId: payment.paymentId,
        transactionId: payment.transactionId,
        status: payment.status,
        amount: payment.amount,
        currency: payment.currency,
      }),
    };
  }

  private requireConfig(): MockProviderConfig {
    if (!this.config) {
      throw new ConfigurationError(
        `${this.providerName}: provider used before initialize`,
        this.providerName,
      );
    }
    return this.config;
  }

  /**
   * Waits latencyMs, or rejects as soon as the signal aborts
   */
  private async simulateLatency(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new Error('Request aborted');
    }
    const { latencyMs } = this.requireConfig();
    if (latencyMs <= 0) {
      return;
    }

    await new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        clearTimeout(timer);
        reject(new Error('Request aborted'));
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, latencyMs);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  private timingSafeEqual(a: string, b: string): boolean {
    if (a.length !== b.length) {
      return false;
    }
    return crypto.timingSafeEqual(Buffer.from(a), Buffer.from(b));
  }
}

/**
 * Self-registration hook
 */
export function registerMockProvider(registry: ProviderRegistry): void {
  registry.register(MOCK_PROVIDER_NAME, () => new MockProviderAdapter());
}
