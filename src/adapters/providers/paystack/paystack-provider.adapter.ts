import * as crypto from 'crypto';
import { Logger } from '@nestjs/common';
import axios, { AxiosInstance } from 'axios';
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
  JsonValue,
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
  isJsonObject,
  normalizePaymentStatus,
  roundCurrency,
  validateConfigFields,
  ValidationError,
} from '../../../core';

export const PAYSTACK_PROVIDER_NAME = 'paystack';
export const PAYSTACK_API_BASE_URL = 'https://api.paystack.co';
const PAYSTACK_TIMEOUT_MS = 30000;

/**
 * Charge states that wait on the customer (PIN, OTP, bank page). A direct
 * charge cannot drive them, so they end the attempt.
 */
const CUSTOMER_ACTION_STATES = new Set([
  'send_pin',
  'send_otp',
  'send_phone',
  'send_birthday',
  'send_address',
  'open_url',
  'pay_offline',
]);

/**
 * Local card rate and the NGN fee cap, both in major units
 */
const PAYSTACK_COMMISSION_RATE = 1.5;
const PAYSTACK_NGN_FEE_CAP = 2000;

interface PaystackConfig {
  webhookSecrets: string[];
  http: AxiosInstance;
}

type JsonObject = { [key: string]: JsonValue };

/**
 * Envelope every Paystack API response uses
 */
interface PaystackEnvelope {
  status: boolean;
  message: string;
  data: JsonObject;
  raw: RawProviderResponse;
}

/**
 * Paystack payment provider.
 *
 * Authentication:
 * - API calls: Bearer token using the secret key
 * - Webhook signature: HMAC-SHA512 of the raw body, `x-paystack-signature`
 *
 * Paystack uses the secret key for webhook signatures unless a separate
 * webhookSecret is configured. Amounts cross the wire in minor units (kobo).
 *
 * @see https://paystack.com/docs/payments/webhooks
 * @see https://paystack.com/docs/api/
 */
export class PaystackProviderAdapter implements PaymentProviderAdapter {
  readonly providerName = PAYSTACK_PROVIDER_NAME;
  private readonly logger = new Logger(PaystackProviderAdapter.name);
  private config?: PaystackConfig;

  getRequiredConfig(environment: Environment): ConfigField[] {
    const mode = environment === Environment.PRODUCTION ? 'live' : 'test';
    return [
      {
        key: 'secretKey',
        required: true,
        type: 'string',
        description: 'Secret key from the Paystack dashboard',
        example: `sk_${mode}_xxxxxxxxxxxxxxxx`,
        pattern: '^sk_(test|live)_',
        minLength: 16,
        sensitive: true,
      },
      {
        key: 'publicKey',
        required: false,
        type: 'string',
        description: 'Public key for client-side checkout; stored for reference only',
        example: `pk_${mode}_xxxxxxxxxxxxxxxx`,
        pattern: '^pk_(test|live)_',
      },
      {
        key: 'webhookSecret',
        required: false,
        type: 'string',
        description: 'Webhook signing secret; Paystack signs with the secret key by default',
        sensitive: true,
      },
      {
        key: 'previousSecretKey',
        required: false,
        type: 'string',
        description: 'Secret accepted for webhook signatures during key rotation',
        sensitive: true,
      },
      {
        key: 'baseUrl',
        required: false,
        type: 'url',
        description: 'API base URL',
        example: PAYSTACK_API_BASE_URL,
      },
    ];
  }

  validateConfig(config: ProviderCredentials): void {
    validateConfigFields(this.providerName, config, this.getRequiredConfig(Environment.SANDBOX));
  }

  initialize(config: ProviderCredentials): void {
    const webhookSecrets = [config.webhookSecret || config.secretKey];
    if (config.previousSecretKey) {
      webhookSecrets.push(config.previousSecretKey);
    }

    this.config = {
      webhookSecrets,
      http: axios.create({
        baseURL: (config.baseUrl || PAYSTACK_API_BASE_URL).replace(/\/+$/, ''),
        timeout: PAYSTACK_TIMEOUT_MS,
        responseType: 'text',
        headers: {
          Authorization: `Bearer ${config.secretKey}`,
          'Content-Type': 'application/json',
        },
      }),
    };
  }

  // ==================== Payments ====================

  /**
   * Direct card charge through /charge. Card-less payments go through
   * create3DPayment (hosted checkout).
   */
  async createPayment(request: PaymentRequest, options?: CallOptions): Promise<PaymentResponse> {
    const card = request.cardInfo;
    if (!card) {
      throw new ValidationError('cardInfo is required for direct Paystack charges; use use3D for hosted checkout');
    }

    const envelope = await this.request(
      'POST',
      '/charge',
      {
        email: request.customer.email,
        amount: this.toMinor(request.amount, request.currency),
        currency: request.currency.toUpperCase(),
        reference: request.referenceId || request.id,
        card: {
          number: card.cardNumber.replace(/\s+/g, ''),
          cvv: card.cvv,
          expiry_month: card.expireMonth,
          expiry_year: card.expireYear,
        },
        metadata: this.buildMetadata(request),
      },
      options,
    );

    const chargeStatus = stringField(envelope.data, 'status');
    if (chargeStatus && CUSTOMER_ACTION_STATES.has(chargeStatus)) {
      return {
        success: false,
        status: PaymentStatus.FAILED,
        paymentId: stringField(envelope.data, 'reference') ?? request.referenceId,
        errorCode: 'requires_3d',
        message: `Charge needs customer action (${chargeStatus}); retry with use3D`,
        systemTime: new Date(),
        providerResponse: envelope.raw,
      };
    }

    return this.toPaymentResponse(envelope);
  }

  /**
   * Hosted checkout (transaction/initialize). Paystack runs the 3D Secure
   * challenge on its page and returns the customer to callback_url.
   */
  async create3DPayment(request: PaymentRequest, options?: CallOptions): Promise<PaymentResponse> {
    return this.initializeTransaction(request, options);
  }

  async complete3DPayment(
    state: CallbackState,
    data: Record<string, string>,
    options?: CallOptions,
  ): Promise<PaymentResponse> {
    const reference = data.reference || data.trxref || state.paymentId;
    return this.verify(reference, options);
  }

  async getPaymentStatus(
    request: PaymentStatusRequest,
    options?: CallOptions,
  ): Promise<PaymentResponse> {
    return this.verify(request.paymentId, options);
  }

  /**
   * Paystack has no void; a cancellation is a full refund
   */
  async cancelPayment(request: CancelRequest, options?: CallOptions): Promise<PaymentResponse> {
    const envelope = await this.request(
      'POST',
      '/refund',
      {
        transaction: request.paymentId,
        merchant_note: request.reason ?? request.description,
      },
      options,
    );

    return {
      success: envelope.status,
      status: envelope.status ? PaymentStatus.CANCELLED : PaymentStatus.FAILED,
      paymentId: request.paymentId,
      message: envelope.message,
      systemTime: new Date(),
      providerResponse: envelope.raw,
    };
  }

  async refundPayment(request: RefundRequest, options?: CallOptions): Promise<RefundResponse> {
    const currency = request.currency?.toUpperCase();
    const envelope = await this.request(
      'POST',
      '/refund',
      {
        transaction: request.paymentId,
        amount:
          request.refundAmount !== undefined
            ? this.toMinor(request.refundAmount, currency ?? 'NGN')
            : undefined,
        currency,
        merchant_note: request.reason ?? request.description,
      },
      options,
    );

    const { data } = envelope;
    const refundStatus = stringField(data, 'status');
    const minorAmount = numberField(data, 'amount');
    return {
      success: envelope.status,
      refundId: stringField(data, 'id'),
      paymentId: request.paymentId,
      status: refundStatus === 'processed' ? PaymentStatus.REFUNDED : PaymentStatus.PROCESSING,
      refundAmount: minorAmount !== undefined ? this.fromMinor(minorAmount) : request.refundAmount,
      message: envelope.message,
      systemTime: new Date(),
      rawResponse: envelope.raw,
    };
  }

  // ==================== Inquiries ====================

  /**
   * Paystack does not split payments; the only option is a single charge
   */
  async getInstallmentCount(inquiry: InstallmentInquiry): Promise<InstallmentInfo> {
    const amount = roundCurrency(inquiry.amount);
    return {
      currency: inquiry.currency.toUpperCase(),
      options: [{ installmentCount: 1, installmentAmount: amount, totalAmount: amount }],
    };
  }

  async getCommission(inquiry: CommissionInquiry): Promise<CommissionInfo> {
    const amount = new Money(inquiry.amount, inquiry.currency);
    let commission = amount.percentage(PAYSTACK_COMMISSION_RATE).amount;
    if (amount.currency === 'NGN') {
      commission = Math.min(commission, PAYSTACK_NGN_FEE_CAP);
    }

    return {
      rate: PAYSTACK_COMMISSION_RATE,
      commissionAmount: commission,
      netAmount: roundCurrency(amount.amount - commission),
      currency: amount.currency,
    };
  }

  // ==================== Webhooks ====================

  /**
   * Verify `x-paystack-signature` (HMAC-SHA512 of the raw body). Every
   * configured secret is tried, so a rotated key keeps working.
   */
  async validateWebhook(payload: WebhookPayload): Promise<WebhookValidationResult> {
    const { webhookSecrets } = this.requireConfig();
    const { data, headers, rawBody } = payload;

    const signature = headers['x-paystack-signature'];
    if (!signature) {
      return { valid: false, reason: 'Missing x-paystack-signature header', data };
    }
    if (!rawBody) {
      return { valid: false, reason: 'Raw body is required for signature verification', data };
    }

    const matched = webhookSecrets.some((secret) => {
      const hash = crypto.createHmac('sha512', secret).update(rawBody).digest('hex');
      return this.timingSafeEqual(hash, signature);
    });
    if (!matched) {
      return { valid: false, reason: 'Webhook signature mismatch', data };
    }

    return {
      valid: true,
      paymentId: data['data.reference'] || undefined,
      status: this.mapEventStatus(data.event, data['data.status']),
      data,
    };
  }

  // ==================== Private Helpers ====================

  private async initializeTransaction(
    request: PaymentRequest,
    options?: CallOptions,
  ): Promise<PaymentResponse> {
    const envelope = await this.request(
      'POST',
      '/transaction/initialize',
      {
        email: request.customer.email,
        amount: this.toMinor(request.amount, request.currency),
        currency: request.currency.toUpperCase(),
        reference: request.referenceId || request.id,
        callback_url: request.callbackUrl,
        metadata: this.buildMetadata(request),
      },
      options,
    );

    const { data } = envelope;
    return {
      success: envelope.status,
      status: envelope.status ? PaymentStatus.PENDING : PaymentStatus.FAILED,
      paymentId: stringField(data, 'reference') ?? request.referenceId,
      orderId: stringField(data, 'access_code'),
      amount: request.amount,
      currency: request.currency.toUpperCase(),
      redirectUrl: stringField(data, 'authorization_url'),
      message: envelope.message,
      systemTime: new Date(),
      providerResponse: envelope.raw,
    };
  }

  private async verify(reference: string, options?: CallOptions): Promise<PaymentResponse> {
    const envelope = await this.request(
      'GET',
      `/transaction/verify/${encodeURIComponent(reference)}`,
      undefined,
      options,
    );
    return this.toPaymentResponse(envelope, reference);
  }

  private toPaymentResponse(envelope: PaystackEnvelope, reference?: string): PaymentResponse {
    const { data } = envelope;
    const status = this.mapApiStatus(stringField(data, 'status'));
    const minorAmount = numberField(data, 'amount');
    const failed = status === PaymentStatus.FAILED;

    return {
      success: envelope.status && !failed,
      status,
      paymentId: stringField(data, 'reference') ?? reference,
      transactionId: stringField(data, 'id'),
      amount: minorAmount !== undefined ? this.fromMinor(minorAmount) : undefined,
      currency: stringField(data, 'currency'),
      redirectUrl: stringField(data, 'url'),
      message: stringField(data, 'gateway_response') ?? envelope.message,
      errorCode: failed ? stringField(data, 'status') : undefined,
      systemTime: new Date(),
      providerResponse: envelope.raw,
    };
  }

  /**
   * Paystack statuses: success, failed, abandoned, reversed, pending, ongoing,
   * queued, processing
   */
  private mapApiStatus(status: string | undefined): PaymentStatus {
    return normalizePaymentStatus(status) ?? PaymentStatus.PENDING;
  }

  private mapEventStatus(event: string | undefined, status: string | undefined): PaymentStatus | undefined {
    switch (event) {
      case 'charge.success':
        return PaymentStatus.SUCCESSFUL;
      case 'charge.failed':
        return PaymentStatus.FAILED;
      case 'refund.processed':
        return PaymentStatus.REFUNDED;
      default:
        return normalizePaymentStatus(status);
    }
  }

  private buildMetadata(request: PaymentRequest): Record<string, string> {
    return {
      ...request.metadata,
      ...(request.conversationId ? { conversation_id: request.conversationId } : {}),
      ...(request.tenantId ? { tenant_id: request.tenantId } : {}),
    };
  }

  private async request(
    method: 'GET' | 'POST',
    path: string,
    body: Record<string, unknown> | undefined,
    options?: CallOptions,
  ): Promise<PaystackEnvelope> {
    const { http } = this.requireConfig();

    let text: string;
    try {
      const response = await http.request<string>({
        method,
        url: path,
        data: body,
        signal: options?.signal,
      });
      text = response.data;
    } catch (error) {
      if (axios.isAxiosError<unknown>(error) && error.response) {
        const { status, statusText, data } = error.response;
        const message = typeof data === 'string' ? messageOf(RawProviderResponse.fromBody(data)) : undefined;
        this.logger.warn(`Paystack ${method} ${path} returned ${status}: ${message ?? statusText}`);
        throw new Error(`Paystack API error: ${status} ${message ?? statusText}`);
      }
      throw error;
    }

    const raw = RawProviderResponse.fromBody(text);
    const parsed = raw.kind === 'json' ? raw.value : undefined;
    if (!isJsonObject(parsed)) {
      throw new Error(`Paystack API returned a non-JSON body for ${method} ${path}`);
    }

    return {
      status: parsed.status === true,
      message: messageOf(raw) ?? '',
      data: isJsonObject(parsed.data) ? parsed.data : {},
      raw,
    };
  }

  private toMinor(amount: number, currency: string): number {
    return new Money(amount, currency).toMinorUnits();
  }

  private fromMinor(amount: number): number {
    return roundCurrency(amount / 100);
  }

  private requireConfig(): PaystackConfig {
    if (!this.config) {
      throw new ConfigurationError(
        `${this.providerName}: provider used before initialize`,
        this.providerName,
      );
    }
    return this.config;
  }

  private timingSafeEqual(a: string, b: string): boolean {
    if (a.length !== b.length) {
      return false;
    }
    return crypto.timingSafeEqual(Buffer.from(a), Buffer.from(b));
  }
}

function stringField(data: JsonObject, key: string): string | undefined {
  const value = data[key];
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return undefined;
}

function messageOf(raw: RawProviderResponse): string | undefined {
  const value = raw.kind === 'json' ? raw.value : undefined;
  return isJsonObject(value) && typeof value.message === 'string' ? value.message : undefined;
}

function numberField(data: JsonObject, key: string): number | undefined {
  const value = data[key];
  return typeof value === 'number' ? value : undefined;
}

/**
 * Self-registration hook
 */
export function registerPaystackProvider(registry: ProviderRegistry): void {
  registry.register(PAYSTACK_PROVIDER_NAME, () => new PaystackProviderAdapter());
}
