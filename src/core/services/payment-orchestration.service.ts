import { Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import {
  CallbackState,
  CancelRequest,
  CommissionInfo,
  CommissionInquiry,
  InstallmentInfo,
  InstallmentInquiry,
  PaymentRequest,
  PaymentResponse,
  PaymentStatusRequest,
  RefundRequest,
  RefundResponse,
  validatePaymentRequest,
  validateRefundRequest,
} from '../domain/models';
import { Money } from '../domain/value-objects/money.vo';
import { Environment, PaymentOperation, isReadOnlyOperation } from '../domain/enums';
import {
  CallOptions,
  PaymentProviderAdapter,
  WebhookPayload,
  WebhookValidationResult,
} from '../interfaces';
import { TenantProviderCache, normalizeTenantId, qualifyProviderName } from '../cache';
import { CallbackStateCodec } from '../callback';
import { normalizeProviderName } from '../registry';
import { UpstreamError, ValidationError, isGatewayDomainError, toError } from '../errors';

/**
 * Who is calling and against which provider credentials
 */
export interface OrchestrationContext {
  tenantId: string;
  providerName: string;
  environment: Environment;
  /**
   * Caller's cancellation. Stops local waiting only.
   */
  signal?: AbortSignal;
  clientIp?: string;
}

export interface PaymentOrchestrationOptions {
  /**
   * Public base URL of this gateway; 3D callbacks are routed back through it
   */
  publicBaseUrl: string;
  /**
   * Timeout for payment, 3D, cancel and refund calls. Defaults to 30s.
   */
  paymentTimeoutMs?: number;
  /**
   * Timeout for status, installment, commission and webhook validation calls.
   * Defaults to 10s.
   */
  inquiryTimeoutMs?: number;
  /**
   * Extra attempts for read-only inquiries. Defaults to 1.
   */
  inquiryRetries?: number;
}

/**
 * Resolves a tenant's provider instance and runs one canonical operation
 * against it. Processor failures surface as UpstreamError carrying provider
 * and operation; caller and configuration errors pass through untouched.
 */
export class PaymentOrchestrationService {
  private readonly logger = new Logger(PaymentOrchestrationService.name);
  private readonly publicBaseUrl: string;
  private readonly paymentTimeoutMs: number;
  private readonly inquiryTimeoutMs: number;
  private readonly inquiryRetries: number;

  constructor(
    private readonly cache: TenantProviderCache,
    private readonly callbackCodec: CallbackStateCodec,
    options: PaymentOrchestrationOptions,
  ) {
    this.publicBaseUrl = options.publicBaseUrl.replace(/\/+$/, '');
    this.paymentTimeoutMs = options.paymentTimeoutMs ?? 30000;
    this.inquiryTimeoutMs = options.inquiryTimeoutMs ?? 10000;
    this.inquiryRetries = options.inquiryRetries ?? 1;
  }

  qualifyProviderName(tenantId: string, providerName: string): string {
    return qualifyProviderName(tenantId, providerName);
  }

  /**
   * Create a payment. With use3D the callback URL handed to the processor is
   * replaced by this gateway's callback endpoint carrying a sealed state token,
   * which is also returned as callbackState.
   */
  async createPayment(
    ctx: OrchestrationContext,
    request: PaymentRequest,
  ): Promise<PaymentResponse> {
    validatePaymentRequest(request);
    const tenantId = normalizeTenantId(ctx.tenantId);
    const providerName = normalizeProviderName(ctx.providerName);

    if (!request.use3D) {
      return this.invoke(ctx, PaymentOperation.CREATE_PAYMENT, (provider, options) =>
        provider.createPayment({ ...request, tenantId }, options),
      );
    }

    const reference = request.referenceId || request.id || uuidv4();
    const token = this.callbackCodec.encode({
      paymentId: reference,
      tenantId,
      providerName,
      environment: ctx.environment,
      conversationId: request.conversationId,
      originalCallbackUrl: request.callbackUrl ?? '',
      successUrl: request.successUrl,
      errorUrl: request.errorUrl,
      amount: request.amount,
      currency: request.currency.toUpperCase(),
      clientIp: request.clientIp ?? ctx.clientIp,
    });

    const gatewayCallbackUrl =
      `${this.publicBaseUrl}/callback/${encodeURIComponent(providerName)}` +
      `?state=${encodeURIComponent(token)}`;

    const response = await this.invoke(ctx, PaymentOperation.CREATE_3D_PAYMENT, (provider, options) =>
      provider.create3DPayment(
        { ...request, referenceId: reference, tenantId, callbackUrl: gatewayCallbackUrl },
        options,
      ),
    );

    return { ...response, callbackState: token };
  }

  /**
   * Resume a 3D flow from decoded callback state
   */
  async complete3DPayment(
    state: CallbackState,
    data: Record<string, string>,
    signal?: AbortSignal,
  ): Promise<PaymentResponse> {
    const ctx: OrchestrationContext = {
      tenantId: state.tenantId,
      providerName: state.providerName,
      environment: state.environment,
      signal,
    };
    return this.invoke(ctx, PaymentOperation.COMPLETE_3D_PAYMENT, (provider, options) =>
      provider.complete3DPayment(state, data, options),
    );
  }

  async getPaymentStatus(
    ctx: OrchestrationContext,
    request: PaymentStatusRequest,
  ): Promise<PaymentResponse> {
    requirePaymentId(request.paymentId);
    return this.invoke(ctx, PaymentOperation.GET_PAYMENT_STATUS, (provider, options) =>
      provider.getPaymentStatus(request, options),
    );
  }

  async cancelPayment(ctx: OrchestrationContext, request: CancelRequest): Promise<PaymentResponse> {
    requirePaymentId(request.paymentId);
    return this.invoke(ctx, PaymentOperation.CANCEL_PAYMENT, (provider, options) =>
      provider.cancelPayment(request, options),
    );
  }

  async refundPayment(ctx: OrchestrationContext, request: RefundRequest): Promise<RefundResponse> {
    validateRefundRequest(request);
    return this.invoke(ctx, PaymentOperation.REFUND_PAYMENT, (provider, options) =>
      provider.refundPayment(request, options),
    );
  }

  async getInstallmentCount(
    ctx: OrchestrationContext,
    inquiry: InstallmentInquiry,
  ): Promise<InstallmentInfo> {
    requireAmount(inquiry.amount, inquiry.currency);
    return this.invoke(ctx, PaymentOperation.GET_INSTALLMENT_COUNT, (provider, options) =>
      provider.getInstallmentCount(inquiry, options),
    );
  }

  async getCommission(ctx: OrchestrationContext, inquiry: CommissionInquiry): Promise<CommissionInfo> {
    requireAmount(inquiry.amount, inquiry.currency);
    return this.invoke(ctx, PaymentOperation.GET_COMMISSION, (provider, options) =>
      provider.getCommission(inquiry, options),
    );
  }

  async validateWebhook(
    ctx: OrchestrationContext,
    payload: WebhookPayload,
  ): Promise<WebhookValidationResult> {
    return this.invoke(ctx, PaymentOperation.VALIDATE_WEBHOOK, (provider, options) =>
      provider.validateWebhook(payload, options),
    );
  }

  private async invoke<T>(
    ctx: OrchestrationContext,
    operation: PaymentOperation,
    call: (provider: PaymentProviderAdapter, options: CallOptions) => Promise<T>,
  ): Promise<T> {
    const provider = await this.cache.get(ctx.tenantId, ctx.providerName, ctx.environment);
    const qualifiedName = this.qualifyProviderName(ctx.tenantId, ctx.providerName);

    const readOnly = isReadOnlyOperation(operation);
    const timeoutMs = readOnly || operation === PaymentOperation.VALIDATE_WEBHOOK
      ? this.inquiryTimeoutMs
      : this.paymentTimeoutMs;
    const attempts = readOnly ? 1 + this.inquiryRetries : 1;

    for (let attempt = 1; ; attempt++) {
      try {
        return await this.callWithTimeout(provider, call, timeoutMs, ctx.signal);
      } catch (error) {
        const wrapped = this.wrapError(error, provider.providerName, operation);
        const canRetry =
          wrapped instanceof UpstreamError &&
          wrapped.retryable &&
          attempt < attempts &&
          !ctx.signal?.aborted;

        if (!canRetry) {
          this.logger.error(`${qualifiedName} ${operation} failed: ${wrapped.message}`);
          throw wrapped;
        }
        this.logger.warn(
          `${qualifiedName} ${operation} failed (attempt ${attempt}/${attempts}), retrying: ${wrapped.message}`,
        );
      }
    }
  }

  private async callWithTimeout<T>(
    provider: PaymentProviderAdapter,
    call: (provider: PaymentProviderAdapter, options: CallOptions) => Promise<T>,
    timeoutMs: number,
    callerSignal?: AbortSignal,
  ): Promise<T> {
    const controller = new AbortController();
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onCallerAbort = () => controller.abort();
    if (callerSignal?.aborted) {
      controller.abort();
    } else {
      callerSignal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    const aborted = new Promise<never>((_, reject) => {
      const rejectAborted = () =>
        reject(new AbortedCallError(timedOut ? `timed out after ${timeoutMs}ms` : 'aborted by caller', timedOut));
      if (controller.signal.aborted) {
        rejectAborted();
      } else {
        controller.signal.addEventListener('abort', rejectAborted, { once: true });
      }
    });

    try {
      return await Promise.race([call(provider, { signal: controller.signal }), aborted]);
    } finally {
      clearTimeout(timer);
      callerSignal?.removeEventListener('abort', onCallerAbort);
    }
  }

  private wrapError(error: unknown, providerName: string, operation: PaymentOperation): Error {
    if (isGatewayDomainError(error)) {
      return toError(error);
    }
    const cause = toError(error);
    return new UpstreamError(
      `${providerName}: ${operation} failed: ${cause.message}`,
      providerName,
      operation,
      cause,
      cause instanceof AbortedCallError && cause.timedOut,
    );
  }
}

class AbortedCallError extends Error {
  constructor(
    message: string,
    public timedOut: boolean,
  ) {
    super(message);
    this.name = 'AbortedCallError';
  }
}

function requirePaymentId(paymentId: string | undefined): void {
  if (!paymentId?.trim()) {
    throw new ValidationError('paymentId is required');
  }
}

function requireAmount(amount: number, currency: string): void {
  const errors: string[] = [];
  if (!Number.isFinite(amount) || amount <= 0) {
    errors.push('amount must be greater than 0');
  }
  if (!Money.isValidCurrency(currency)) {
    errors.push('currency must be a 3-letter ISO 4217 code');
  }
  if (errors.length > 0) {
    throw new ValidationError(errors.join('; '), errors);
  }
}
