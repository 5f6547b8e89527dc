import {
  CallbackState,
  CancelRequest,
  CommissionInfo,
  CommissionInquiry,
  ConfigField,
  InstallmentInfo,
  InstallmentInquiry,
  PaymentRequest,
  PaymentResponse,
  PaymentStatusRequest,
  ProviderCredentials,
  RefundRequest,
  RefundResponse,
} from '../domain/models';
import { Environment, PaymentStatus } from '../domain/enums';

/**
 * Per-call options threaded through every network-bound plugin operation
 */
export interface CallOptions {
  /**
   * Aborts local waiting only. A charge already submitted to the processor
   * may still complete.
   */
  signal?: AbortSignal;
}

/**
 * Inbound webhook as handed to a plugin
 */
export interface WebhookPayload {
  /**
   * Body flattened to a string map (JSON or form-encoded)
   */
  data: Record<string, string>;
  /**
   * Lower-cased header names
   */
  headers: Record<string, string>;
  rawBody?: Buffer;
}

export interface WebhookValidationResult {
  valid: boolean;
  paymentId?: string;
  /**
   * Status the sender claims; informational only, the pipeline re-queries
   */
  status?: PaymentStatus;
  reason?: string;
  data: Record<string, string>;
}

/**
 * Capability contract every payment processor plugin implements.
 *
 * Each plugin owns its wire format, signing scheme, and the mapping from its
 * own status codes onto PaymentStatus. Instances are tenant-scoped: one per
 * (tenant, provider, environment), built and initialized by the tenant cache.
 */
export interface PaymentProviderAdapter {
  /**
   * Registry name, e.g. 'paystack'
   */
  readonly providerName: string;

  // ==================== Configuration ====================

  /**
   * Keys this provider needs in the given environment
   */
  getRequiredConfig(environment: Environment): ConfigField[];

  /**
   * Reject missing or malformed credentials before any network call.
   * @throws ConfigurationError
   */
  validateConfig(config: ProviderCredentials): void;

  /**
   * Convert the validated credential map into the plugin's typed config and
   * select base URLs. Called once per instance, after validateConfig.
   */
  initialize(config: ProviderCredentials): void;

  // ==================== Payments ====================

  createPayment(request: PaymentRequest, options?: CallOptions): Promise<PaymentResponse>;

  /**
   * Start a 3D Secure flow. The response carries a redirect URL or challenge
   * HTML and a pending status.
   */
  create3DPayment(request: PaymentRequest, options?: CallOptions): Promise<PaymentResponse>;

  /**
   * Finish a 3D flow with the decoded callback state and the merged callback
   * payload the processor sent back.
   */
  complete3DPayment(
    state: CallbackState,
    data: Record<string, string>,
    options?: CallOptions,
  ): Promise<PaymentResponse>;

  getPaymentStatus(request: PaymentStatusRequest, options?: CallOptions): Promise<PaymentResponse>;

  cancelPayment(request: CancelRequest, options?: CallOptions): Promise<PaymentResponse>;

  refundPayment(request: RefundRequest, options?: CallOptions): Promise<RefundResponse>;

  // ==================== Inquiries ====================

  getInstallmentCount(inquiry: InstallmentInquiry, options?: CallOptions): Promise<InstallmentInfo>;

  getCommission(inquiry: CommissionInquiry, options?: CallOptions): Promise<CommissionInfo>;

  // ==================== Webhooks ====================

  /**
   * Verify the sender's signature and extract the payment reference.
   * Returns valid=false for a bad signature; throws only for payloads that
   * cannot be interpreted at all.
   */
  validateWebhook(payload: WebhookPayload, options?: CallOptions): Promise<WebhookValidationResult>;
}

/**
 * Zero-argument constructor registered per provider name
 */
export type ProviderFactory = () => PaymentProviderAdapter;
