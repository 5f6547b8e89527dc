import { PaymentOperation, isReadOnlyOperation } from '../domain/enums';

/**
 * Missing or invalid provider credentials. Raised at config-write time and
 * when a cached provider cannot be built from stored configuration.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public providerName: string,
    public field?: string,
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class ProviderNotRegisteredError extends Error {
  constructor(public providerName: string) {
    super(`payment provider '${providerName}' is not registered`);
    this.name = 'ProviderNotRegisteredError';
  }
}

/**
 * Third-party call failed or timed out.
 * Only read-only inquiries are marked retryable; payment creation, cancel and
 * refund must never be retried here.
 */
export class UpstreamError extends Error {
  readonly retryable: boolean;

  constructor(
    message: string,
    public providerName: string,
    public operation: PaymentOperation,
    public cause?: Error,
    public timedOut = false,
  ) {
    super(message);
    this.name = 'UpstreamError';
    this.retryable = isReadOnlyOperation(operation);
  }
}

/**
 * Malformed canonical request
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public errors: string[] = [message],
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Webhook or callback integrity failure
 */
export class SignatureError extends Error {
  constructor(
    message: string,
    public providerName: string,
  ) {
    super(message);
    this.name = 'SignatureError';
  }
}

export type StateRejectionReason = 'expired' | 'tampered' | 'consumed' | 'malformed';

/**
 * Callback state token that can no longer be trusted
 */
export class StateExpiredError extends Error {
  constructor(
    message: string,
    public reason: StateRejectionReason,
  ) {
    super(message);
    this.name = 'StateExpiredError';
  }
}

/**
 * Errors that originate from the caller or configuration rather than the
 * processor; orchestration lets these through without wrapping.
 */
export function isGatewayDomainError(error: unknown): boolean {
  return (
    error instanceof ConfigurationError ||
    error instanceof ProviderNotRegisteredError ||
    error instanceof ValidationError ||
    error instanceof SignatureError ||
    error instanceof StateExpiredError ||
    error instanceof UpstreamError
  );
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
