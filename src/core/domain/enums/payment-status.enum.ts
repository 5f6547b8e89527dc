/**
 * Canonical payment states every provider maps its own vocabulary onto
 */
export enum PaymentStatus {
  /**
   * Created but awaiting customer action (e.g. 3D Secure challenge)
   */
  PENDING = 'pending',

  /**
   * Submitted to the processor and awaiting a result
   */
  PROCESSING = 'processing',

  /**
   * Captured successfully
   */
  SUCCESSFUL = 'successful',

  FAILED = 'failed',

  CANCELLED = 'cancelled',

  /**
   * Reached through a separate refund operation on a successful payment
   */
  REFUNDED = 'refunded',
}

const TRANSIENT_STATUSES: ReadonlySet<PaymentStatus> = new Set([
  PaymentStatus.PENDING,
  PaymentStatus.PROCESSING,
]);

/**
 * Terminal for the operation that produced it. A successful payment can still
 * move to refunded through a refund call.
 */
export function isTerminalStatus(status: PaymentStatus): boolean {
  return !TRANSIENT_STATUSES.has(status);
}

const STATUS_ALIASES: Record<string, PaymentStatus> = {
  success: PaymentStatus.SUCCESSFUL,
  successful: PaymentStatus.SUCCESSFUL,
  succeeded: PaymentStatus.SUCCESSFUL,
  completed: PaymentStatus.SUCCESSFUL,
  approved: PaymentStatus.SUCCESSFUL,
  paid: PaymentStatus.SUCCESSFUL,
  failed: PaymentStatus.FAILED,
  failure: PaymentStatus.FAILED,
  declined: PaymentStatus.FAILED,
  error: PaymentStatus.FAILED,
  abandoned: PaymentStatus.FAILED,
  cancelled: PaymentStatus.CANCELLED,
  canceled: PaymentStatus.CANCELLED,
  voided: PaymentStatus.CANCELLED,
  reversed: PaymentStatus.CANCELLED,
  refunded: PaymentStatus.REFUNDED,
  processing: PaymentStatus.PROCESSING,
  ongoing: PaymentStatus.PROCESSING,
  queued: PaymentStatus.PROCESSING,
  pending: PaymentStatus.PENDING,
  waiting: PaymentStatus.PENDING,
};

/**
 * Map a processor status string onto the canonical set.
 * Returns undefined for vocabulary we do not recognise.
 */
export function normalizePaymentStatus(
  raw: string | undefined | null,
): PaymentStatus | undefined {
  if (!raw) {
    return undefined;
  }
  return STATUS_ALIASES[raw.trim().toLowerCase()];
}
