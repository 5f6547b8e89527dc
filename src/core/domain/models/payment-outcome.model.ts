import { PaymentStatus } from '../enums';

/**
 * Terminal side effect recorded by the webhook pipeline.
 * Unique per (tenantId, providerName, paymentId, status).
 */
export interface PaymentOutcome {
  id: string;
  tenantId: string;
  providerName: string;
  paymentId: string;
  status: PaymentStatus;
  transactionId?: string;
  amount?: number;
  currency?: string;
  message?: string;
  recordedAt: Date;
}

export type RecordOutcomeDto = Omit<PaymentOutcome, 'id' | 'recordedAt'>;

export function outcomeKey(
  outcome: Pick<PaymentOutcome, 'tenantId' | 'providerName' | 'paymentId' | 'status'>,
): string {
  return `${outcome.tenantId}:${outcome.providerName}:${outcome.paymentId}:${outcome.status}`;
}
