import { PaymentOutcome, RecordOutcomeDto } from '../domain/models';

export interface RecordOutcomeResult {
  /**
   * False when the same (tenant, provider, payment, status) was already recorded
   */
  applied: boolean;
  outcome: PaymentOutcome;
}

/**
 * Sink for terminal payment outcomes observed through webhooks.
 * recordOutcome MUST be an upsert so duplicate deliveries are harmless.
 */
export interface PaymentLedger {
  recordOutcome(dto: RecordOutcomeDto): Promise<RecordOutcomeResult>;

  findOutcomes(query: {
    tenantId: string;
    providerName?: string;
    paymentId?: string;
  }): Promise<PaymentOutcome[]>;

  isHealthy(): Promise<boolean>;
}
