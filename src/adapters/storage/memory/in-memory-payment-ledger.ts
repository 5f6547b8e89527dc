import { v4 as uuidv4 } from 'uuid';
import {
  PaymentLedger,
  PaymentOutcome,
  RecordOutcomeDto,
  RecordOutcomeResult,
  normalizeProviderName,
  normalizeTenantId,
  outcomeKey,
} from '../../../core';

/**
 * In-memory payment ledger keyed by (tenant, provider, payment, status)
 */
export class InMemoryPaymentLedger implements PaymentLedger {
  private readonly outcomes = new Map<string, PaymentOutcome>();

  async recordOutcome(dto: RecordOutcomeDto): Promise<RecordOutcomeResult> {
    const candidate: PaymentOutcome = {
      ...dto,
      tenantId: normalizeTenantId(dto.tenantId),
      providerName: normalizeProviderName(dto.providerName),
      id: uuidv4(),
      recordedAt: new Date(),
    };

    const key = outcomeKey(candidate);
    const existing = this.outcomes.get(key);
    if (existing) {
      return { applied: false, outcome: { ...existing } };
    }

    this.outcomes.set(key, candidate);
    return { applied: true, outcome: { ...candidate } };
  }

  async findOutcomes(query: {
    tenantId: string;
    providerName?: string;
    paymentId?: string;
  }): Promise<PaymentOutcome[]> {
    const tenantId = normalizeTenantId(query.tenantId);
    const providerName = query.providerName ? normalizeProviderName(query.providerName) : undefined;

    return [...this.outcomes.values()]
      .filter(
        (outcome) =>
          outcome.tenantId === tenantId &&
          (!providerName || outcome.providerName === providerName) &&
          (!query.paymentId || outcome.paymentId === query.paymentId),
      )
      .map((outcome) => ({ ...outcome }));
  }

  async isHealthy(): Promise<boolean> {
    return true;
  }

  get size(): number {
    return this.outcomes.size;
  }

  clear(): void {
    this.outcomes.clear();
  }
}
