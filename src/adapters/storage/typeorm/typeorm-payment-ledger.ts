import { DataSource, QueryFailedError, Repository } from 'typeorm';
import {
  PaymentLedger,
  PaymentOutcome,
  PaymentStatus,
  RecordOutcomeDto,
  RecordOutcomeResult,
  normalizePaymentStatus,
  normalizeProviderName,
  normalizeTenantId,
} from '../../../core';
import { PaymentOutcomeEntity } from './entities';

/**
 * TypeORM implementation of PaymentLedger.
 * The unique (tenant, provider, payment, status) index turns concurrent
 * duplicate inserts into a single row.
 */
export class TypeORMPaymentLedger implements PaymentLedger {
  private outcomeRepo: Repository<PaymentOutcomeEntity>;

  constructor(private readonly dataSource: DataSource) {
    this.outcomeRepo = dataSource.getRepository(PaymentOutcomeEntity);
  }

  async recordOutcome(dto: RecordOutcomeDto): Promise<RecordOutcomeResult> {
    const key = {
      tenantId: normalizeTenantId(dto.tenantId),
      providerName: normalizeProviderName(dto.providerName),
      paymentId: dto.paymentId,
      status: dto.status,
    };

    const existing = await this.outcomeRepo.findOne({ where: key });
    if (existing) {
      return { applied: false, outcome: this.mapOutcomeEntityToDomain(existing) };
    }

    try {
      const saved = await this.outcomeRepo.save(
        this.outcomeRepo.create({
          ...key,
          transactionId: dto.transactionId ?? null,
          amount: dto.amount ?? null,
          currency: dto.currency ?? null,
          message: dto.message ?? null,
        }),
      );
      return { applied: true, outcome: this.mapOutcomeEntityToDomain(saved) };
    } catch (error) {
      if (error instanceof QueryFailedError) {
        // Lost the race to a concurrent delivery of the same outcome
        const winner = await this.outcomeRepo.findOne({ where: key });
        if (winner) {
          return { applied: false, outcome: this.mapOutcomeEntityToDomain(winner) };
        }
      }
      throw error;
    }
  }

  async findOutcomes(query: {
    tenantId: string;
    providerName?: string;
    paymentId?: string;
  }): Promise<PaymentOutcome[]> {
    const rows = await this.outcomeRepo.find({
      where: {
        tenantId: normalizeTenantId(query.tenantId),
        ...(query.providerName ? { providerName: normalizeProviderName(query.providerName) } : {}),
        ...(query.paymentId ? { paymentId: query.paymentId } : {}),
      },
      order: { recordedAt: 'ASC' },
    });
    return rows.map((row) => this.mapOutcomeEntityToDomain(row));
  }

  async isHealthy(): Promise<boolean> {
    try {
      await this.dataSource.query('SELECT 1');
      return true;
    } catch {
      return false;
    }
  }

  private mapOutcomeEntityToDomain(entity: PaymentOutcomeEntity): PaymentOutcome {
    return {
      id: entity.id,
      tenantId: entity.tenantId,
      providerName: entity.providerName,
      paymentId: entity.paymentId,
      status: normalizePaymentStatus(entity.status) ?? PaymentStatus.PENDING,
      transactionId: entity.transactionId ?? undefined,
      amount: entity.amount ?? undefined,
      currency: entity.currency ?? undefined,
      message: entity.message ?? undefined,
      recordedAt: entity.recordedAt,
    };
  }
}
