import { Logger } from '@nestjs/common';
import { PipelineStage, StageResult, WebhookContext } from '../types';
import { GatewayEventType, PaymentStatus } from '../../domain/enums';
import { EventDispatcher, PaymentLedger } from '../../interfaces';
import { PaymentResponse } from '../../domain/models';

/**
 * Stage 4 (async): Outcome
 * Branches on the verified status and records the terminal side effect.
 * The ledger upsert makes a repeated (paymentId, status) a no-op, and events
 * only go out when the upsert actually applied.
 */
export class OutcomeStage implements PipelineStage {
  name = 'outcome';
  private readonly logger = new Logger(OutcomeStage.name);

  constructor(
    private readonly ledger: PaymentLedger,
    private readonly eventDispatcher?: EventDispatcher,
  ) {}

  async execute(context: WebhookContext): Promise<StageResult> {
    const verified = context.verifiedStatus;
    const paymentId = context.validation?.paymentId;
    if (!verified || !paymentId) {
      return {
        success: false,
        context,
        error: new Error('Outcome stage reached without a verified status'),
        shouldContinue: false,
      };
    }

    switch (verified.status) {
      case PaymentStatus.SUCCESSFUL:
        return this.record(context, paymentId, verified, GatewayEventType.PAYMENT_SUCCEEDED);
      case PaymentStatus.FAILED:
      case PaymentStatus.CANCELLED:
        return this.record(context, paymentId, verified, GatewayEventType.PAYMENT_FAILED);
      case PaymentStatus.REFUNDED:
        return this.record(context, paymentId, verified, GatewayEventType.PAYMENT_REFUNDED);
      default:
        this.logger.log(
          `Payment ${paymentId} for tenant ${context.tenantId} still ${verified.status}; nothing recorded`,
        );
        context.outcomeApplied = false;
        return {
          success: true,
          context,
          shouldContinue: false,
          metadata: { transient: true },
        };
    }
  }

  private async record(
    context: WebhookContext,
    paymentId: string,
    verified: PaymentResponse,
    eventType: GatewayEventType,
  ): Promise<StageResult> {
    const { applied } = await this.ledger.recordOutcome({
      tenantId: context.tenantId,
      providerName: context.provider,
      paymentId,
      status: verified.status,
      transactionId: verified.transactionId,
      amount: verified.amount,
      currency: verified.currency,
      message: verified.message,
    });
    context.outcomeApplied = applied;

    if (!applied) {
      this.logger.debug(`Duplicate ${verified.status} outcome for payment ${paymentId} ignored`);
      return {
        success: true,
        context,
        shouldContinue: false,
        metadata: { duplicate: true },
      };
    }

    await this.eventDispatcher?.dispatch({
      eventType,
      tenantId: context.tenantId,
      providerName: context.provider,
      paymentId,
      status: verified.status,
      timestamp: new Date(),
      message: verified.message,
      metadata: { processingId: context.processingId },
    });

    return {
      success: true,
      context,
      shouldContinue: true,
      metadata: { applied: true },
    };
  }
}
