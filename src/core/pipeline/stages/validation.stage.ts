import { PipelineStage, StageResult, WebhookContext } from '../types';
import { PaymentOrchestrationService } from '../../services';

/**
 * Stage 2: Validation
 * Verifies the sender signature through the tenant's provider instance.
 * Anything short of a valid signature with a payment reference stops here.
 */
export class ValidationStage implements PipelineStage {
  name = 'validation';

  constructor(private readonly orchestration: PaymentOrchestrationService) {}

  async execute(context: WebhookContext): Promise<StageResult> {
    try {
      const result = await this.orchestration.validateWebhook(
        {
          tenantId: context.tenantId,
          providerName: context.provider,
          environment: context.environment,
        },
        {
          data: context.data ?? {},
          headers: context.headers,
          rawBody: context.rawBody,
        },
      );
      context.validation = result;

      if (!result.valid) {
        return this.reject(context, result.reason ?? 'Webhook signature is invalid');
      }
      if (!result.paymentId) {
        return this.reject(context, 'Webhook carries no payment reference');
      }

      context.metadata.paymentId = result.paymentId;
      return {
        success: true,
        context,
        shouldContinue: true,
      };
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      return this.reject(context, err.message, err);
    }
  }

  private reject(context: WebhookContext, reason: string, error?: Error): StageResult {
    context.rejectionReason = reason;
    return {
      success: false,
      context,
      error,
      shouldContinue: false,
    };
  }
}
