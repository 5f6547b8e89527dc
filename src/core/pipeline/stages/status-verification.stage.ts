import { PipelineStage, StageResult, WebhookContext } from '../types';
import { PaymentOrchestrationService } from '../../services';

/**
 * Stage 3 (async): Status verification
 * The webhook body is a claim; the processor's status API is the truth
 */
export class StatusVerificationStage implements PipelineStage {
  name = 'status-verification';

  constructor(private readonly orchestration: PaymentOrchestrationService) {}

  async execute(context: WebhookContext, signal?: AbortSignal): Promise<StageResult> {
    const paymentId = context.validation?.paymentId;
    if (!paymentId) {
      return {
        success: false,
        context,
        error: new Error('No validated payment reference to verify'),
        shouldContinue: false,
      };
    }

    const response = await this.orchestration.getPaymentStatus(
      {
        tenantId: context.tenantId,
        providerName: context.provider,
        environment: context.environment,
        signal,
      },
      { paymentId },
    );
    context.verifiedStatus = response;

    return {
      success: true,
      context,
      shouldContinue: true,
      metadata: { status: response.status },
    };
  }
}
