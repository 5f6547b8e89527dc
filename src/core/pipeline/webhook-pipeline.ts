import { Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import {
  InboundWebhook,
  PipelineError,
  PipelineStage,
  WebhookContext,
  WebhookIngestResult,
} from './types';
import { ParseStage } from './stages/parse.stage';
import { ValidationStage } from './stages/validation.stage';
import { StatusVerificationStage } from './stages/status-verification.stage';
import { OutcomeStage } from './stages/outcome.stage';
import { WebhookTaskRunner } from './webhook-task-runner';
import { PaymentOrchestrationService } from '../services';
import { EventDispatcher, PaymentLedger } from '../interfaces';
import { GatewayEventType } from '../domain/enums';
import { normalizeTenantId } from '../cache';
import { normalizeProviderName } from '../registry';
import { normalizeHeaders } from '../utils';

export interface WebhookPipelineConfig {
  orchestration: PaymentOrchestrationService;
  ledger: PaymentLedger;
  taskRunner: WebhookTaskRunner;
  eventDispatcher?: EventDispatcher;
}

/**
 * Webhook ingestion.
 *
 * Synchronous part (parse, validation) decides the HTTP answer: 400 and no
 * further work for anything that fails, 200 as soon as the signature checks
 * out. The asynchronous part (status verification, outcome) runs as a
 * supervised task under its own deadline.
 */
export class WebhookPipeline {
  private readonly logger = new Logger(WebhookPipeline.name);
  private readonly syncStages: PipelineStage[];
  private readonly asyncStages: PipelineStage[];

  constructor(private readonly config: WebhookPipelineConfig) {
    this.syncStages = [new ParseStage(), new ValidationStage(config.orchestration)];
    this.asyncStages = [
      new StatusVerificationStage(config.orchestration),
      new OutcomeStage(config.ledger, config.eventDispatcher),
    ];
  }

  async ingest(provider: string, inbound: InboundWebhook): Promise<WebhookIngestResult> {
    const context: WebhookContext = {
      provider: normalizeProviderName(provider),
      tenantId: normalizeTenantId(inbound.tenantId),
      environment: inbound.environment,
      headers: normalizeHeaders(inbound.headers),
      body: inbound.body,
      rawBody: inbound.rawBody,
      contentType: inbound.contentType,
      processingId: uuidv4(),
      receivedAt: new Date(),
      metadata: {},
    };

    for (const stage of this.syncStages) {
      const result = await stage.execute(context);
      if (!result.shouldContinue) {
        return this.rejected(context, stage.name, result.error);
      }
    }

    const paymentId = context.validation?.paymentId;
    const taskId = this.config.taskRunner.submit(
      `${context.tenantId}_${context.provider}:${paymentId}`,
      (signal) => this.verify(context, signal),
    );

    this.logger.log(
      `Accepted ${context.provider} webhook for tenant ${context.tenantId}, payment ${paymentId}`,
    );

    return {
      accepted: true,
      statusCode: 200,
      processingId: context.processingId,
      paymentId,
      taskId,
    };
  }

  /**
   * Asynchronous stages; runs inside the task runner
   */
  async verify(context: WebhookContext, signal: AbortSignal): Promise<void> {
    for (const stage of this.asyncStages) {
      if (signal.aborted) {
        throw new PipelineError(`Aborted before stage '${stage.name}'`, stage.name, context);
      }

      let result;
      try {
        result = await stage.execute(context, signal);
      } catch (error) {
        await this.reportTaskFailure(context, error);
        throw new PipelineError(
          `Stage '${stage.name}' failed: ${error instanceof Error ? error.message : String(error)}`,
          stage.name,
          context,
          error instanceof Error ? error : undefined,
        );
      }

      if (!result.success && result.error) {
        await this.reportTaskFailure(context, result.error);
        throw new PipelineError(result.error.message, stage.name, context, result.error);
      }
      if (!result.shouldContinue) {
        return;
      }
    }
  }

  getStatistics(): {
    syncStages: string[];
    asyncStages: string[];
    tasks: ReturnType<WebhookTaskRunner['getStatistics']>;
  } {
    return {
      syncStages: this.syncStages.map((s) => s.name),
      asyncStages: this.asyncStages.map((s) => s.name),
      tasks: this.config.taskRunner.getStatistics(),
    };
  }

  private async rejected(
    context: WebhookContext,
    stageName: string,
    error?: Error,
  ): Promise<WebhookIngestResult> {
    const message = context.rejectionReason ?? error?.message ?? 'Webhook rejected';
    this.logger.warn(
      `Rejected ${context.provider} webhook for tenant ${context.tenantId} at ${stageName}: ${message}`,
    );

    await this.config.eventDispatcher?.dispatch({
      eventType: GatewayEventType.WEBHOOK_REJECTED,
      tenantId: context.tenantId,
      providerName: context.provider,
      timestamp: new Date(),
      message,
      metadata: { stage: stageName, processingId: context.processingId },
    });

    return {
      accepted: false,
      statusCode: 400,
      processingId: context.processingId,
      message,
    };
  }

  private async reportTaskFailure(context: WebhookContext, error: unknown): Promise<void> {
    await this.config.eventDispatcher?.dispatch({
      eventType: GatewayEventType.WEBHOOK_TASK_FAILED,
      tenantId: context.tenantId,
      providerName: context.provider,
      paymentId: context.validation?.paymentId,
      timestamp: new Date(),
      message: error instanceof Error ? error.message : String(error),
      metadata: { processingId: context.processingId },
    });
  }
}
