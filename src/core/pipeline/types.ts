import { Environment } from '../domain/enums';
import { PaymentResponse } from '../domain/models';
import { WebhookValidationResult } from '../interfaces';

/**
 * Webhook as received by the HTTP layer
 */
export interface InboundWebhook {
  tenantId: string;
  environment: Environment;
  headers: Record<string, string | string[] | undefined>;
  /**
   * Parsed object, raw Buffer or string; the parse stage copes with all three
   */
  body: unknown;
  rawBody?: Buffer;
  contentType?: string;
}

/**
 * Context passed through the pipeline stages
 */
export interface WebhookContext {
  // Input
  provider: string;
  tenantId: string;
  environment: Environment;
  headers: Record<string, string>;
  body: unknown;
  rawBody?: Buffer;
  contentType?: string;

  // Processing metadata
  processingId: string;
  receivedAt: Date;

  // Parse stage
  data?: Record<string, string>;

  // Validation stage
  validation?: WebhookValidationResult;
  rejectionReason?: string;

  // Async verification
  verifiedStatus?: PaymentResponse;
  outcomeApplied?: boolean;

  metadata: Record<string, string>;
}

export interface StageResult {
  success: boolean;
  context: WebhookContext;
  error?: Error;
  shouldContinue: boolean;
  metadata?: Record<string, string | number | boolean>;
}

export interface PipelineStage {
  name: string;
  execute(context: WebhookContext, signal?: AbortSignal): Promise<StageResult>;
}

/**
 * What the HTTP layer answers the sender with
 */
export interface WebhookIngestResult {
  accepted: boolean;
  statusCode: 200 | 400;
  processingId: string;
  paymentId?: string;
  message?: string;
  /**
   * Id of the submitted async verification task
   */
  taskId?: string;
}

export class PipelineError extends Error {
  constructor(
    message: string,
    public stage: string,
    public context: WebhookContext,
    public cause?: Error,
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}

export class TaskTimeoutError extends Error {
  constructor(
    public taskId: string,
    public timeoutMs: number,
  ) {
    super(`Webhook task ${taskId} timed out after ${timeoutMs}ms`);
    this.name = 'TaskTimeoutError';
  }
}
