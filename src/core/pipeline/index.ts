/**
 * Webhook ingestion pipeline
 *
 * Synchronous: parse -> validation (answer 200/400)
 * Asynchronous task: status verification -> outcome
 */

export { WebhookPipeline } from './webhook-pipeline';
export type { WebhookPipelineConfig } from './webhook-pipeline';
export { WebhookTaskRunner } from './webhook-task-runner';
export type { WebhookTaskRunnerOptions } from './webhook-task-runner';

export * from './types';

export { ParseStage } from './stages/parse.stage';
export { ValidationStage } from './stages/validation.stage';
export { StatusVerificationStage } from './stages/status-verification.stage';
export { OutcomeStage } from './stages/outcome.stage';
