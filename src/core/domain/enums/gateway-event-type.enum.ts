/**
 * Events emitted once a webhook-driven outcome has been recorded
 */
export enum GatewayEventType {
  PAYMENT_SUCCEEDED = 'payment.succeeded',
  PAYMENT_FAILED = 'payment.failed',
  PAYMENT_REFUNDED = 'payment.refunded',
  WEBHOOK_REJECTED = 'webhook.rejected',
  WEBHOOK_TASK_FAILED = 'webhook.task_failed',
}
