/**
 * Action classes the tenant rate limiter keeps separate buckets for
 */
export enum RateLimitAction {
  GLOBAL = 'global',
  PAYMENT = 'payment',
  REFUND = 'refund',
  STATUS = 'status',
  AUTH = 'auth',
  CONFIG = 'config',
  CALLBACK = 'callback',
  WEBHOOK = 'webhook',
}
