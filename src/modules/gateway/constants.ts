/**
 * Injection tokens for the gateway module
 */

export const GATEWAY_CONFIG = Symbol('GATEWAY_CONFIG');
export const GATEWAY_DATA_SOURCE = Symbol('GATEWAY_DATA_SOURCE');
export const PROVIDER_REGISTRY = Symbol('PROVIDER_REGISTRY');
export const CONFIGURATION_STORE = Symbol('CONFIGURATION_STORE');
export const PAYMENT_LEDGER = Symbol('PAYMENT_LEDGER');
export const EVENT_DISPATCHER = Symbol('EVENT_DISPATCHER');
export const TENANT_PROVIDER_CACHE = Symbol('TENANT_PROVIDER_CACHE');
export const CALLBACK_STATE_CODEC = Symbol('CALLBACK_STATE_CODEC');
export const PAYMENT_ORCHESTRATION = Symbol('PAYMENT_ORCHESTRATION');
export const WEBHOOK_TASK_RUNNER = Symbol('WEBHOOK_TASK_RUNNER');
export const WEBHOOK_PIPELINE = Symbol('WEBHOOK_PIPELINE');
export const TENANT_RATE_LIMITER = Symbol('TENANT_RATE_LIMITER');

/**
 * Metadata key read by GatewayRateLimitGuard
 */
export const RATE_LIMIT_ACTION_KEY = 'gateway:rate-limit-action';

export const TENANT_HEADER = 'x-tenant-id';
