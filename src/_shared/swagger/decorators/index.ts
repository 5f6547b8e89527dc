/**
 * Centralized Swagger decorators for the gateway API
 *
 * These decorators provide consistent API documentation across all controllers
 * while keeping the controllers clean and focused on business logic.
 */

export * from './health.decorators';
export * from './provider-config.decorators';
