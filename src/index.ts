/**
 * Tenant Paygate - Multi-tenant payment gateway core
 *
 * Routes canonical payment operations to per-tenant processor instances,
 * correlates 3D Secure callbacks, ingests webhooks and rate-limits tenants.
 */

// Export all core components
export * from './core';

// Export adapters: shipped provider plugins and storage
export * from './adapters';

// Export NestJS module, controllers, guards and decorators
export * from './modules';

// Export DTOs and Swagger decorators
export * from './_shared';

// Export testing utilities
export * from './testing';
