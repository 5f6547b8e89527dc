/**
 * Gateway NestJS Module
 *
 * Main module for mounting the payment gateway in NestJS applications
 */

// Main module
export { GatewayModule } from './gateway.module';

// Configuration
export type { GatewayModuleConfig, GatewayModuleAsyncConfig } from './gateway.config';
export { defaultGatewayConfig, mergeGatewayConfig } from './gateway.config';
export * from './constants';

// Controllers
export * from './controllers';

// Services
export * from './services';

// Decorators
export * from './decorators';

// Interceptors and filters
export * from './interceptors';
export * from './filters';

// Guards
export * from './middleware';
