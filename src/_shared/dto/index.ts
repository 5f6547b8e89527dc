/**
 * DTOs for the gateway HTTP surface
 *
 * Input validation and Swagger documentation for all API endpoints.
 */

export * from './payment.dto';
export * from './provider-config.dto';
