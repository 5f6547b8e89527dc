import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiResponse } from '@nestjs/swagger';

/**
 * Swagger decorator for basic health check
 */
export const ApiHealthCheck = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Basic health check',
      description: 'Returns service health status and uptime',
    }),
    ApiResponse({
      status: 200,
      description: 'Service is healthy',
      schema: {
        type: 'object',
        properties: {
          status: { type: 'string', example: 'healthy' },
          timestamp: { type: 'string', format: 'date-time' },
          uptime: { type: 'number', description: 'Uptime in seconds' },
        },
      },
    }),
  );
};

/**
 * Swagger decorator for readiness check
 */
export const ApiReadinessCheck = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Readiness check with dependency status',
      description: 'Checks the configuration store and payment ledger',
    }),
    ApiResponse({
      status: 200,
      description: 'Service readiness status',
      schema: {
        type: 'object',
        properties: {
          status: {
            type: 'string',
            enum: ['ready', 'not_ready'],
            example: 'ready',
          },
          checks: {
            type: 'object',
            properties: {
              configurationStore: { type: 'boolean', example: true },
              ledger: { type: 'boolean', example: true },
            },
          },
        },
      },
    }),
  );
};

/**
 * Swagger decorator for service statistics
 */
export const ApiServiceStatistics = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Get service statistics',
      description: 'Provider cache, webhook tasks, rate limiter and registered providers',
    }),
    ApiResponse({
      status: 200,
      description: 'Service statistics',
      schema: {
        type: 'object',
        properties: {
          providers: { type: 'array', items: { type: 'string' }, example: ['mock', 'paystack'] },
          cache: {
            type: 'object',
            properties: {
              size: { type: 'number' },
              hits: { type: 'number' },
              misses: { type: 'number' },
              evictions: { type: 'number' },
              ttlExpiries: { type: 'number' },
              rebuilds: { type: 'number' },
              hitRatio: { type: 'number' },
            },
          },
          webhooks: {
            type: 'object',
            properties: {
              syncStages: { type: 'array', items: { type: 'string' } },
              asyncStages: { type: 'array', items: { type: 'string' } },
              tasks: {
                type: 'object',
                properties: {
                  inFlight: { type: 'number' },
                  completed: { type: 'number' },
                  failed: { type: 'number' },
                  timeoutMs: { type: 'number' },
                },
              },
            },
          },
          rateLimiter: {
            type: 'object',
            properties: {
              buckets: { type: 'number' },
            },
          },
          runtime: {
            type: 'object',
            properties: {
              uptime: { type: 'number' },
              node: { type: 'string', example: 'v20.11.0' },
            },
          },
        },
      },
    }),
  );
};
