import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiQuery, ApiResponse } from '@nestjs/swagger';

/**
 * Swagger decorator for storing credentials
 */
export const ApiSetProviderConfig = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Store provider credentials',
      description:
        'Validates the credentials with the provider plugin, saves them and drops any cached instance',
    }),
    ApiResponse({ status: 201, description: 'Saved; sensitive values returned masked' }),
    ApiResponse({ status: 400, description: 'Invalid environment or credentials' }),
    ApiResponse({ status: 404, description: 'Provider not registered' }),
  );
};

/**
 * Swagger decorator for reading stored credentials
 */
export const ApiGetProviderConfig = () => {
  return applyDecorators(
    ApiOperation({ summary: 'Read stored provider credentials (masked)' }),
    ApiQuery({ name: 'environment', required: false, enum: ['sandbox', 'production'] }),
    ApiResponse({
      status: 200,
      description: 'Masked configuration',
      schema: {
        type: 'object',
        properties: {
          tenantId: { type: 'string', example: 'ACME' },
          providerName: { type: 'string', example: 'paystack' },
          environment: { type: 'string', example: 'sandbox' },
          credentials: {
            type: 'object',
            example: { secretKey: 'sk_t****_key' },
          },
        },
      },
    }),
    ApiResponse({ status: 404, description: 'No configuration stored' }),
  );
};

/**
 * Swagger decorator for listing a provider's configuration fields
 */
export const ApiProviderConfigFields = () => {
  return applyDecorators(
    ApiOperation({ summary: 'Configuration fields a provider needs' }),
    ApiQuery({ name: 'environment', required: false, enum: ['sandbox', 'production'] }),
    ApiResponse({
      status: 200,
      description: 'Advertised fields',
      schema: {
        type: 'array',
        items: {
          type: 'object',
          properties: {
            key: { type: 'string' },
            required: { type: 'boolean' },
            type: { type: 'string' },
            description: { type: 'string' },
            sensitive: { type: 'boolean' },
          },
        },
      },
    }),
  );
};
