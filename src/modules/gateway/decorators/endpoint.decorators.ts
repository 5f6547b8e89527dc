import {
  applyDecorators,
  Get,
  HttpCode,
  HttpStatus,
  Post,
  UseGuards,
  UseInterceptors,
} from '@nestjs/common';
import { ApiHeader, ApiOperation, ApiParam, ApiQuery, ApiResponse } from '@nestjs/swagger';
import { RateLimitAction } from '../../../core';
import { RawBodyInterceptor } from '../interceptors/raw-body.interceptor';
import { GatewayRateLimitGuard } from '../middleware/rate-limit.guard';
import { WebhookIpAllowlistGuard } from '../middleware/ip-allowlist.guard';
import { RateLimited } from './tenant.decorators';

const providerParam = () =>
  ApiParam({
    name: 'provider',
    description: 'Payment provider name (e.g., paystack, mock)',
    example: 'paystack',
  });

/**
 * Webhook endpoint decorator
 * Raw-body receiver behind the sender allowlist and the rate limiter
 */
export function WebhookEndpoint(description: string = 'Receive provider webhook') {
  return applyDecorators(
    Post(':provider'),
    HttpCode(HttpStatus.OK),
    UseGuards(WebhookIpAllowlistGuard, GatewayRateLimitGuard),
    RateLimited(RateLimitAction.WEBHOOK),
    UseInterceptors(RawBodyInterceptor),
    ApiOperation({ summary: description }),
    providerParam(),
    ApiQuery({ name: 'tenantId', required: false, description: 'Tenant, if not sent as X-Tenant-ID' }),
    ApiQuery({ name: 'environment', required: false, enum: ['sandbox', 'production'] }),
    ApiResponse({
      status: 200,
      description: 'Signature verified; verification continues asynchronously',
      schema: {
        type: 'object',
        properties: {
          status: { type: 'string', example: 'accepted' },
          paymentId: { type: 'string' },
          processingId: { type: 'string' },
        },
      },
    }),
    ApiResponse({ status: 400, description: 'Unparseable payload or invalid signature' }),
    ApiResponse({ status: 403, description: 'Sender not in the provider allowlist' }),
  );
}

/**
 * Tenant-scoped, rate-limited gateway operation
 */
export function GatewayOperation(
  action: RateLimitAction,
  summary: string,
  successStatus: HttpStatus = HttpStatus.OK,
) {
  return applyDecorators(
    UseGuards(GatewayRateLimitGuard),
    RateLimited(action),
    HttpCode(successStatus),
    ApiOperation({ summary }),
    ApiHeader({ name: 'X-Tenant-ID', required: true, description: 'Calling tenant' }),
    providerParam(),
    ApiResponse({ status: 429, description: 'Rate limit exceeded' }),
  );
}

/**
 * 3D Secure return endpoint, reachable by GET and POST
 */
export function CallbackEndpoint() {
  return applyDecorators(
    UseGuards(GatewayRateLimitGuard),
    RateLimited(RateLimitAction.CALLBACK),
    ApiOperation({ summary: 'Customer return from a 3D Secure challenge' }),
    providerParam(),
    ApiQuery({ name: 'state', required: false, description: 'Sealed callback state' }),
    ApiResponse({ status: 200, description: 'Auto-submitting redirect form' }),
    ApiResponse({ status: 400, description: 'Invalid or expired payment session' }),
  );
}

export const CallbackGet = () => applyDecorators(Get(':provider'), CallbackEndpoint());
export const CallbackPost = () => applyDecorators(Post(':provider'), CallbackEndpoint());
