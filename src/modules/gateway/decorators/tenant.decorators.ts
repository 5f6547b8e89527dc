import {
  BadRequestException,
  ExecutionContext,
  SetMetadata,
  createParamDecorator,
} from '@nestjs/common';
import { Request } from 'express';
import { RateLimitAction } from '../../../core';
import { RATE_LIMIT_ACTION_KEY, TENANT_HEADER } from '../constants';

/**
 * Tenant id from X-Tenant-ID, falling back to the tenantId query parameter
 */
export function extractTenantId(request: Request): string | undefined {
  const header = request.headers[TENANT_HEADER];
  if (typeof header === 'string' && header.trim()) {
    return header.trim();
  }
  const query = request.query?.tenantId;
  if (typeof query === 'string' && query.trim()) {
    return query.trim();
  }
  return undefined;
}

/**
 * Injects the caller's tenant id; 400 when absent
 */
export const TenantId = createParamDecorator((_: unknown, ctx: ExecutionContext): string => {
  const tenantId = extractTenantId(ctx.switchToHttp().getRequest<Request>());
  if (!tenantId) {
    throw new BadRequestException('X-Tenant-ID header is required');
  }
  return tenantId;
});

/**
 * Rate limit bucket class for a handler or controller
 */
export const RateLimited = (action: RateLimitAction) => SetMetadata(RATE_LIMIT_ACTION_KEY, action);
