import {
  Injectable,
  CanActivate,
  ExecutionContext,
  HttpException,
  HttpStatus,
  Inject,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { Request, Response } from 'express';
import { RateLimitAction, RateLimitDecision, TenantRateLimiter } from '../../../core';
import { RATE_LIMIT_ACTION_KEY, TENANT_RATE_LIMITER } from '../constants';
import { extractTenantId } from '../decorators/tenant.decorators';
import { ConfigurationService } from '../services/configuration.service';
import { getClientIp } from './client-ip';

/**
 * Gateway Rate Limit Guard
 *
 * Token bucket per tenant and action class. Handlers pick their class with
 * @RateLimited(action); anything unmarked counts against 'global'. Requests
 * without a tenant (X-Tenant-ID or ?tenantId=) share a small per-IP bucket.
 *
 * Usage:
 * @UseGuards(GatewayRateLimitGuard)
 * @RateLimited(RateLimitAction.PAYMENT)
 */
@Injectable()
export class GatewayRateLimitGuard implements CanActivate {
  constructor(
    private readonly reflector: Reflector,
    @Inject(TENANT_RATE_LIMITER)
    private readonly limiter: TenantRateLimiter,
    private readonly configService: ConfigurationService,
  ) {}

  canActivate(context: ExecutionContext): boolean {
    if (!this.configService.isRateLimitEnabled()) {
      return true;
    }

    const action =
      this.reflector.getAllAndOverride<RateLimitAction | undefined>(RATE_LIMIT_ACTION_KEY, [
        context.getHandler(),
        context.getClass(),
      ]) ?? RateLimitAction.GLOBAL;

    const http = context.switchToHttp();
    const request = http.getRequest<Request>();
    const response = http.getResponse<Response>();

    const tenantId = extractTenantId(request);
    const ip = getClientIp(request, this.configService.shouldCheckProxyHeaders()) ?? undefined;

    const decision = this.limiter.consume({ tenantId, ip }, action);
    this.setRateLimitHeaders(response, decision, action, tenantId);

    if (!decision.allowed) {
      response.setHeader('Retry-After', decision.retryAfterSeconds.toString());
      throw new HttpException({
        statusCode: HttpStatus.TOO_MANY_REQUESTS,
        message: `Rate limit exceeded. Please retry after ${decision.retryAfterSeconds} seconds.`,
        error: 'Too Many Requests',
        retryAfter: decision.retryAfterSeconds,
      }, HttpStatus.TOO_MANY_REQUESTS);
    }

    return true;
  }

  private setRateLimitHeaders(
    response: Response,
    decision: RateLimitDecision,
    action: RateLimitAction,
    tenantId?: string,
  ): void {
    response.setHeader('X-RateLimit-Limit', decision.limit.toString());
    response.setHeader('X-RateLimit-Remaining', decision.remaining.toString());
    response.setHeader('X-RateLimit-Reset', Math.ceil(decision.resetMs / 1000).toString());
    response.setHeader('X-RateLimit-Action', action);
    if (tenantId) {
      response.setHeader('X-RateLimit-Tenant', tenantId.trim().toUpperCase());
    }
  }
}
