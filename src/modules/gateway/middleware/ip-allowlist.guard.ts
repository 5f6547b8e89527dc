import {
  Injectable,
  CanActivate,
  ExecutionContext,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request } from 'express';
import ipRangeCheck from 'ip-range-check';
import { ConfigurationService } from '../services/configuration.service';
import { getClientIp } from './client-ip';

/**
 * Webhook IP Allowlist Guard
 *
 * Restricts webhook senders per provider. Providers without an allowlist
 * entry accept any sender.
 *
 * Supported formats:
 * - Single IP: '192.168.1.1'
 * - CIDR: '192.168.1.0/24'
 * - IPv6: '2001:db8::1'
 * - IPv6 CIDR: '2001:db8::/32'
 */
@Injectable()
export class WebhookIpAllowlistGuard implements CanActivate {
  private readonly logger = new Logger(WebhookIpAllowlistGuard.name);

  constructor(private readonly configService: ConfigurationService) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<Request>();
    const provider = String(request.params?.provider ?? '');
    const allowlist = this.configService.getWebhookAllowlist(provider);

    if (allowlist.length === 0) {
      return true;
    }

    const clientIp = getClientIp(request, this.configService.shouldCheckProxyHeaders());
    if (!clientIp) {
      throw new HttpException({
        statusCode: HttpStatus.FORBIDDEN,
        message: 'Unable to determine client IP address',
        error: 'Forbidden',
      }, HttpStatus.FORBIDDEN);
    }

    if (!this.isIpAllowed(clientIp, allowlist)) {
      this.logger.warn(`Denied ${provider} webhook from ${clientIp}`);
      throw new HttpException({
        statusCode: HttpStatus.FORBIDDEN,
        message: 'Access denied: IP not in allowlist',
        error: 'Forbidden',
      }, HttpStatus.FORBIDDEN);
    }

    return true;
  }

  private isIpAllowed(ip: string, allowlist: string[]): boolean {
    try {
      return ipRangeCheck(ip, allowlist);
    } catch (error) {
      this.logger.error(
        `Allowlist check failed for ${ip}: ${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    }
  }
}
