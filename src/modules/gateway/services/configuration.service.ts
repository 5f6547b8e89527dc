import { Injectable, Inject } from '@nestjs/common';
import type { GatewayModuleConfig } from '../gateway.config';
import { GATEWAY_CONFIG } from '../constants';
import { RedirectMethod, normalizeProviderName } from '../../../core';

/**
 * Configuration Service
 *
 * Read access to the resolved gateway configuration
 */
@Injectable()
export class ConfigurationService {
  constructor(
    @Inject(GATEWAY_CONFIG)
    private readonly config: GatewayModuleConfig,
  ) {}

  /**
   * Get full configuration
   */
  getConfig(): GatewayModuleConfig {
    return this.config;
  }

  getStorageType(): GatewayModuleConfig['storage']['type'] {
    return this.config.storage.type;
  }

  getRedirectMethod(): RedirectMethod {
    return this.config.callback.redirectMethod ?? 'POST';
  }

  /**
   * Sender allowlist for a provider; empty means any sender
   */
  getWebhookAllowlist(providerName: string): string[] {
    const allowlist = this.config.webhooks?.ipAllowlist ?? {};
    return allowlist[normalizeProviderName(providerName)] ?? [];
  }

  /**
   * Trust X-Forwarded-For / X-Real-IP when resolving the client address
   */
  shouldCheckProxyHeaders(): boolean {
    return this.config.webhooks?.checkProxyHeaders !== false;
  }

  isRateLimitEnabled(): boolean {
    return this.config.rateLimit?.enabled !== false;
  }

  getPremiumTenants(): string[] {
    return this.config.rateLimit?.premiumTenants ?? [];
  }
}
