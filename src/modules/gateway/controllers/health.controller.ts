import { Controller, Get, Inject, HttpStatus, HttpCode } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import {
  ConfigurationStore,
  PaymentLedger,
  ProviderRegistry,
  TenantProviderCache,
  TenantProviderCacheStats,
  TenantRateLimiter,
  WebhookPipeline,
} from '../../../core';
import {
  CONFIGURATION_STORE,
  PAYMENT_LEDGER,
  PROVIDER_REGISTRY,
  TENANT_PROVIDER_CACHE,
  TENANT_RATE_LIMITER,
  WEBHOOK_PIPELINE,
} from '../constants';
import {
  ApiHealthCheck,
  ApiReadinessCheck,
  ApiServiceStatistics,
} from '../../../_shared';

/**
 * Liveness, readiness of both stores, and runtime statistics
 */
@ApiTags('Health')
@Controller('health')
export class HealthController {
  constructor(
    @Inject(CONFIGURATION_STORE)
    private readonly configStore: ConfigurationStore,
    @Inject(PAYMENT_LEDGER)
    private readonly ledger: PaymentLedger,
    @Inject(PROVIDER_REGISTRY)
    private readonly registry: ProviderRegistry,
    @Inject(TENANT_PROVIDER_CACHE)
    private readonly cache: TenantProviderCache,
    @Inject(WEBHOOK_PIPELINE)
    private readonly pipeline: WebhookPipeline,
    @Inject(TENANT_RATE_LIMITER)
    private readonly rateLimiter: TenantRateLimiter,
  ) {}

  @Get()
  @HttpCode(HttpStatus.OK)
  @ApiHealthCheck()
  health(): {
    status: string;
    timestamp: Date;
    uptime: number;
  } {
    return {
      status: 'healthy',
      timestamp: new Date(),
      uptime: process.uptime(),
    };
  }

  @Get('ready')
  @ApiReadinessCheck()
  async readiness(): Promise<{
    status: 'ready' | 'not_ready';
    checks: {
      configurationStore: boolean;
      ledger: boolean;
    };
  }> {
    const [configurationStore, ledger] = await Promise.all([
      this.configStore.isHealthy(),
      this.ledger.isHealthy(),
    ]);

    return {
      status: configurationStore && ledger ? 'ready' : 'not_ready',
      checks: { configurationStore, ledger },
    };
  }

  @Get('stats')
  @ApiServiceStatistics()
  statistics(): {
    providers: string[];
    cache: TenantProviderCacheStats;
    webhooks: ReturnType<WebhookPipeline['getStatistics']>;
    rateLimiter: { buckets: number };
    runtime: { uptime: number; node: string };
  } {
    return {
      providers: this.registry.list(),
      cache: this.cache.getStats(),
      webhooks: this.pipeline.getStatistics(),
      rateLimiter: { buckets: this.rateLimiter.size },
      runtime: {
        uptime: process.uptime(),
        node: process.version,
      },
    };
  }
}
