import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  ConfigField,
  ConfigurationStore,
  Environment,
  ProviderCredentials,
  ProviderConfig,
  ProviderRegistry,
  TenantProviderCache,
  ValidationError,
  maskCredentials,
  normalizeProviderName,
  normalizeTenantId,
  parseEnvironment,
} from '../../../core';
import { CONFIGURATION_STORE, PROVIDER_REGISTRY, TENANT_PROVIDER_CACHE } from '../constants';

/**
 * Stored config as returned to callers: sensitive values masked
 */
export interface MaskedProviderConfig {
  tenantId: string;
  providerName: string;
  environment: Environment;
  credentials: ProviderCredentials;
  updatedAt?: Date;
}

/**
 * Tenant self-service for provider credentials.
 *
 * Every write invalidates the tenant cache before resolving, so the next
 * payment for that tenant is built from the new credentials.
 */
@Injectable()
export class ProviderConfigService {
  private readonly logger = new Logger(ProviderConfigService.name);

  constructor(
    @Inject(CONFIGURATION_STORE)
    private readonly store: ConfigurationStore,
    @Inject(PROVIDER_REGISTRY)
    private readonly registry: ProviderRegistry,
    @Inject(TENANT_PROVIDER_CACHE)
    private readonly cache: TenantProviderCache,
  ) {}

  /**
   * Validate and persist credentials for (tenant, provider, environment)
   * @throws ValidationError for an unknown environment
   * @throws ProviderNotRegisteredError for an unknown provider
   * @throws ConfigurationError when the plugin rejects the credentials
   */
  async setConfig(
    tenantId: string,
    providerName: string,
    environment: string,
    credentials: ProviderCredentials,
  ): Promise<MaskedProviderConfig> {
    const tenant = normalizeTenantId(tenantId);
    const provider = normalizeProviderName(providerName);
    const env = this.parseEnvironmentOrThrow(environment);

    const plugin = this.registry.create(provider);
    plugin.validateConfig(credentials);

    const saved = await this.store.save({
      tenantId: tenant,
      providerName: provider,
      environment: env,
      credentials,
    });
    this.cache.delete(tenant, provider, env);

    this.logger.log(`Saved ${provider} ${env} config for tenant ${tenant}`);
    return this.mask(saved);
  }

  /**
   * Masked view of the stored config, or null when none exists
   */
  async getConfig(
    tenantId: string,
    providerName: string,
    environment: string,
  ): Promise<MaskedProviderConfig | null> {
    const env = this.parseEnvironmentOrThrow(environment);
    const config = await this.store.get(
      normalizeTenantId(tenantId),
      normalizeProviderName(providerName),
      env,
    );
    if (!config) {
      return null;
    }
    return this.mask(config);
  }

  /**
   * Remove every environment's config for the pair
   */
  async deleteConfig(tenantId: string, providerName: string): Promise<number> {
    const tenant = normalizeTenantId(tenantId);
    const provider = normalizeProviderName(providerName);

    const deleted = await this.store.delete(tenant, provider);
    const evicted = this.cache.deleteByTenantAndProvider(tenant, provider);

    this.logger.log(
      `Deleted ${deleted} ${provider} config(s) for tenant ${tenant}, evicted ${evicted} cached instance(s)`,
    );
    return deleted;
  }

  /**
   * Fields a provider advertises for the given environment
   */
  getRequiredConfig(providerName: string, environment: string): ConfigField[] {
    const env = this.parseEnvironmentOrThrow(environment);
    return this.registry.create(providerName).getRequiredConfig(env);
  }

  listProviders(): string[] {
    return this.registry.list();
  }

  async listTenantConfigs(tenantId: string): Promise<MaskedProviderConfig[]> {
    const configs = await this.store.list(normalizeTenantId(tenantId));
    return configs
      .filter((config) => this.registry.has(config.providerName))
      .map((config) => this.mask(config));
  }

  private mask(config: ProviderConfig): MaskedProviderConfig {
    const fields = this.registry.has(config.providerName)
      ? this.registry.create(config.providerName).getRequiredConfig(config.environment)
      : [];
    return {
      tenantId: config.tenantId,
      providerName: config.providerName,
      environment: config.environment,
      credentials: maskCredentials(config.credentials, fields),
      updatedAt: config.updatedAt,
    };
  }

  private parseEnvironmentOrThrow(environment: string): Environment {
    const env = parseEnvironment(environment);
    if (!env) {
      throw new ValidationError(
        `environment must be one of: ${Object.values(Environment).join(', ')}`,
      );
    }
    return env;
  }
}
