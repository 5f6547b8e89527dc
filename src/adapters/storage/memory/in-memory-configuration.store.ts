import {
  ConfigurationStore,
  Environment,
  ProviderConfig,
  normalizeProviderName,
  normalizeTenantId,
} from '../../../core';

/**
 * In-memory configuration store for tests and single-process deployments.
 * Keys are normalized the same way the tenant cache normalizes them.
 */
export class InMemoryConfigurationStore implements ConfigurationStore {
  private readonly configs = new Map<string, ProviderConfig>();
  private readonly providerIds = new Map<string, string>();
  private healthy = true;

  constructor(initial: ProviderConfig[] = []) {
    for (const config of initial) {
      this.put(config);
    }
  }

  async get(
    tenantId: string,
    providerName: string,
    environment: Environment,
  ): Promise<ProviderConfig | null> {
    const config = this.configs.get(this.key(tenantId, providerName, environment));
    return config ? this.copy(config) : null;
  }

  async save(config: ProviderConfig): Promise<ProviderConfig> {
    return this.copy(this.put(config));
  }

  async delete(tenantId: string, providerName: string, environment?: Environment): Promise<number> {
    const environments = environment ? [environment] : Object.values(Environment);
    let deleted = 0;
    for (const env of environments) {
      if (this.configs.delete(this.key(tenantId, providerName, env))) {
        deleted++;
      }
    }
    return deleted;
  }

  async list(tenantId: string): Promise<ProviderConfig[]> {
    const tenant = normalizeTenantId(tenantId);
    return [...this.configs.values()]
      .filter((config) => config.tenantId === tenant)
      .map((config) => this.copy(config));
  }

  async getProviderId(providerName: string): Promise<string | null> {
    return this.providerIds.get(normalizeProviderName(providerName)) ?? null;
  }

  async isHealthy(): Promise<boolean> {
    return this.healthy;
  }

  /**
   * Flip the health flag (testing)
   */
  setHealthy(healthy: boolean): void {
    this.healthy = healthy;
  }

  clear(): void {
    this.configs.clear();
    this.providerIds.clear();
  }

  private put(config: ProviderConfig): ProviderConfig {
    const providerName = normalizeProviderName(config.providerName);
    if (!this.providerIds.has(providerName)) {
      this.providerIds.set(providerName, String(this.providerIds.size + 1));
    }

    const stored: ProviderConfig = {
      tenantId: normalizeTenantId(config.tenantId),
      providerName,
      environment: config.environment,
      credentials: { ...config.credentials },
      updatedAt: new Date(),
    };
    this.configs.set(this.key(stored.tenantId, providerName, stored.environment), stored);
    return stored;
  }

  private key(tenantId: string, providerName: string, environment: Environment): string {
    return `${normalizeTenantId(tenantId)}:${normalizeProviderName(providerName)}:${environment}`;
  }

  private copy(config: ProviderConfig): ProviderConfig {
    return { ...config, credentials: { ...config.credentials } };
  }
}
