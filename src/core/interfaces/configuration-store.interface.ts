import { Environment } from '../domain/enums';
import { ProviderConfig } from '../domain/models';

/**
 * Persistence for tenant provider credentials.
 * The gateway depends on it but does not own the schema.
 */
export interface ConfigurationStore {
  get(
    tenantId: string,
    providerName: string,
    environment: Environment,
  ): Promise<ProviderConfig | null>;

  /**
   * Insert or replace the config for (tenant, provider, environment)
   */
  save(config: ProviderConfig): Promise<ProviderConfig>;

  /**
   * Remove configs for a tenant/provider pair. Without an environment every
   * environment is removed. Resolves to the number of configs deleted.
   */
  delete(tenantId: string, providerName: string, environment?: Environment): Promise<number>;

  list(tenantId: string): Promise<ProviderConfig[]>;

  /**
   * Stable identifier for a provider name, used by reporting collaborators
   */
  getProviderId(providerName: string): Promise<string | null>;

  isHealthy(): Promise<boolean>;
}
