import { Environment } from '../enums';

/**
 * Credential map as it crosses the configuration boundary.
 * Plugins convert it into their own typed config in initialize().
 */
export type ProviderCredentials = Record<string, string>;

/**
 * One logical config per (tenant, provider, environment)
 */
export interface ProviderConfig {
  tenantId: string;
  providerName: string;
  environment: Environment;
  credentials: ProviderCredentials;
  updatedAt?: Date;
}

export type ConfigFieldType = 'string' | 'number' | 'url' | 'email' | 'boolean';

/**
 * Advertised configuration key, used to build self-service config forms
 */
export interface ConfigField {
  key: string;
  required: boolean;
  type: ConfigFieldType;
  description: string;
  example?: string;
  pattern?: string;
  minLength?: number;
  maxLength?: number;
  /**
   * Masked when the stored config is read back
   */
  sensitive?: boolean;
}
