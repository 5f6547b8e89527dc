import { DataSource, Repository } from 'typeorm';
import {
  ConfigurationError,
  ConfigurationStore,
  Environment,
  ProviderConfig,
  normalizeProviderName,
  normalizeTenantId,
  parseEnvironment,
} from '../../../core';
import { PaymentProviderEntity, ProviderConfigEntity } from './entities';

/**
 * TypeORM implementation of ConfigurationStore
 */
export class TypeORMConfigurationStore implements ConfigurationStore {
  private configRepo: Repository<ProviderConfigEntity>;
  private providerRepo: Repository<PaymentProviderEntity>;

  constructor(private readonly dataSource: DataSource) {
    this.configRepo = dataSource.getRepository(ProviderConfigEntity);
    this.providerRepo = dataSource.getRepository(PaymentProviderEntity);
  }

  async get(
    tenantId: string,
    providerName: string,
    environment: Environment,
  ): Promise<ProviderConfig | null> {
    const entity = await this.configRepo.findOne({
      where: {
        tenantId: normalizeTenantId(tenantId),
        providerName: normalizeProviderName(providerName),
        environment,
      },
    });
    return entity ? this.mapConfigEntityToDomain(entity) : null;
  }

  async save(config: ProviderConfig): Promise<ProviderConfig> {
    const tenantId = normalizeTenantId(config.tenantId);
    const providerName = normalizeProviderName(config.providerName);
    const provider = await this.ensureProvider(providerName);

    const existing = await this.configRepo.findOne({
      where: { tenantId, providerName, environment: config.environment },
    });

    const entity =
      existing ??
      this.configRepo.create({
        tenantId,
        providerName,
        environment: config.environment,
      });
    entity.providerId = provider.id;
    entity.credentials = { ...config.credentials };

    const saved = await this.configRepo.save(entity);
    return this.mapConfigEntityToDomain(saved);
  }

  async delete(tenantId: string, providerName: string, environment?: Environment): Promise<number> {
    const rows = await this.configRepo.find({
      where: {
        tenantId: normalizeTenantId(tenantId),
        providerName: normalizeProviderName(providerName),
        ...(environment ? { environment } : {}),
      },
    });
    if (rows.length > 0) {
      await this.configRepo.remove(rows);
    }
    return rows.length;
  }

  async list(tenantId: string): Promise<ProviderConfig[]> {
    const rows = await this.configRepo.find({
      where: { tenantId: normalizeTenantId(tenantId) },
      order: { providerName: 'ASC', environment: 'ASC' },
    });
    return rows.map((row) => this.mapConfigEntityToDomain(row));
  }

  async getProviderId(providerName: string): Promise<string | null> {
    const provider = await this.providerRepo.findOne({
      where: { name: normalizeProviderName(providerName) },
    });
    return provider ? String(provider.id) : null;
  }

  /**
   * Health Check
   */
  async isHealthy(): Promise<boolean> {
    try {
      await this.dataSource.query('SELECT 1');
      return true;
    } catch {
      return false;
    }
  }

  private async ensureProvider(name: string): Promise<PaymentProviderEntity> {
    const existing = await this.providerRepo.findOne({ where: { name } });
    if (existing) {
      return existing;
    }
    return this.providerRepo.save(this.providerRepo.create({ name }));
  }

  private mapConfigEntityToDomain(entity: ProviderConfigEntity): ProviderConfig {
    const environment = parseEnvironment(entity.environment);
    if (!environment) {
      throw new ConfigurationError(
        `${entity.providerName}: stored config has unknown environment '${entity.environment}'`,
        entity.providerName,
        'environment',
      );
    }

    return {
      tenantId: entity.tenantId,
      providerName: entity.providerName,
      environment,
      credentials: { ...entity.credentials },
      updatedAt: entity.updatedAt,
    };
  }
}
