import { DataSource, DataSourceOptions } from 'typeorm';
import { PaymentOutcomeEntity, PaymentProviderEntity, ProviderConfigEntity } from './entities';

export const GATEWAY_ENTITIES = [PaymentProviderEntity, ProviderConfigEntity, PaymentOutcomeEntity];

/**
 * TypeORM configuration for the gateway. Postgres by default; pass a full
 * options object (any driver) to override.
 */
export const createTypeORMConfig = (options?: DataSourceOptions): DataSourceOptions => {
  if (options) {
    return {
      ...options,
      entities: options.entities ?? GATEWAY_ENTITIES,
    };
  }

  return {
    type: 'postgres',
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '5432', 10),
    username: process.env.DB_USERNAME || 'paygate',
    password: process.env.DB_PASSWORD || 'paygate',
    database: process.env.DB_NAME || 'paygate',
    entities: GATEWAY_ENTITIES,
    synchronize: process.env.NODE_ENV === 'development',
    logging: process.env.DB_LOGGING === 'true',
    // Connection pool settings
    extra: {
      max: parseInt(process.env.DB_POOL_SIZE || '10', 10),
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    },
  };
};

/**
 * Create TypeORM DataSource
 */
export const createDataSource = (options?: DataSourceOptions): DataSource => {
  return new DataSource(createTypeORMConfig(options));
};
