/**
 * TypeORM storage: configuration store and payment ledger
 */

export { TypeORMConfigurationStore } from './typeorm-configuration.store';
export { TypeORMPaymentLedger } from './typeorm-payment-ledger';
export { createDataSource, createTypeORMConfig, GATEWAY_ENTITIES } from './typeorm.config';
export * from './entities';
