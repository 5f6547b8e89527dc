export * from './payment-provider.entity';
export * from './provider-config.entity';
export * from './payment-outcome.entity';
