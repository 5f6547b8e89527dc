export * from './payment.controller';
export * from './callback.controller';
export * from './webhook.controller';
export * from './provider-config.controller';
export * from './health.controller';
export * from './request-context';
