export * from './configuration.service';
export * from './provider-config.service';
export * from './gateway-lifecycle.service';
