export * from './provider-registry';
export * from './config-fields';
