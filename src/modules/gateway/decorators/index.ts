export * from './tenant.decorators';
export * from './endpoint.decorators';
