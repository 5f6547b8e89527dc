export * from './payment-status.enum';
export * from './environment.enum';
export * from './payment-operation.enum';
export * from './rate-limit-action.enum';
export * from './gateway-event-type.enum';
