export * from './payment.model';
export * from './payment-request.validation';
export * from './provider-config.model';
export * from './callback-state.model';
export * from './payment-outcome.model';
