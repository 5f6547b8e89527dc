export * from './in-memory-configuration.store';
export * from './in-memory-payment-ledger';
