export * from './payment-provider.adapter';
export * from './configuration-store.interface';
export * from './payment-ledger.interface';
export * from './event-dispatcher.interface';
