export * from './paystack-provider.adapter';
export * from './paystack-webhook.factory';
