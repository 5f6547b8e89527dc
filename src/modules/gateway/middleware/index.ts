export * from './client-ip';
export * from './rate-limit.guard';
export * from './ip-allowlist.guard';
