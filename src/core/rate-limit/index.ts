export * from './tenant-rate-limiter';
