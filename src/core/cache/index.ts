export * from './tenant-key';
export * from './tenant-provider-cache';
