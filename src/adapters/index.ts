export * from './providers';
export * from './storage';
