export * from './raw-body.interceptor';
