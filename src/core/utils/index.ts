export * from './payload.utils';
