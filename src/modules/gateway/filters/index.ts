export * from './gateway-exception.filter';
