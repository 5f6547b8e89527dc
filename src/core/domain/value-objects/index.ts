export * from './money.vo';
export * from './raw-response.vo';
