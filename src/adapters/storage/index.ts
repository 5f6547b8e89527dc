export * from './memory';
export * from './typeorm';
