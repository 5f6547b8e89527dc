export * from './callback-state.codec';
export * from './callback-redirect';
