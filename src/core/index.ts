/**
 * Gateway core: framework-free payment routing, tenant isolation,
 * callback correlation, webhook ingestion and rate limiting
 */

// Domain
export * from './domain/models';
export * from './domain/enums';
export * from './domain/value-objects';

// Contracts
export * from './interfaces';
export * from './errors';

// Provider plumbing
export * from './registry';
export * from './cache';

// Orchestration
export * from './services';
export * from './callback';

// Webhook ingestion
export * from './pipeline';

export * from './rate-limit';
export * from './events';
export * from './utils';
