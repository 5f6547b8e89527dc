/**
 * Gateway Testing Utilities
 * Signed webhook builders for the mock processor
 */

export * from './mock-webhook-factory';
