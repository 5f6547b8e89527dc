import { Logger } from '@nestjs/common';
import { ProviderRegistry, normalizeProviderName } from '../../core';
import { registerMockProvider, MOCK_PROVIDER_NAME } from './mock';
import { registerPaystackProvider, PAYSTACK_PROVIDER_NAME } from './paystack';

export * from './mock';
export * from './paystack';

const BUILT_IN_PROVIDERS: Record<string, (registry: ProviderRegistry) => void> = {
  [MOCK_PROVIDER_NAME]: registerMockProvider,
  [PAYSTACK_PROVIDER_NAME]: registerPaystackProvider,
};

/**
 * Register the shipped plugins, or only the enabled subset
 */
export function registerBuiltInProviders(registry: ProviderRegistry, enabled?: string[]): void {
  const logger = new Logger('ProviderRegistry');
  const names = enabled ? enabled.map(normalizeProviderName) : Object.keys(BUILT_IN_PROVIDERS);

  for (const name of names) {
    const register = BUILT_IN_PROVIDERS[name];
    if (!register) {
      throw new Error(`Unknown built-in provider '${name}'`);
    }
    register(registry);
  }
  logger.log(`Registered providers: ${registry.list().join(', ')}`);
}
