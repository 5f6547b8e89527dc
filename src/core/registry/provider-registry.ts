import { PaymentProviderAdapter, ProviderFactory } from '../interfaces';
import { ProviderNotRegisteredError } from '../errors';

/**
 * Provider name -> factory association.
 *
 * Populated once at startup by each plugin's register function, then frozen.
 * Read-only afterwards; nothing reaches it except through injection.
 */
export class ProviderRegistry {
  private readonly factories = new Map<string, ProviderFactory>();
  private frozen = false;

  register(name: string, factory: ProviderFactory): this {
    const key = normalizeProviderName(name);
    if (!key) {
      throw new Error('Provider name is required');
    }
    if (this.frozen) {
      throw new Error(`Cannot register provider '${key}': registry is frozen`);
    }
    if (this.factories.has(key)) {
      throw new Error(`Provider '${key}' is already registered`);
    }
    this.factories.set(key, factory);
    return this;
  }

  has(name: string): boolean {
    return this.factories.has(normalizeProviderName(name));
  }

  /**
   * @throws ProviderNotRegisteredError
   */
  getFactory(name: string): ProviderFactory {
    const factory = this.factories.get(normalizeProviderName(name));
    if (!factory) {
      throw new ProviderNotRegisteredError(name);
    }
    return factory;
  }

  /**
   * Build a fresh, uninitialized instance
   */
  create(name: string): PaymentProviderAdapter {
    return this.getFactory(name)();
  }

  /**
   * Registered names, sorted
   */
  list(): string[] {
    return [...this.factories.keys()].sort();
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  isFrozen(): boolean {
    return this.frozen;
  }
}

export function normalizeProviderName(name: string): string {
  return (name ?? '').trim().toLowerCase();
}
