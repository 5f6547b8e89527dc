import {
  ConfigurationError,
  Environment,
  InMemoryConfigurationStore,
  ProviderConfigService,
  ProviderNotRegisteredError,
  ProviderRegistry,
  TenantProviderCache,
  ValidationError,
  registerBuiltInProviders,
} from '../../src';

const credentials = { apiKey: 'mock_test_key', secretKey: 'test-secret' };

describe('ProviderConfigService', () => {
  let store: InMemoryConfigurationStore;
  let cache: TenantProviderCache;
  let service: ProviderConfigService;

  beforeEach(() => {
    const registry = new ProviderRegistry();
    registerBuiltInProviders(registry, ['mock']);
    registry.freeze();

    store = new InMemoryConfigurationStore();
    cache = new TenantProviderCache(registry, store);
    service = new ProviderConfigService(store, registry, cache);
  });

  describe('setConfig', () => {
    it('should persist under normalized keys and return masked credentials', async () => {
      const saved = await service.setConfig(' acme ', 'Mock', 'sandbox', {
        ...credentials,
        baseUrl: 'https://sandbox.mock-processor.test',
      });

      expect(saved).toMatchObject({
        tenantId: 'ACME',
        providerName: 'mock',
        environment: Environment.SANDBOX,
        credentials: {
          apiKey: 'mock****_key',
          secretKey: 'test****cret',
          baseUrl: 'https://sandbox.mock-processor.test',
        },
      });

      const stored = await store.get('ACME', 'mock', Environment.SANDBOX);
      expect(stored?.credentials.secretKey).toBe('test-secret');
    });

    it('should refuse credentials the plugin rejects without storing them', async () => {
      await expect(
        service.setConfig('acme', 'mock', 'sandbox', { apiKey: 'mock_test_key', secretKey: 'short' }),
      ).rejects.toBeInstanceOf(ConfigurationError);

      expect(await store.list('acme')).toEqual([]);
    });

    it('should refuse an unknown environment', async () => {
      await expect(service.setConfig('acme', 'mock', 'staging', credentials)).rejects.toThrow(
        new ValidationError('environment must be one of: sandbox, production'),
      );
    });

    it('should refuse an unregistered provider', async () => {
      await expect(service.setConfig('acme', 'acmepay', 'sandbox', credentials)).rejects.toBeInstanceOf(
        ProviderNotRegisteredError,
      );
    });

    it('should evict the cached instance so the next call sees the new credentials', async () => {
      await service.setConfig('acme', 'mock', 'sandbox', credentials);
      const before = await cache.get('acme', 'mock', Environment.SANDBOX);

      await service.setConfig('acme', 'mock', 'sandbox', { ...credentials, secretKey: 'rotated-secret' });

      expect(cache.has('acme', 'mock', Environment.SANDBOX)).toBe(false);
      const after = await cache.get('acme', 'mock', Environment.SANDBOX);
      expect(after).not.toBe(before);
    });
  });

  describe('getConfig', () => {
    it('should return null when nothing is stored', async () => {
      expect(await service.getConfig('acme', 'mock', 'sandbox')).toBeNull();
    });

    it('should keep environments apart', async () => {
      await service.setConfig('acme', 'mock', 'production', credentials);

      expect(await service.getConfig('acme', 'mock', 'sandbox')).toBeNull();
      expect(await service.getConfig('acme', 'mock', 'production')).toMatchObject({
        environment: Environment.PRODUCTION,
      });
    });
  });

  describe('deleteConfig', () => {
    it('should remove every environment and evict each cached instance', async () => {
      await service.setConfig('acme', 'mock', 'sandbox', credentials);
      await service.setConfig('acme', 'mock', 'production', credentials);
      await cache.get('acme', 'mock', Environment.SANDBOX);
      await cache.get('acme', 'mock', Environment.PRODUCTION);

      expect(await service.deleteConfig('acme', 'mock')).toBe(2);
      expect(cache.getStats().size).toBe(0);
      await expect(cache.get('acme', 'mock', Environment.SANDBOX)).rejects.toThrow(
        'mock: no sandbox configuration for tenant ACME',
      );
    });

    it('should report zero when nothing was configured', async () => {
      expect(await service.deleteConfig('acme', 'mock')).toBe(0);
    });
  });

  describe('listing', () => {
    it('should list only configs for registered providers', async () => {
      await service.setConfig('acme', 'mock', 'sandbox', credentials);
      await store.save({
        tenantId: 'acme',
        providerName: 'retired',
        environment: Environment.SANDBOX,
        credentials: { token: 'placeholder' },
      });

      const configs = await service.listTenantConfigs('acme');

      expect(configs.map((config) => config.providerName)).toEqual(['mock']);
    });

    it('should list registered providers and their fields', () => {
      expect(service.listProviders()).toEqual(['mock']);
      expect(service.getRequiredConfig('mock', 'sandbox').map((field) => field.key)).toEqual([
        'apiKey',
        'secretKey',
        'webhookSecret',
        'baseUrl',
        'latencyMs',
      ]);
    });
  });
});
