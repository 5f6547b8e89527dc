import { DataSource } from 'typeorm';
import {
  Environment,
  PaymentStatus,
  TypeORMConfigurationStore,
  TypeORMPaymentLedger,
  createDataSource,
} from '../../src';

const credentials = { apiKey: 'mock_test_key', secretKey: 'test-secret' };

describe('TypeORM storage', () => {
  let dataSource: DataSource;

  beforeEach(async () => {
    dataSource = createDataSource({ type: 'sqljs', synchronize: true, logging: false });
    await dataSource.initialize();
  });

  afterEach(async () => {
    if (dataSource.isInitialized) {
      await dataSource.destroy();
    }
  });

  describe('TypeORMConfigurationStore', () => {
    let store: TypeORMConfigurationStore;

    beforeEach(() => {
      store = new TypeORMConfigurationStore(dataSource);
    });

    it('should save and read back a config under normalized keys', async () => {
      await store.save({
        tenantId: 'acme',
        providerName: 'Mock',
        environment: Environment.SANDBOX,
        credentials,
      });

      const config = await store.get(' ACME ', 'mock', Environment.SANDBOX);

      expect(config).toMatchObject({
        tenantId: 'ACME',
        providerName: 'mock',
        environment: Environment.SANDBOX,
        credentials,
      });
      expect(config?.updatedAt).toBeInstanceOf(Date);
    });

    it('should replace the config for the same tenant, provider and environment', async () => {
      const config = { tenantId: 'acme', providerName: 'mock', environment: Environment.SANDBOX, credentials };
      await store.save(config);
      await store.save({ ...config, credentials: { ...credentials, secretKey: 'rotated-secret' } });

      const configs = await store.list('acme');

      expect(configs).toHaveLength(1);
      expect(configs[0].credentials.secretKey).toBe('rotated-secret');
    });

    it('should return null for another tenant or environment', async () => {
      await store.save({ tenantId: 'acme', providerName: 'mock', environment: Environment.SANDBOX, credentials });

      expect(await store.get('globex', 'mock', Environment.SANDBOX)).toBeNull();
      expect(await store.get('acme', 'mock', Environment.PRODUCTION)).toBeNull();
    });

    it('should list a tenant\'s configs ordered by provider then environment', async () => {
      await store.save({ tenantId: 'acme', providerName: 'paystack', environment: Environment.SANDBOX, credentials });
      await store.save({ tenantId: 'acme', providerName: 'mock', environment: Environment.SANDBOX, credentials });
      await store.save({ tenantId: 'acme', providerName: 'mock', environment: Environment.PRODUCTION, credentials });
      await store.save({ tenantId: 'globex', providerName: 'mock', environment: Environment.SANDBOX, credentials });

      const configs = await store.list('acme');

      expect(configs.map((c) => `${c.providerName}:${c.environment}`)).toEqual([
        'mock:production',
        'mock:sandbox',
        'paystack:sandbox',
      ]);
    });

    it('should delete one environment or all of them', async () => {
      for (const environment of [Environment.SANDBOX, Environment.PRODUCTION]) {
        await store.save({ tenantId: 'acme', providerName: 'mock', environment, credentials });
      }

      expect(await store.delete('acme', 'mock', Environment.PRODUCTION)).toBe(1);
      await store.save({ tenantId: 'acme', providerName: 'mock', environment: Environment.PRODUCTION, credentials });
      expect(await store.delete('acme', 'mock')).toBe(2);
      expect(await store.delete('acme', 'mock')).toBe(0);
    });

    it('should give each provider one stable id across tenants', async () => {
      await store.save({ tenantId: 'acme', providerName: 'mock', environment: Environment.SANDBOX, credentials });
      await store.save({ tenantId: 'globex', providerName: 'mock', environment: Environment.SANDBOX, credentials });
      await store.save({ tenantId: 'acme', providerName: 'paystack', environment: Environment.SANDBOX, credentials });

      const mockId = await store.getProviderId('MOCK');

      expect(mockId).toBe('1');
      expect(await store.getProviderId('paystack')).toBe('2');
      expect(await store.getProviderId('unknown')).toBeNull();
    });

    it('should report health', async () => {
      expect(await store.isHealthy()).toBe(true);
    });
  });

  describe('TypeORMPaymentLedger', () => {
    let ledger: TypeORMPaymentLedger;

    beforeEach(() => {
      ledger = new TypeORMPaymentLedger(dataSource);
    });

    const outcome = {
      tenantId: 'acme',
      providerName: 'mock',
      paymentId: 'order-1',
      status: PaymentStatus.SUCCESSFUL,
      transactionId: 'mock_txn_1',
      amount: 100.5,
      currency: 'USD',
    };

    it('should record an outcome once', async () => {
      const first = await ledger.recordOutcome(outcome);
      const second = await ledger.recordOutcome(outcome);

      expect(first.applied).toBe(true);
      expect(first.outcome).toMatchObject({
        tenantId: 'ACME',
        providerName: 'mock',
        paymentId: 'order-1',
        status: PaymentStatus.SUCCESSFUL,
        transactionId: 'mock_txn_1',
        amount: 100.5,
        currency: 'USD',
      });
      expect(second.applied).toBe(false);
      expect(second.outcome.id).toBe(first.outcome.id);
      expect(await ledger.findOutcomes({ tenantId: 'acme' })).toHaveLength(1);
    });

    it('should keep distinct statuses of the same payment', async () => {
      await ledger.recordOutcome(outcome);
      await ledger.recordOutcome({ ...outcome, status: PaymentStatus.REFUNDED });

      const outcomes = await ledger.findOutcomes({ tenantId: 'acme', paymentId: 'order-1' });

      expect(outcomes.map((o) => o.status).sort()).toEqual([
        PaymentStatus.REFUNDED,
        PaymentStatus.SUCCESSFUL,
      ]);
    });

    it('should filter by tenant and provider', async () => {
      await ledger.recordOutcome(outcome);
      await ledger.recordOutcome({ ...outcome, tenantId: 'globex' });
      await ledger.recordOutcome({ ...outcome, providerName: 'paystack' });

      expect(await ledger.findOutcomes({ tenantId: 'ACME', providerName: 'mock' })).toHaveLength(1);
      expect(await ledger.findOutcomes({ tenantId: 'acme' })).toHaveLength(2);
      expect(await ledger.findOutcomes({ tenantId: 'initech' })).toEqual([]);
    });

    it('should store absent optional fields as undefined', async () => {
      const { outcome: recorded } = await ledger.recordOutcome({
        tenantId: 'acme',
        providerName: 'mock',
        paymentId: 'order-2',
        status: PaymentStatus.FAILED,
      });

      expect(recorded.transactionId).toBeUndefined();
      expect(recorded.amount).toBeUndefined();
      expect(recorded.message).toBeUndefined();
    });
  });
});
