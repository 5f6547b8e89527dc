import {
  CallbackStateCodec,
  ConfigurationError,
  Environment,
  InMemoryConfigurationStore,
  OrchestrationContext,
  PaymentOrchestrationService,
  PaymentRequest,
  PaymentStatus,
  ProviderRegistry,
  TenantProviderCache,
  UpstreamError,
  ValidationError,
  registerMockProvider,
} from '../../src';

const credentials = { apiKey: 'mock_test_key', secretKey: 'test-secret' };

const request: PaymentRequest = {
  amount: 100,
  currency: 'usd',
  customer: { name: 'Ada', email: 'ada@example.com' },
};

describe('PaymentOrchestrationService', () => {
  let cache: TenantProviderCache;
  let codec: CallbackStateCodec;
  let service: PaymentOrchestrationService;
  const ctx: OrchestrationContext = {
    tenantId: 'acme',
    providerName: 'mock',
    environment: Environment.SANDBOX,
  };

  beforeEach(() => {
    const registry = new ProviderRegistry();
    registerMockProvider(registry);
    const store = new InMemoryConfigurationStore([
      { tenantId: 'ACME', providerName: 'mock', environment: Environment.SANDBOX, credentials },
      {
        tenantId: 'SLOW',
        providerName: 'mock',
        environment: Environment.SANDBOX,
        credentials: { ...credentials, latencyMs: '200' },
      },
    ]);
    cache = new TenantProviderCache(registry, store);
    codec = new CallbackStateCodec('test-secret');
    service = new PaymentOrchestrationService(cache, codec, {
      publicBaseUrl: 'https://gw.example/',
      paymentTimeoutMs: 50,
      inquiryTimeoutMs: 50,
    });
  });

  it('should qualify provider names per tenant', () => {
    expect(service.qualifyProviderName('acme', 'Mock')).toBe('ACME_mock');
  });

  it('should route a payment to the tenant provider', async () => {
    const response = await service.createPayment(ctx, { ...request, referenceId: 'order-1' });

    expect(response).toMatchObject({
      success: true,
      status: PaymentStatus.SUCCESSFUL,
      paymentId: 'order-1',
    });
  });

  it('should reject an invalid request before reaching the provider', async () => {
    const provider = await cache.get('acme', 'mock', Environment.SANDBOX);
    const spy = jest.spyOn(provider, 'createPayment');

    await expect(service.createPayment(ctx, { ...request, amount: 0 })).rejects.toThrow(
      new ValidationError('Invalid payment request: amount must be greater than 0'),
    );
    expect(spy).not.toHaveBeenCalled();
  });

  it('should pass configuration errors through unwrapped', async () => {
    await expect(
      service.createPayment({ ...ctx, tenantId: 'globex' }, request),
    ).rejects.toBeInstanceOf(ConfigurationError);
  });

  describe('3D Secure', () => {
    it('should route the processor callback through the gateway with sealed state', async () => {
      const response = await service.createPayment(ctx, {
        ...request,
        referenceId: 'order-3d',
        use3D: true,
        callbackUrl: 'https://shop.example/return',
        successUrl: 'https://shop.example/success',
      });

      expect(response.status).toBe(PaymentStatus.PENDING);
      const token = response.callbackState ?? '';
      const gatewayCallback = `https://gw.example/callback/mock?state=${encodeURIComponent(token)}`;
      expect(response.redirectUrl).toBe(
        `https://sandbox.mock-processor.test/3ds/order-3d?returnUrl=${encodeURIComponent(gatewayCallback)}`,
      );

      const state = codec.decode(token);
      expect(state).toMatchObject({
        paymentId: 'order-3d',
        tenantId: 'ACME',
        providerName: 'mock',
        environment: Environment.SANDBOX,
        originalCallbackUrl: 'https://shop.example/return',
        successUrl: 'https://shop.example/success',
        amount: 100,
        currency: 'USD',
      });

      const completed = await service.complete3DPayment(state, {});
      expect(completed).toMatchObject({ success: true, status: PaymentStatus.SUCCESSFUL });
    });

    it('should require a callback url', async () => {
      await expect(service.createPayment(ctx, { ...request, use3D: true })).rejects.toThrow(
        'Invalid payment request: callbackUrl is required for 3D secure payments',
      );
    });
  });

  describe('upstream failures', () => {
    it('should retry a read-only inquiry once', async () => {
      await service.createPayment(ctx, { ...request, referenceId: 'order-1' });
      const provider = await cache.get('acme', 'mock', Environment.SANDBOX);
      const spy = jest
        .spyOn(provider, 'getPaymentStatus')
        .mockRejectedValueOnce(new Error('connection reset'));

      const status = await service.getPaymentStatus(ctx, { paymentId: 'order-1' });

      expect(status.status).toBe(PaymentStatus.SUCCESSFUL);
      expect(spy).toHaveBeenCalledTimes(2);
    });

    it('should wrap a persistent inquiry failure as a retryable UpstreamError', async () => {
      const provider = await cache.get('acme', 'mock', Environment.SANDBOX);
      const spy = jest.spyOn(provider, 'getPaymentStatus');

      const error = await service.getPaymentStatus(ctx, { paymentId: 'nope' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UpstreamError);
      expect(error).toMatchObject({
        message: 'mock: getPaymentStatus failed: mock: payment nope not found',
        providerName: 'mock',
        operation: 'getPaymentStatus',
        retryable: true,
        timedOut: false,
      });
      expect(spy).toHaveBeenCalledTimes(2);
    });

    it('should never retry a refund', async () => {
      const provider = await cache.get('acme', 'mock', Environment.SANDBOX);
      const spy = jest
        .spyOn(provider, 'refundPayment')
        .mockRejectedValue(new Error('connection reset'));

      const error = await service
        .refundPayment(ctx, { paymentId: 'order-1', refundAmount: 10 })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UpstreamError);
      expect(error).toMatchObject({ retryable: false, operation: 'refundPayment' });
      expect(spy).toHaveBeenCalledTimes(1);
    });

    it('should time out a slow payment', async () => {
      const error = await service
        .createPayment({ ...ctx, tenantId: 'slow' }, request)
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UpstreamError);
      expect(error).toMatchObject({
        message: 'mock: createPayment failed: timed out after 50ms',
        timedOut: true,
        retryable: false,
      });
    });

    it('should stop when the caller cancels', async () => {
      const controller = new AbortController();
      controller.abort();

      const error = await service
        .createPayment({ ...ctx, tenantId: 'slow', signal: controller.signal }, request)
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UpstreamError);
      expect(error).toMatchObject({ timedOut: false });
    });
  });

  describe('inquiries', () => {
    it('should validate inquiry amounts', async () => {
      await expect(
        service.getInstallmentCount(ctx, { amount: -1, currency: 'USD' }),
      ).rejects.toThrow('amount must be greater than 0');
    });

    it('should require a payment id for status lookups', async () => {
      await expect(service.getPaymentStatus(ctx, { paymentId: ' ' })).rejects.toThrow(
        'paymentId is required',
      );
    });

    it('should return the provider commission', async () => {
      await expect(service.getCommission(ctx, { amount: 100, currency: 'USD' })).resolves.toEqual({
        rate: 2.9,
        commissionAmount: 2.9,
        netAmount: 97.1,
        currency: 'USD',
      });
    });
  });
});
