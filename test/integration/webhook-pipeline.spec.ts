import {
  CallbackStateCodec,
  Environment,
  EventDispatcherImpl,
  GatewayEvent,
  GatewayEventType,
  InMemoryConfigurationStore,
  InMemoryPaymentLedger,
  InboundWebhook,
  MockWebhook,
  MockWebhookFactory,
  PaymentOrchestrationService,
  PaymentStatus,
  ProviderRegistry,
  TenantProviderCache,
  WebhookPipeline,
  WebhookTaskRunner,
  registerMockProvider,
  signMockWebhook,
} from '../../src';

describe('Webhook Pipeline', () => {
  let orchestration: PaymentOrchestrationService;
  let ledger: InMemoryPaymentLedger;
  let taskRunner: WebhookTaskRunner;
  let eventDispatcher: EventDispatcherImpl;
  let pipeline: WebhookPipeline;
  let events: GatewayEvent[];

  const ctx = { tenantId: 'acme', providerName: 'mock', environment: Environment.SANDBOX };

  const inbound = (webhook: MockWebhook, tenantId = 'acme'): InboundWebhook => ({
    tenantId,
    environment: Environment.SANDBOX,
    headers: webhook.headers,
    body: webhook.body,
    contentType: webhook.headers['content-type'],
  });

  const eventsOf = (eventType: GatewayEventType) =>
    events.filter((event) => event.eventType === eventType);

  beforeEach(() => {
    const registry = new ProviderRegistry();
    registerMockProvider(registry);
    const store = new InMemoryConfigurationStore([
      {
        tenantId: 'ACME',
        providerName: 'mock',
        environment: Environment.SANDBOX,
        credentials: { apiKey: 'mock_test_key', secretKey: 'test-secret' },
      },
      {
        tenantId: 'GLOBEX',
        providerName: 'mock',
        environment: Environment.SANDBOX,
        credentials: { apiKey: 'mock_test_key', secretKey: 'globex-secret' },
      },
    ]);

    orchestration = new PaymentOrchestrationService(
      new TenantProviderCache(registry, store),
      new CallbackStateCodec('test-secret'),
      { publicBaseUrl: 'https://gw.example' },
    );
    ledger = new InMemoryPaymentLedger();
    taskRunner = new WebhookTaskRunner({ timeoutMs: 5000 });
    eventDispatcher = new EventDispatcherImpl();
    pipeline = new WebhookPipeline({ orchestration, ledger, taskRunner, eventDispatcher });

    events = [];
    eventDispatcher.onAll((event) => {
      events.push(event);
    });
  });

  afterEach(async () => {
    await taskRunner.shutdown();
  });

  describe('accepted deliveries', () => {
    beforeEach(async () => {
      // Payment the processor knows about
      await orchestration.createPayment(ctx, {
        referenceId: 'pay_1',
        amount: 100,
        currency: 'USD',
        customer: { name: 'Ada', email: 'ada@example.com' },
      });
    });

    it('should accept a signed webhook and record the verified outcome', async () => {
      const webhook = MockWebhookFactory.paymentSuccessful({ paymentId: 'pay_1' });

      const result = await pipeline.ingest('mock', inbound(webhook));
      expect(result).toMatchObject({ accepted: true, statusCode: 200, paymentId: 'pay_1' });
      expect(result.taskId).toBeDefined();

      await taskRunner.drain();

      const outcomes = await ledger.findOutcomes({ tenantId: 'acme', paymentId: 'pay_1' });
      expect(outcomes).toHaveLength(1);
      expect(outcomes[0]).toMatchObject({
        tenantId: 'ACME',
        providerName: 'mock',
        status: PaymentStatus.SUCCESSFUL,
        transactionId: 'mock_txn_1',
        amount: 100,
        currency: 'USD',
      });
      expect(eventsOf(GatewayEventType.PAYMENT_SUCCEEDED)).toHaveLength(1);
    });

    it('should record a repeated delivery once', async () => {
      const [first, second] = MockWebhookFactory.duplicate(
        MockWebhookFactory.paymentSuccessful({ paymentId: 'pay_1' }),
      );

      const results = await Promise.all([
        pipeline.ingest('mock', inbound(first)),
        pipeline.ingest('mock', inbound(second)),
      ]);
      await taskRunner.drain();

      expect(results.map((result) => result.accepted)).toEqual([true, true]);
      expect(ledger.size).toBe(1);
      expect(eventsOf(GatewayEventType.PAYMENT_SUCCEEDED)).toHaveLength(1);
    });

    it('should trust the processor status over the webhook claim', async () => {
      const webhook = MockWebhookFactory.paymentFailed({ paymentId: 'pay_1' });

      await pipeline.ingest('mock', inbound(webhook));
      await taskRunner.drain();

      const outcomes = await ledger.findOutcomes({ tenantId: 'acme' });
      expect(outcomes.map((outcome) => outcome.status)).toEqual([PaymentStatus.SUCCESSFUL]);
      expect(eventsOf(GatewayEventType.PAYMENT_FAILED)).toHaveLength(0);
    });

    it('should accept form-encoded bodies', async () => {
      const body = 'event=payment.succeeded&data.paymentId=pay_1&data.status=success';

      const result = await pipeline.ingest('mock', {
        tenantId: 'acme',
        environment: Environment.SANDBOX,
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          'X-Mock-Signature': signMockWebhook(body, 'test-secret'),
        },
        body,
        contentType: 'application/x-www-form-urlencoded',
      });
      await taskRunner.drain();

      expect(result).toMatchObject({ accepted: true, paymentId: 'pay_1' });
      expect(ledger.size).toBe(1);
    });

    it('should record nothing while the payment is still pending', async () => {
      await orchestration.createPayment(ctx, {
        referenceId: 'pay_3d',
        amount: 100,
        currency: 'USD',
        customer: { name: 'Ada', email: 'ada@example.com' },
        use3D: true,
        callbackUrl: 'https://shop.example/return',
      });

      await pipeline.ingest('mock', inbound(MockWebhookFactory.paymentSuccessful({ paymentId: 'pay_3d' })));
      await taskRunner.drain();

      expect(ledger.size).toBe(0);
      expect(taskRunner.getStatistics()).toMatchObject({ completed: 1, failed: 0 });
    });
  });

  describe('rejected deliveries', () => {
    it('should reject a forged signature without starting work', async () => {
      const result = await pipeline.ingest('mock', inbound(MockWebhookFactory.invalidSignature()));

      expect(result).toMatchObject({
        accepted: false,
        statusCode: 400,
        message: 'Webhook signature mismatch',
      });
      expect(taskRunner.inFlight).toBe(0);
      expect(eventsOf(GatewayEventType.WEBHOOK_REJECTED)).toHaveLength(1);
    });

    it('should reject a body that cannot be parsed', async () => {
      const result = await pipeline.ingest('mock', inbound(MockWebhookFactory.malformedPayload()));

      expect(result.accepted).toBe(false);
      expect(result.message).toMatch(/^Webhook body could not be parsed: /);
    });

    it('should reject an empty body', async () => {
      const result = await pipeline.ingest('mock', {
        tenantId: 'acme',
        environment: Environment.SANDBOX,
        headers: {},
        body: '',
      });

      expect(result).toMatchObject({ accepted: false, message: 'Webhook body is empty' });
    });

    it('should reject a webhook signed for another tenant', async () => {
      const webhook = MockWebhookFactory.paymentSuccessful({ paymentId: 'pay_1' });

      const result = await pipeline.ingest('mock', inbound(webhook, 'globex'));

      expect(result).toMatchObject({ accepted: false, message: 'Webhook signature mismatch' });
    });

    it('should reject a tenant without provider configuration', async () => {
      const result = await pipeline.ingest(
        'mock',
        inbound(MockWebhookFactory.paymentSuccessful(), 'initech'),
      );

      expect(result).toMatchObject({
        accepted: false,
        message: 'mock: no sandbox configuration for tenant INITECH',
      });
    });
  });

  it('should report a verification task that fails', async () => {
    // Signature is valid but the processor has never seen this payment
    const result = await pipeline.ingest(
      'mock',
      inbound(MockWebhookFactory.paymentSuccessful({ paymentId: 'pay_unknown' })),
    );
    await taskRunner.drain();

    expect(result.accepted).toBe(true);
    expect(ledger.size).toBe(0);
    expect(taskRunner.getStatistics()).toMatchObject({ failed: 1 });
    expect(eventsOf(GatewayEventType.WEBHOOK_TASK_FAILED)).toHaveLength(1);
  });

  it('should describe its stages', () => {
    expect(pipeline.getStatistics()).toMatchObject({
      syncStages: ['parse', 'validation'],
      asyncStages: ['status-verification', 'outcome'],
    });
  });
});
