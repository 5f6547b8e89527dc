import { AxiosError, AxiosHeaders } from 'axios';
import {
  ConfigurationError,
  Environment,
  PaymentRequest,
  PaymentStatus,
  PaystackProviderAdapter,
  PaystackWebhookFactory,
  ValidationError,
  flattenToStringMap,
} from '../../src';

const mockRequest = jest.fn();
const mockCreate = jest.fn((_config: unknown) => ({ request: mockRequest }));

jest.mock('axios', () => {
  const actual = jest.requireActual<typeof import('axios')>('axios');
  return {
    __esModule: true,
    ...actual,
    default: { ...actual.default, create: (config: unknown) => mockCreate(config) },
  };
});

const SECRET_KEY = 'sk_test_placeholder_key';

const card = {
  cardHolderName: 'Ada Lovelace',
  cardNumber: '4084 0840 8408 4081',
  expireMonth: '12',
  expireYear: '2030',
  cvv: '408',
};

const request: PaymentRequest = {
  referenceId: 'ref_1',
  amount: 100,
  currency: 'ngn',
  customer: { name: 'Ada', email: 'ada@example.com' },
};

describe('PaystackProviderAdapter', () => {
  let adapter: PaystackProviderAdapter;

  const respondWith = (body: unknown) =>
    mockRequest.mockResolvedValue({ data: JSON.stringify(body), status: 200, statusText: 'OK' });

  const failWith = (body: unknown, status: number, statusText: string) =>
    mockRequest.mockRejectedValue(
      new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_REQUEST', undefined, undefined, {
        data: JSON.stringify(body),
        status,
        statusText,
        headers: {},
        config: { headers: new AxiosHeaders() },
      }),
    );

  const sentRequest = (call = 0) => {
    const [config] = mockRequest.mock.calls[call];
    return {
      url: config.url,
      method: config.method,
      body: config.data,
      signal: config.signal,
    };
  };

  beforeEach(() => {
    mockRequest.mockReset();
    mockCreate.mockClear();
    adapter = new PaystackProviderAdapter();
    adapter.initialize({ secretKey: SECRET_KEY });
  });

  describe('configuration', () => {
    it('should accept a well-formed secret key', () => {
      expect(() => adapter.validateConfig({ secretKey: SECRET_KEY })).not.toThrow();
    });

    it('should reject a key that is not a Paystack secret key', () => {
      expect(() => adapter.validateConfig({ secretKey: 'pk_test_placeholder_key' })).toThrow(
        ConfigurationError,
      );
    });

    it('should show live key examples for production', () => {
      const [secretKey] = adapter.getRequiredConfig(Environment.PRODUCTION);
      expect(secretKey.example).toBe('sk_live_xxxxxxxxxxxxxxxx');
    });

    it('should build a client for the API with bearer auth', () => {
      expect(mockCreate).toHaveBeenCalledWith({
        baseURL: 'https://api.paystack.co',
        timeout: 30000,
        responseType: 'text',
        headers: {
          Authorization: `Bearer ${SECRET_KEY}`,
          'Content-Type': 'application/json',
        },
      });
    });

    it('should trim a trailing slash from a custom base URL', () => {
      adapter.initialize({ secretKey: SECRET_KEY, baseUrl: 'https://paystack.proxy.test/' });

      expect(mockCreate).toHaveBeenLastCalledWith(
        expect.objectContaining({ baseURL: 'https://paystack.proxy.test' }),
      );
    });
  });

  describe('payments', () => {
    it('should charge a card in kobo', async () => {
      respondWith({
        status: true,
        message: 'Charge attempted',
        data: {
          id: 42,
          status: 'success',
          reference: 'ref_1',
          amount: 10000,
          currency: 'NGN',
          gateway_response: 'Approved',
        },
      });

      const response = await adapter.createPayment({ ...request, cardInfo: card });

      expect(response).toMatchObject({
        success: true,
        status: PaymentStatus.SUCCESSFUL,
        paymentId: 'ref_1',
        transactionId: '42',
        amount: 100,
        currency: 'NGN',
        message: 'Approved',
      });

      const sent = sentRequest();
      expect(sent.url).toBe('/charge');
      expect(sent.method).toBe('POST');
      expect(sent.body).toMatchObject({
        email: 'ada@example.com',
        amount: 10000,
        currency: 'NGN',
        reference: 'ref_1',
        card: { number: '4084084084084081', cvv: '408', expiry_month: '12', expiry_year: '2030' },
      });
    });

    it('should use hosted checkout for 3D payments', async () => {
      respondWith({
        status: true,
        message: 'Authorization URL created',
        data: {
          authorization_url: 'https://checkout.paystack.com/access_1',
          access_code: 'access_1',
          reference: 'ref_1',
        },
      });

      const response = await adapter.create3DPayment({
        ...request,
        use3D: true,
        callbackUrl: 'https://gw.example/callback/paystack?state=abc',
      });

      expect(response).toMatchObject({
        success: true,
        status: PaymentStatus.PENDING,
        paymentId: 'ref_1',
        orderId: 'access_1',
        redirectUrl: 'https://checkout.paystack.com/access_1',
      });
      expect(sentRequest().url).toBe('/transaction/initialize');
      expect(sentRequest().body).toMatchObject({
        callback_url: 'https://gw.example/callback/paystack?state=abc',
      });
    });

    it('should verify by the reference Paystack returns on the callback', async () => {
      respondWith({ status: true, message: 'Verification successful', data: { status: 'success', reference: 'ref_cb' } });

      await adapter.complete3DPayment(
        {
          paymentId: 'ref_1',
          tenantId: 'ACME',
          providerName: 'paystack',
          environment: Environment.SANDBOX,
          originalCallbackUrl: 'https://shop.example/return',
          issuedAt: 0,
          expiresAt: 1,
        },
        { trxref: 'ref_cb', reference: 'ref_cb' },
      );

      expect(sentRequest().url).toBe('/transaction/verify/ref_cb');
      expect(sentRequest().method).toBe('GET');
    });

    it('should map a failed verification', async () => {
      respondWith({
        status: true,
        message: 'Verification successful',
        data: { status: 'failed', reference: 'ref_1', gateway_response: 'Declined' },
      });

      const response = await adapter.getPaymentStatus({ paymentId: 'ref_1' });

      expect(response).toMatchObject({
        success: false,
        status: PaymentStatus.FAILED,
        errorCode: 'failed',
        message: 'Declined',
      });
    });

    it('should refuse a direct charge without card details', async () => {
      await expect(adapter.createPayment(request)).rejects.toThrow(ValidationError);
      await expect(adapter.createPayment(request)).rejects.toThrow(
        'cardInfo is required for direct Paystack charges; use use3D for hosted checkout',
      );
      expect(mockRequest).not.toHaveBeenCalled();
    });

    it('should fail a direct charge that stops for customer action', async () => {
      respondWith({ status: true, message: 'Charge attempted', data: { status: 'send_otp', reference: 'ref_1' } });

      const response = await adapter.createPayment({ ...request, cardInfo: card });

      expect(response).toMatchObject({
        success: false,
        status: PaymentStatus.FAILED,
        paymentId: 'ref_1',
        errorCode: 'requires_3d',
        message: 'Charge needs customer action (send_otp); retry with use3D',
      });
    });

    it('should report an ongoing transaction as processing', async () => {
      respondWith({ status: true, message: 'Verification successful', data: { status: 'ongoing', reference: 'ref_1' } });

      const response = await adapter.getPaymentStatus({ paymentId: 'ref_1' });

      expect(response).toMatchObject({ success: true, status: PaymentStatus.PROCESSING });
    });

    it('should pass the abort signal to the HTTP client', async () => {
      respondWith({ status: true, message: 'Verification successful', data: { status: 'success' } });
      const controller = new AbortController();

      await adapter.getPaymentStatus({ paymentId: 'ref_1' }, { signal: controller.signal });

      expect(sentRequest().signal).toBe(controller.signal);
    });

    it('should throw on an API error', async () => {
      failWith({ status: false, message: 'Invalid key' }, 401, 'Unauthorized');

      await expect(adapter.getPaymentStatus({ paymentId: 'ref_1' })).rejects.toThrow(
        'Paystack API error: 401 Invalid key',
      );
    });

    it('should fall back to the status text when the error body is not JSON', async () => {
      mockRequest.mockRejectedValue(
        new AxiosError('Request failed with status code 502', 'ERR_BAD_RESPONSE', undefined, undefined, {
          data: '<html>Bad Gateway</html>',
          status: 502,
          statusText: 'Bad Gateway',
          headers: {},
          config: { headers: new AxiosHeaders() },
        }),
      );

      await expect(adapter.getPaymentStatus({ paymentId: 'ref_1' })).rejects.toThrow(
        'Paystack API error: 502 Bad Gateway',
      );
    });
  });

  describe('refunds', () => {
    it('should send partial refunds in kobo', async () => {
      respondWith({
        status: true,
        message: 'Refund has been queued for processing',
        data: { id: 7, status: 'pending', amount: 5000 },
      });

      const response = await adapter.refundPayment({
        paymentId: 'ref_1',
        refundAmount: 50,
        currency: 'ngn',
      });

      expect(response).toMatchObject({
        success: true,
        refundId: '7',
        status: PaymentStatus.PROCESSING,
        refundAmount: 50,
      });
      expect(sentRequest().body).toMatchObject({ transaction: 'ref_1', amount: 5000, currency: 'NGN' });
    });

    it('should cancel through a full refund', async () => {
      respondWith({ status: true, message: 'Refund has been queued for processing', data: { status: 'pending' } });

      const response = await adapter.cancelPayment({ paymentId: 'ref_1', reason: 'duplicate order' });

      expect(response.status).toBe(PaymentStatus.CANCELLED);
      expect(sentRequest().body).toEqual({ transaction: 'ref_1', merchant_note: 'duplicate order' });
    });
  });

  describe('inquiries', () => {
    it('should offer a single installment', async () => {
      await expect(adapter.getInstallmentCount({ amount: 250, currency: 'ngn' })).resolves.toEqual({
        currency: 'NGN',
        options: [{ installmentCount: 1, installmentAmount: 250, totalAmount: 250 }],
      });
    });

    it('should cap local fees', async () => {
      const capped = await adapter.getCommission({ amount: 200000, currency: 'NGN' });
      const foreign = await adapter.getCommission({ amount: 100, currency: 'USD' });

      expect(capped).toEqual({ rate: 1.5, commissionAmount: 2000, netAmount: 198000, currency: 'NGN' });
      expect(foreign).toEqual({ rate: 1.5, commissionAmount: 1.5, netAmount: 98.5, currency: 'USD' });
      expect(mockRequest).not.toHaveBeenCalled();
    });
  });

  describe('webhooks', () => {
    const validate = (webhook: ReturnType<typeof PaystackWebhookFactory.chargeSuccess>) =>
      adapter.validateWebhook({
        data: flattenToStringMap(JSON.parse(webhook.body.toString('utf8'))),
        headers: webhook.headers,
        rawBody: webhook.body,
      });

    it('should verify a charge.success signed with the secret key', async () => {
      const result = await validate(PaystackWebhookFactory.chargeSuccess({ reference: 'ref_9' }, SECRET_KEY));

      expect(result).toMatchObject({ valid: true, paymentId: 'ref_9', status: PaymentStatus.SUCCESSFUL });
    });

    it('should map refund events', async () => {
      const result = await validate(PaystackWebhookFactory.refundProcessed({ reference: 'ref_9' }, SECRET_KEY));

      expect(result.status).toBe(PaymentStatus.REFUNDED);
    });

    it('should accept the previous key during rotation', async () => {
      adapter.initialize({ secretKey: 'sk_test_rotated_key_01', previousSecretKey: SECRET_KEY });

      const result = await validate(PaystackWebhookFactory.chargeFailed({ reference: 'ref_9' }, SECRET_KEY));

      expect(result).toMatchObject({ valid: true, status: PaymentStatus.FAILED });
    });

    it('should reject a signature from another key', async () => {
      const result = await validate(
        PaystackWebhookFactory.chargeSuccess({ reference: 'ref_9' }, 'sk_test_other_key_000'),
      );

      expect(result).toMatchObject({ valid: false, reason: 'Webhook signature mismatch' });
    });

    it('should reject a webhook without a signature', async () => {
      const webhook = PaystackWebhookFactory.chargeSuccess({ reference: 'ref_9' }, SECRET_KEY);

      const result = await adapter.validateWebhook({
        data: {},
        headers: { 'content-type': 'application/json' },
        rawBody: webhook.body,
      });

      expect(result.reason).toBe('Missing x-paystack-signature header');
    });
  });
});
