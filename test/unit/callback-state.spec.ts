import {
  CallbackStateCodec,
  CallbackStateInput,
  Environment,
  PaymentStatus,
  StateExpiredError,
  StateRejectionReason,
  buildCallbackRedirect,
  mergeCallbackPayload,
  renderCallbackErrorPage,
  renderRedirectForm,
} from '../../src';

const input: CallbackStateInput = {
  paymentId: 'pay_3d_1',
  tenantId: 'ACME',
  providerName: 'mock',
  environment: Environment.SANDBOX,
  originalCallbackUrl: 'https://shop.example/return',
  successUrl: 'https://shop.example/success',
  errorUrl: 'https://shop.example/error',
  amount: 150,
  currency: 'USD',
};

function rejectionReason(fn: () => unknown): StateRejectionReason | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof StateExpiredError) {
      return error.reason;
    }
    throw error;
  }
  return undefined;
}

describe('CallbackStateCodec', () => {
  let now: number;
  let codec: CallbackStateCodec;

  beforeEach(() => {
    now = 1_000_000;
    codec = new CallbackStateCodec('test-secret', { ttlMs: 1000, clock: () => now });
  });

  it('should require a secret', () => {
    expect(() => new CallbackStateCodec('')).toThrow('Callback state secret is required');
  });

  it('should open what it sealed', () => {
    const token = codec.encode(input);

    expect(codec.decode(token)).toEqual({
      ...input,
      issuedAt: 1_000_000,
      expiresAt: 1_001_000,
    });
  });

  it('should produce url-safe tokens that differ per encoding', () => {
    const first = codec.encode(input);
    const second = codec.encode(input);

    expect(first).toMatch(/^[A-Za-z0-9_-]+$/);
    expect(second).not.toBe(first);
  });

  it('should reject tokens after expiry', () => {
    const token = codec.encode(input);

    now = 1_001_000;
    expect(codec.decode(token).paymentId).toBe('pay_3d_1');

    now = 1_001_001;
    expect(rejectionReason(() => codec.decode(token))).toBe('expired');
  });

  it('should reject a modified token', () => {
    const sealed = Buffer.from(codec.encode(input), 'base64url');
    sealed[14] = sealed[14] ^ 0xff;

    expect(rejectionReason(() => codec.decode(sealed.toString('base64url')))).toBe('tampered');
  });

  it('should reject a token sealed under another secret', () => {
    const other = new CallbackStateCodec('other-secret', { clock: () => now });

    expect(rejectionReason(() => codec.decode(other.encode(input)))).toBe('tampered');
  });

  it('should reject empty and truncated tokens as malformed', () => {
    expect(rejectionReason(() => codec.decode(''))).toBe('malformed');
    expect(rejectionReason(() => codec.decode('abc'))).toBe('malformed');
  });

  it('should allow a token to be consumed only once', () => {
    const token = codec.encode(input);

    expect(codec.consume(token).tenantId).toBe('ACME');
    expect(rejectionReason(() => codec.consume(token))).toBe('consumed');
  });

  it('should refuse a consumed token presented in another base64 spelling', () => {
    const token = codec.encode(input);
    codec.consume(token);

    const standardAlphabet = Buffer.from(token, 'base64url').toString('base64');
    const padded = `${token}=`;

    expect(codec.decode(padded).paymentId).toBe('pay_3d_1');
    expect(rejectionReason(() => codec.consume(standardAlphabet))).toBe('consumed');
    expect(rejectionReason(() => codec.consume(padded))).toBe('consumed');
  });

  it('should still decode a consumed token for inspection', () => {
    const token = codec.encode(input);
    codec.consume(token);

    expect(codec.decode(token).paymentId).toBe('pay_3d_1');
  });
});

describe('callback redirect', () => {
  const state = { ...input, issuedAt: 0, expiresAt: 1000 };

  it('should merge callback fields with query taking precedence', () => {
    const merged = mergeCallbackPayload(
      { paymentId: 'from-query' },
      { paymentId: 'from-form', mdStatus: '1' },
      { paymentId: 'from-json', data: { status: 'success' } },
    );

    expect(merged).toEqual({
      paymentId: 'from-query',
      mdStatus: '1',
      'data.status': 'success',
    });
  });

  it('should send a successful outcome to the success url', () => {
    const redirect = buildCallbackRedirect(state, {
      success: true,
      status: PaymentStatus.SUCCESSFUL,
      paymentId: 'pay_3d_1',
      transactionId: 'txn_9',
      amount: 150,
    });

    expect(redirect).toEqual({
      url: 'https://shop.example/success',
      method: 'POST',
      fields: {
        paymentId: 'pay_3d_1',
        status: 'successful',
        transactionId: 'txn_9',
        amount: '150',
      },
    });
  });

  it('should send a declined outcome to the error url with its reason', () => {
    const redirect = buildCallbackRedirect(
      state,
      {
        success: false,
        status: PaymentStatus.FAILED,
        errorCode: 'card_declined',
        message: 'Card declined',
      },
      'GET',
    );

    expect(redirect).toEqual({
      url: 'https://shop.example/error',
      method: 'GET',
      fields: {
        paymentId: 'pay_3d_1',
        status: 'failed',
        amount: '150',
        errorCode: 'card_declined',
        message: 'Card declined',
      },
    });
  });

  it('should not leak error details when completion threw', () => {
    const redirect = buildCallbackRedirect(
      { ...state, errorUrl: undefined },
      new Error('socket hang up'),
    );

    expect(redirect.url).toBe('https://shop.example/return');
    expect(redirect.fields).toEqual({
      paymentId: 'pay_3d_1',
      status: 'failed',
      message: 'Payment could not be completed',
      amount: '150',
    });
  });

  it('should render a GET form carrying the query string as hidden fields', () => {
    const html = renderRedirectForm({
      url: 'https://shop.example/return?order=42',
      method: 'GET',
      fields: { paymentId: 'pay_3d_1', status: 'successful' },
    });

    expect(html).toContain('<form method="get" action="https://shop.example/return">');
    expect(html).toContain('<input type="hidden" name="order" value="42">');
    expect(html).toContain('<input type="hidden" name="paymentId" value="pay_3d_1">');
  });

  it('should escape field values', () => {
    const html = renderRedirectForm({
      url: 'https://shop.example/return',
      method: 'POST',
      fields: { message: '<script>"x"</script>' },
    });

    expect(html).toContain(
      '<input type="hidden" name="message" value="&lt;script&gt;&quot;x&quot;&lt;/script&gt;">',
    );
  });

  it('should render an error page without rejection details', () => {
    expect(renderCallbackErrorPage()).toContain(
      'This payment session is invalid or has expired.',
    );
  });
});
