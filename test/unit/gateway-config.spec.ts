import { mergeGatewayConfig } from '../../src';

describe('mergeGatewayConfig', () => {
  const required = {
    storage: { type: 'memory' as const },
    callback: { secret: 'test-secret', publicBaseUrl: 'https://gw.example' },
  };

  it('should fill every section from the defaults', () => {
    const config = mergeGatewayConfig(required);

    expect(config.callback).toEqual({
      secret: 'test-secret',
      publicBaseUrl: 'https://gw.example',
      ttlMs: 30 * 60 * 1000,
      redirectMethod: 'POST',
    });
    expect(config.providers).toEqual({
      paymentTimeoutMs: 30000,
      inquiryTimeoutMs: 10000,
      inquiryRetries: 1,
    });
    expect(config.webhooks?.taskTimeoutMs).toBe(120000);
    expect(config.rateLimit?.unauthenticatedLimit).toBe(10);
    expect(config.events?.logLevel).toBe('normal');
  });

  it('should let a section override single keys and keep the rest', () => {
    const config = mergeGatewayConfig({
      ...required,
      callback: { ...required.callback, redirectMethod: 'GET' },
      rateLimit: { limits: { status: 2 } },
    });

    expect(config.callback.redirectMethod).toBe('GET');
    expect(config.callback.ttlMs).toBe(30 * 60 * 1000);
    expect(config.rateLimit).toMatchObject({
      enabled: true,
      windowMs: 60000,
      limits: { status: 2 },
    });
  });
});
