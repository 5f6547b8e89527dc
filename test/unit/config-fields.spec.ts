import {
  ConfigField,
  ConfigurationError,
  isSensitiveKey,
  maskCredentialValue,
  maskCredentials,
  validateConfigFields,
} from '../../src';

const fields: ConfigField[] = [
  { key: 'apiKey', required: true, type: 'string', description: 'API key', minLength: 8, sensitive: true },
  { key: 'merchantId', required: true, type: 'string', description: 'Merchant', pattern: '^m_[0-9]+$' },
  { key: 'baseUrl', required: false, type: 'url', description: 'Base URL' },
  { key: 'timeout', required: false, type: 'number', description: 'Timeout' },
  { key: 'debug', required: false, type: 'boolean', description: 'Debug' },
  { key: 'contact', required: false, type: 'email', description: 'Contact', maxLength: 20 },
];

const valid = {
  apiKey: 'key_12345678',
  merchantId: 'm_42',
};

function configError(config: Record<string, string>): ConfigurationError | undefined {
  try {
    validateConfigFields('acmepay', config, fields);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error;
    }
    throw error;
  }
  return undefined;
}

describe('Provider config fields', () => {
  describe('validateConfigFields', () => {
    it('should accept a config with every required field', () => {
      expect(configError(valid)).toBeUndefined();
    });

    it('should name the missing field', () => {
      const error = configError({ apiKey: 'key_12345678' });
      expect(error?.message).toBe("acmepay: required field 'merchantId' is missing");
      expect(error?.providerName).toBe('acmepay');
      expect(error?.field).toBe('merchantId');
    });

    it('should reject blank required values', () => {
      expect(configError({ ...valid, apiKey: '   ' })?.message).toBe(
        "acmepay: required field 'apiKey' cannot be empty",
      );
    });

    it('should skip blank optional values', () => {
      expect(configError({ ...valid, baseUrl: '' })).toBeUndefined();
    });

    it('should check types', () => {
      expect(configError({ ...valid, baseUrl: 'ftp://files.test' })?.message).toBe(
        "acmepay: field 'baseUrl' must be a valid http(s) URL",
      );
      expect(configError({ ...valid, timeout: 'soon' })?.message).toBe(
        "acmepay: field 'timeout' must be a number",
      );
      expect(configError({ ...valid, debug: 'yes' })?.message).toBe(
        "acmepay: field 'debug' must be 'true' or 'false'",
      );
      expect(configError({ ...valid, contact: 'nobody' })?.message).toBe(
        "acmepay: field 'contact' must be a valid email address",
      );
    });

    it('should check patterns and lengths', () => {
      expect(configError({ ...valid, merchantId: 'merchant' })?.message).toBe(
        "acmepay: field 'merchantId' does not match pattern ^m_[0-9]+$",
      );
      expect(configError({ ...valid, apiKey: 'short' })?.message).toBe(
        "acmepay: field 'apiKey' must be at least 8 characters",
      );
      expect(configError({ ...valid, contact: 'someone.long@example.com' })?.message).toBe(
        "acmepay: field 'contact' must be at most 20 characters",
      );
    });
  });

  describe('isSensitiveKey', () => {
    it('should honour the sensitive flag', () => {
      expect(isSensitiveKey('apiKey', fields)).toBe(true);
    });

    it('should match secret-looking key names without a field definition', () => {
      expect(isSensitiveKey('webhookSecret')).toBe(true);
      expect(isSensitiveKey('password')).toBe(true);
      expect(isSensitiveKey('accessToken')).toBe(true);
      expect(isSensitiveKey('privateCert')).toBe(true);
      expect(isSensitiveKey('passwordHash')).toBe(true);
      expect(isSensitiveKey('salt')).toBe(true);
    });

    it('should leave ordinary keys readable', () => {
      expect(isSensitiveKey('merchantId', fields)).toBe(false);
      expect(isSensitiveKey('baseUrl')).toBe(false);
    });
  });

  describe('masking', () => {
    it('should keep the first and last four characters of long values', () => {
      expect(maskCredentialValue('sk_test_abcdef123456')).toBe('sk_t****3456');
    });

    it('should fully mask values of eight characters or fewer', () => {
      expect(maskCredentialValue('12345678')).toBe('****');
      expect(maskCredentialValue('abc')).toBe('****');
    });

    it('should mask only sensitive keys', () => {
      expect(
        maskCredentials(
          {
            apiKey: 'key_12345678',
            merchantId: 'm_42',
            webhookSecret: 'whsec',
            baseUrl: 'https://api.acmepay.test',
          },
          fields,
        ),
      ).toEqual({
        apiKey: 'key_****5678',
        merchantId: 'm_42',
        webhookSecret: '****',
        baseUrl: 'https://api.acmepay.test',
      });
    });
  });
});
