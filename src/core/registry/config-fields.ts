import { ConfigField, ProviderCredentials } from '../domain/models';
import { ConfigurationError } from '../errors';

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const SENSITIVE_KEY_PATTERN = /key|secret|password|token|private|hash|salt/i;

/**
 * Shared credential validation for plugins' validateConfig.
 * Throws on the first violation, naming the provider and field.
 */
export function validateConfigFields(
  providerName: string,
  config: ProviderCredentials,
  fields: ConfigField[],
): void {
  for (const field of fields) {
    const value = config[field.key];

    if (value === undefined) {
      if (field.required) {
        throw new ConfigurationError(
          `${providerName}: required field '${field.key}' is missing`,
          providerName,
          field.key,
        );
      }
      continue;
    }

    if (value.trim() === '') {
      if (field.required) {
        throw new ConfigurationError(
          `${providerName}: required field '${field.key}' cannot be empty`,
          providerName,
          field.key,
        );
      }
      continue;
    }

    validateFieldType(providerName, field, value);
    validateFieldPattern(providerName, field, value);
    validateFieldLength(providerName, field, value);
  }
}

function validateFieldType(providerName: string, field: ConfigField, value: string): void {
  switch (field.type) {
    case 'boolean':
      if (value !== 'true' && value !== 'false') {
        throw fieldError(providerName, field, `must be 'true' or 'false'`);
      }
      return;
    case 'number':
      if (!Number.isFinite(Number(value))) {
        throw fieldError(providerName, field, 'must be a number');
      }
      return;
    case 'url':
      if (!isHttpUrl(value)) {
        throw fieldError(providerName, field, 'must be a valid http(s) URL');
      }
      return;
    case 'email':
      if (!EMAIL_PATTERN.test(value)) {
        throw fieldError(providerName, field, 'must be a valid email address');
      }
      return;
    case 'string':
      return;
  }
}

function validateFieldPattern(providerName: string, field: ConfigField, value: string): void {
  if (!field.pattern) {
    return;
  }
  if (!new RegExp(field.pattern).test(value)) {
    throw fieldError(providerName, field, `does not match pattern ${field.pattern}`);
  }
}

function validateFieldLength(providerName: string, field: ConfigField, value: string): void {
  if (field.minLength !== undefined && value.length < field.minLength) {
    throw fieldError(providerName, field, `must be at least ${field.minLength} characters`);
  }
  if (field.maxLength !== undefined && value.length > field.maxLength) {
    throw fieldError(providerName, field, `must be at most ${field.maxLength} characters`);
  }
}

function fieldError(providerName: string, field: ConfigField, problem: string): ConfigurationError {
  return new ConfigurationError(
    `${providerName}: field '${field.key}' ${problem}`,
    providerName,
    field.key,
  );
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Whether a credential key must be masked on read
 */
export function isSensitiveKey(key: string, fields: ConfigField[] = []): boolean {
  const field = fields.find((f) => f.key === key);
  return field?.sensitive === true || SENSITIVE_KEY_PATTERN.test(key);
}

/**
 * First 4 + '****' + last 4 for values longer than 8 characters, '****' otherwise
 */
export function maskCredentialValue(value: string): string {
  if (value.length > 8) {
    return `${value.slice(0, 4)}****${value.slice(-4)}`;
  }
  return '****';
}

export function maskCredentials(
  credentials: ProviderCredentials,
  fields: ConfigField[] = [],
): ProviderCredentials {
  const masked: ProviderCredentials = {};
  for (const [key, value] of Object.entries(credentials)) {
    masked[key] = isSensitiveKey(key, fields) ? maskCredentialValue(value) : value;
  }
  return masked;
}
