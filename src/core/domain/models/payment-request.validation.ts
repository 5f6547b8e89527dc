import { ValidationError } from '../../errors';
import { Money } from '../value-objects/money.vo';
import { PaymentRequest, RefundRequest } from './payment.model';

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

/**
 * Check the invariants of a canonical payment request.
 * Collects every violation before throwing so callers see them all at once.
 */
export function validatePaymentRequest(request: PaymentRequest): void {
  const errors: string[] = [];

  if (!Number.isFinite(request.amount) || request.amount <= 0) {
    errors.push('amount must be greater than 0');
  }

  if (!Money.isValidCurrency(request.currency)) {
    errors.push('currency must be a 3-letter ISO 4217 code');
  }

  if (!request.customer) {
    errors.push('customer is required');
  } else {
    if (!request.customer.name?.trim()) {
      errors.push('customer name is required');
    }
    if (!request.customer.email?.trim()) {
      errors.push('customer email is required');
    } else if (!EMAIL_PATTERN.test(request.customer.email)) {
      errors.push('customer email is invalid');
    }
  }

  if (request.use3D && !request.callbackUrl?.trim()) {
    errors.push('callbackUrl is required for 3D secure payments');
  }

  for (const field of ['callbackUrl', 'successUrl', 'errorUrl'] as const) {
    const value = request[field];
    if (value?.trim() && !isAbsoluteHttpUrl(value)) {
      errors.push(`${field} must be an absolute http(s) URL`);
    }
  }

  if (
    request.installmentCount !== undefined &&
    (!Number.isInteger(request.installmentCount) || request.installmentCount < 1)
  ) {
    errors.push('installmentCount must be a positive integer');
  }

  request.items?.forEach((item, index) => {
    if (!Number.isFinite(item.price) || item.price < 0) {
      errors.push(`items[${index}].price must not be negative`);
    }
  });

  if (errors.length > 0) {
    throw new ValidationError(`Invalid payment request: ${errors.join('; ')}`, errors);
  }
}

function isAbsoluteHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

export function validateRefundRequest(request: RefundRequest): void {
  const errors: string[] = [];

  if (!request.paymentId?.trim()) {
    errors.push('paymentId is required');
  }
  if (
    request.refundAmount !== undefined &&
    (!Number.isFinite(request.refundAmount) || request.refundAmount <= 0)
  ) {
    errors.push('refundAmount must be greater than 0');
  }
  if (request.currency !== undefined && !Money.isValidCurrency(request.currency)) {
    errors.push('currency must be a 3-letter ISO 4217 code');
  }

  if (errors.length > 0) {
    throw new ValidationError(`Invalid refund request: ${errors.join('; ')}`, errors);
  }
}
