import { PaymentStatus } from '../enums';
import { RawProviderResponse } from '../value-objects/raw-response.vo';

export interface CustomerAddress {
  city?: string;
  country?: string;
  address?: string;
  zipCode?: string;
  description?: string;
}

export interface Customer {
  id?: string;
  name: string;
  surname?: string;
  email: string;
  phoneNumber?: string;
  ipAddress?: string;
  address?: CustomerAddress;
}

export interface CardInfo {
  cardHolderName: string;
  cardNumber: string;
  expireMonth: string;
  expireYear: string;
  cvv: string;
}

export interface PaymentItem {
  id: string;
  name: string;
  description?: string;
  category?: string;
  price: number;
  quantity?: number;
}

/**
 * Canonical payment request every provider maps from
 */
export interface PaymentRequest {
  id?: string;
  referenceId?: string;
  /**
   * Major units, e.g. 150.00
   */
  amount: number;
  currency: string;
  customer: Customer;
  cardInfo?: CardInfo;
  items?: PaymentItem[];
  description?: string;
  /**
   * Where the customer returns after a 3D Secure challenge.
   * Required when use3D is set.
   */
  callbackUrl?: string;
  successUrl?: string;
  errorUrl?: string;
  use3D?: boolean;
  installmentCount?: number;
  paymentChannel?: string;
  paymentGroup?: string;
  conversationId?: string;
  locale?: string;
  clientIp?: string;
  clientUserAgent?: string;
  metadata?: Record<string, string>;
  tenantId?: string;
}

/**
 * Canonical payment response every provider maps to
 */
export interface PaymentResponse {
  success: boolean;
  status: PaymentStatus;
  message?: string;
  errorCode?: string;
  transactionId?: string;
  paymentId?: string;
  orderId?: string;
  amount?: number;
  currency?: string;
  /**
   * 3D flows only
   */
  redirectUrl?: string;
  html?: string;
  /**
   * Sealed callback state issued for a 3D payment
   */
  callbackState?: string;
  systemTime?: Date;
  fraudStatus?: number;
  providerResponse?: RawProviderResponse;
}

export interface PaymentStatusRequest {
  paymentId: string;
  conversationId?: string;
}

export interface CancelRequest {
  paymentId: string;
  reason?: string;
  description?: string;
  currency?: string;
  conversationId?: string;
}

export interface RefundRequest {
  paymentId: string;
  /**
   * Omitted for a full refund
   */
  refundAmount?: number;
  reason?: string;
  description?: string;
  currency?: string;
  conversationId?: string;
}

export interface RefundResponse {
  success: boolean;
  refundId?: string;
  paymentId: string;
  status?: PaymentStatus;
  refundAmount?: number;
  message?: string;
  errorCode?: string;
  systemTime?: Date;
  rawResponse?: RawProviderResponse;
}

export interface InstallmentInquiry {
  amount: number;
  currency: string;
  /**
   * First 6-8 digits of the card, when the processor prices per issuer
   */
  binNumber?: string;
}

export interface InstallmentOption {
  installmentCount: number;
  installmentAmount: number;
  totalAmount: number;
}

export interface InstallmentInfo {
  currency: string;
  options: InstallmentOption[];
}

export interface CommissionInquiry {
  amount: number;
  currency: string;
  installmentCount?: number;
}

export interface CommissionInfo {
  /**
   * Percentage, e.g. 2.9
   */
  rate: number;
  commissionAmount: number;
  netAmount: number;
  currency: string;
}
