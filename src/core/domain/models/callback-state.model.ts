import { Environment } from '../enums';

/**
 * Gateway context carried through a 3D Secure redirect round trip.
 * Self-describing: the callback may land on a different process.
 */
export interface CallbackState {
  paymentId: string;
  tenantId: string;
  providerName: string;
  environment: Environment;
  conversationId?: string;
  originalCallbackUrl: string;
  successUrl?: string;
  errorUrl?: string;
  amount?: number;
  currency?: string;
  clientIp?: string;
  /**
   * Epoch milliseconds
   */
  issuedAt: number;
  expiresAt: number;
}

export type CallbackStateInput = Omit<CallbackState, 'issuedAt' | 'expiresAt'>;
