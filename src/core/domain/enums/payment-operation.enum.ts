/**
 * Provider operations the orchestration layer can dispatch.
 * Carried on UpstreamError so logs show which call failed.
 */
export enum PaymentOperation {
  CREATE_PAYMENT = 'createPayment',
  CREATE_3D_PAYMENT = 'create3DPayment',
  COMPLETE_3D_PAYMENT = 'complete3DPayment',
  GET_PAYMENT_STATUS = 'getPaymentStatus',
  CANCEL_PAYMENT = 'cancelPayment',
  REFUND_PAYMENT = 'refundPayment',
  GET_INSTALLMENT_COUNT = 'getInstallmentCount',
  GET_COMMISSION = 'getCommission',
  VALIDATE_WEBHOOK = 'validateWebhook',
}

/**
 * Inquiries with no financial side effect; safe to retry
 */
export const READ_ONLY_OPERATIONS: ReadonlySet<PaymentOperation> = new Set([
  PaymentOperation.GET_PAYMENT_STATUS,
  PaymentOperation.GET_INSTALLMENT_COUNT,
  PaymentOperation.GET_COMMISSION,
]);

export function isReadOnlyOperation(operation: PaymentOperation): boolean {
  return READ_ONLY_OPERATIONS.has(operation);
}
