import { Amount } from '../../common/money/money';

export type GatewayId = 'razorpay' | 'stripe';

export interface GatewayOrderResult {
  orderId: string;
  amount: Amount;
  currency: string;
  /** Extra values the checkout widget needs (publishable key, client secret). */
  checkout: Record<string, string>;
}

export interface GatewayPaymentInfo {
  paymentId: string;
  orderId: string | null;
  status: string;
  amount: Amount;
}

export interface GatewayRefundResult {
  refundId: string;
  status: string;
}

export interface PaymentCallback {
  orderId: string;
  paymentId: string;
  signature?: string | null;
}

export interface ConfirmedPayment {
  paymentId: string;
  orderId: string;
  amount: Amount;
}

/**
 * A payment provider. Network failures surface as GatewayError; a payment the
 * provider does not vouch for surfaces as VerificationFailedError.
 */
export interface PaymentGateway {
  readonly name: GatewayId;
  isConfigured(): boolean;
  createOrder(amount: Amount, currency: string, receipt: string): Promise<GatewayOrderResult>;
  verify(orderId: string, paymentId: string, signature: string | null | undefined): Promise<boolean>;
  fetchPayment(paymentId: string): Promise<GatewayPaymentInfo>;
  refund(paymentId: string, amount: Amount): Promise<GatewayRefundResult>;
  /** Checks the callback's own credentials without calling the provider. */
  authenticateCallback(callback: PaymentCallback): boolean;
  /** The provider's full confirmation path for a checkout callback. */
  confirm(callback: PaymentCallback): Promise<ConfirmedPayment>;
  ownsTransaction(transactionId: string): boolean;
}
