import Razorpay from 'razorpay';
import { createHmac, timingSafeEqual } from 'node:crypto';
import { Logger } from '@nestjs/common';
import { Amount, fromSubunits, toSubunits } from '../../common/money/money';
import { GatewayError, VerificationFailedError } from '../../common/result/operation-result';
import { errorMessage } from '../../common/utils/errors';
import {
  ConfirmedPayment,
  GatewayOrderResult,
  GatewayPaymentInfo,
  GatewayRefundResult,
  PaymentCallback,
  PaymentGateway,
} from './payment-gateway.interface';

interface RazorpayOrder {
  id: string;
  amount: number | string;
  currency: string;
}

interface RazorpayPayment {
  id: string;
  order_id: string;
  status: string;
  amount: number | string;
}

interface RazorpayRefund {
  id: string;
  status?: string;
}

/** The slice of the Razorpay SDK this gateway calls. */
export interface RazorpayClient {
  createOrder(params: { amount: number; currency: string; receipt: string }): Promise<RazorpayOrder>;
  fetchPayment(paymentId: string): Promise<RazorpayPayment>;
  refund(paymentId: string, params: { amount: number }): Promise<RazorpayRefund>;
}

export interface RazorpaySettings {
  keyId: string;
  keySecret: string;
}

const SETTLED_STATUSES = new Set(['captured', 'authorized']);

export function createRazorpayClient(settings: RazorpaySettings): RazorpayClient {
  const sdk = new Razorpay({ key_id: settings.keyId, key_secret: settings.keySecret });
  return {
    createOrder: (params) => sdk.orders.create(params),
    fetchPayment: (paymentId) => sdk.payments.fetch(paymentId),
    refund: (paymentId, params) => sdk.payments.refund(paymentId, params),
  };
}

/** Hex HMAC-SHA256 of `order_id|payment_id`, the checkout callback signature. */
export const signCheckout = (orderId: string, paymentId: string, secret: string): string =>
  createHmac('sha256', secret).update(`${orderId}|${paymentId}`).digest('hex');

export class RazorpayGateway implements PaymentGateway {
  readonly name = 'razorpay' as const;
  private readonly logger = new Logger(RazorpayGateway.name);

  constructor(
    private readonly settings: RazorpaySettings,
    private readonly client: RazorpayClient | null,
  ) {}

  isConfigured(): boolean {
    return this.client !== null && Boolean(this.settings.keyId && this.settings.keySecret);
  }

  async createOrder(amount: Amount, currency: string, receipt: string): Promise<GatewayOrderResult> {
    const order = await this.call('create order', (client) =>
      client.createOrder({ amount: toSubunits(amount), currency, receipt }),
    );
    return {
      orderId: order.id,
      amount: fromSubunits(order.amount),
      currency: order.currency,
      checkout: { keyId: this.settings.keyId },
    };
  }

  async verify(orderId: string, paymentId: string, signature: string | null | undefined): Promise<boolean> {
    return this.authenticateCallback({ orderId, paymentId, signature });
  }

  authenticateCallback({ orderId, paymentId, signature }: PaymentCallback): boolean {
    if (!signature || !this.settings.keySecret) return false;
    const expected = Buffer.from(signCheckout(orderId, paymentId, this.settings.keySecret), 'utf8');
    const received = Buffer.from(signature, 'utf8');
    return expected.length === received.length && timingSafeEqual(expected, received);
  }

  async fetchPayment(paymentId: string): Promise<GatewayPaymentInfo> {
    const payment = await this.call('fetch payment', (client) => client.fetchPayment(paymentId));
    return {
      paymentId: payment.id,
      orderId: payment.order_id || null,
      status: payment.status,
      amount: fromSubunits(payment.amount),
    };
  }

  async refund(paymentId: string, amount: Amount): Promise<GatewayRefundResult> {
    const refund = await this.call('refund payment', (client) => client.refund(paymentId, { amount: toSubunits(amount) }));
    return { refundId: refund.id, status: refund.status ?? 'processed' };
  }

  async confirm(callback: PaymentCallback): Promise<ConfirmedPayment> {
    if (!(await this.verify(callback.orderId, callback.paymentId, callback.signature))) {
      throw new VerificationFailedError('Payment signature verification failed');
    }
    const payment = await this.fetchPayment(callback.paymentId);
    if (payment.orderId !== callback.orderId) {
      throw new VerificationFailedError(`Payment ${callback.paymentId} does not belong to order ${callback.orderId}`);
    }
    if (!SETTLED_STATUSES.has(payment.status)) {
      throw new VerificationFailedError(`Payment ${callback.paymentId} is ${payment.status}`);
    }
    return { paymentId: payment.paymentId, orderId: callback.orderId, amount: payment.amount };
  }

  ownsTransaction(transactionId: string): boolean {
    return transactionId.startsWith('pay_');
  }

  private async call<T>(operation: string, work: (client: RazorpayClient) => Promise<T>): Promise<T> {
    if (!this.client || !this.isConfigured()) {
      throw new GatewayError(this.name, 'Razorpay is not configured');
    }
    try {
      return await work(this.client);
    } catch (error) {
      this.logger.error(`Razorpay ${operation} failed: ${describeRazorpayError(error)}`);
      throw new GatewayError(this.name, `Razorpay ${operation} failed: ${describeRazorpayError(error)}`, error);
    }
  }
}

// the SDK rejects with { statusCode, error: { description } } rather than an Error
function describeRazorpayError(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'error' in error) {
    const inner: unknown = error.error;
    if (typeof inner === 'object' && inner !== null && 'description' in inner && typeof inner.description === 'string') {
      return inner.description;
    }
  }
  return errorMessage(error);
}
