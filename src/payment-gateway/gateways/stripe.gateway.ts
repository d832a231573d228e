import axios, { AxiosInstance, isAxiosError } from 'axios';
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

interface StripePaymentIntent {
  id: string;
  amount: number;
  amount_received?: number;
  currency: string;
  status: string;
  client_secret?: string | null;
}

interface StripeRefund {
  id: string;
  status: string;
}

export interface StripeSettings {
  secretKey: string;
  publishableKey?: string;
  baseUrl?: string;
}

type StripeHttp = Pick<AxiosInstance, 'get' | 'post'>;

export const STRIPE_API_URL = 'https://api.stripe.com/v1';

/**
 * Stripe PaymentIntents over the REST API. The intent is both the order and the
 * payment, so the callback carries the same `pi_` id twice and there is no signature.
 */
export class StripeGateway implements PaymentGateway {
  readonly name = 'stripe' as const;
  private readonly logger = new Logger(StripeGateway.name);
  private readonly baseUrl: string;

  constructor(
    private readonly settings: StripeSettings,
    private readonly http: StripeHttp = axios,
  ) {
    this.baseUrl = settings.baseUrl ?? STRIPE_API_URL;
  }

  isConfigured(): boolean {
    return Boolean(this.settings.secretKey);
  }

  async createOrder(amount: Amount, currency: string, receipt: string): Promise<GatewayOrderResult> {
    const form = new URLSearchParams({
      amount: String(toSubunits(amount)),
      currency: currency.toLowerCase(),
      'metadata[receipt]': receipt,
      'automatic_payment_methods[enabled]': 'true',
    });
    const intent = await this.call('create payment intent', () =>
      this.http.post<StripePaymentIntent>(`${this.baseUrl}/payment_intents`, form.toString(), this.requestConfig(receipt)),
    );
    return {
      orderId: intent.id,
      amount: fromSubunits(intent.amount),
      currency: intent.currency.toUpperCase(),
      checkout: {
        ...(intent.client_secret ? { clientSecret: intent.client_secret } : {}),
        ...(this.settings.publishableKey ? { publishableKey: this.settings.publishableKey } : {}),
      },
    };
  }

  /** Stripe signs nothing on the client; a payment intent is its own order. */
  authenticateCallback(callback: PaymentCallback): boolean {
    return callback.orderId === callback.paymentId;
  }

  async verify(orderId: string, paymentId: string): Promise<boolean> {
    if (orderId !== paymentId) return false;
    const payment = await this.fetchPayment(paymentId);
    return payment.status === 'succeeded';
  }

  async fetchPayment(paymentId: string): Promise<GatewayPaymentInfo> {
    const intent = await this.call('fetch payment intent', () =>
      this.http.get<StripePaymentIntent>(`${this.baseUrl}/payment_intents/${encodeURIComponent(paymentId)}`, this.requestConfig()),
    );
    return {
      paymentId: intent.id,
      orderId: intent.id,
      status: intent.status,
      amount: fromSubunits(intent.amount_received ?? intent.amount),
    };
  }

  async refund(paymentId: string, amount: Amount): Promise<GatewayRefundResult> {
    const form = new URLSearchParams({ payment_intent: paymentId, amount: String(toSubunits(amount)) });
    const refund = await this.call('refund payment intent', () =>
      this.http.post<StripeRefund>(`${this.baseUrl}/refunds`, form.toString(), this.requestConfig()),
    );
    return { refundId: refund.id, status: refund.status };
  }

  async confirm(callback: PaymentCallback): Promise<ConfirmedPayment> {
    if (callback.orderId !== callback.paymentId) {
      throw new VerificationFailedError(`Payment ${callback.paymentId} does not belong to order ${callback.orderId}`);
    }
    const payment = await this.fetchPayment(callback.paymentId);
    if (payment.status !== 'succeeded') {
      throw new VerificationFailedError(`Payment ${callback.paymentId} is ${payment.status}`);
    }
    return { paymentId: payment.paymentId, orderId: callback.orderId, amount: payment.amount };
  }

  ownsTransaction(transactionId: string): boolean {
    return transactionId.startsWith('pi_');
  }

  private requestConfig(idempotencyKey?: string) {
    return {
      headers: {
        Authorization: `Bearer ${this.settings.secretKey}`,
        'Content-Type': 'application/x-www-form-urlencoded',
        ...(idempotencyKey ? { 'Idempotency-Key': idempotencyKey } : {}),
      },
      timeout: 30000,
    };
  }

  private async call<T>(operation: string, request: () => Promise<{ data: T }>): Promise<T> {
    if (!this.isConfigured()) {
      throw new GatewayError(this.name, 'Stripe is not configured');
    }
    try {
      const response = await request();
      return response.data;
    } catch (error) {
      const message = describeStripeError(error);
      this.logger.error(`Stripe ${operation} failed: ${message}`);
      throw new GatewayError(this.name, `Stripe ${operation} failed: ${message}`, error);
    }
  }
}

function describeStripeError(error: unknown): string {
  if (isAxiosError(error)) {
    const body: unknown = error.response?.data;
    if (typeof body === 'object' && body !== null && 'error' in body) {
      const inner: unknown = body.error;
      if (typeof inner === 'object' && inner !== null && 'message' in inner && typeof inner.message === 'string') {
        return inner.message;
      }
    }
    return error.response ? `HTTP ${error.response.status}` : error.message;
  }
  return errorMessage(error);
}
