import { StripeGateway } from './stripe.gateway';
import { GatewayRegistry } from './gateway-registry';
import { RazorpayGateway } from './razorpay.gateway';
import { GatewayError, VerificationFailedError } from '../../common/result/operation-result';

describe('StripeGateway', () => {
  let http: { get: jest.Mock; post: jest.Mock };
  let gateway: StripeGateway;

  beforeEach(() => {
    http = { get: jest.fn(), post: jest.fn() };
    gateway = new StripeGateway({ secretKey: 'sk_test_placeholder', publishableKey: 'pk_test_placeholder' }, http);
  });

  it('creates a payment intent with the receipt as idempotency key', async () => {
    http.post.mockResolvedValue({ data: { id: 'pi_1', amount: 250000, currency: 'inr', status: 'requires_payment_method', client_secret: 'pi_1_secret' } });

    await expect(gateway.createOrder('2500.00', 'INR', 'FEE-1')).resolves.toEqual({
      orderId: 'pi_1',
      amount: '2500.00',
      currency: 'INR',
      checkout: { clientSecret: 'pi_1_secret', publishableKey: 'pk_test_placeholder' },
    });
    const [url, body, config] = http.post.mock.calls[0];
    expect(url).toBe('https://api.stripe.com/v1/payment_intents');
    expect(new URLSearchParams(body).get('amount')).toBe('250000');
    expect(config.headers['Idempotency-Key']).toBe('FEE-1');
  });

  it('confirms only succeeded intents', async () => {
    http.get.mockResolvedValueOnce({ data: { id: 'pi_1', amount: 250000, amount_received: 250000, currency: 'inr', status: 'succeeded' } });
    await expect(gateway.confirm({ orderId: 'pi_1', paymentId: 'pi_1' })).resolves.toEqual({
      paymentId: 'pi_1',
      orderId: 'pi_1',
      amount: '2500.00',
    });

    http.get.mockResolvedValueOnce({ data: { id: 'pi_1', amount: 250000, currency: 'inr', status: 'processing' } });
    await expect(gateway.confirm({ orderId: 'pi_1', paymentId: 'pi_1' })).rejects.toBeInstanceOf(VerificationFailedError);
  });

  it('rejects callbacks whose payment is not the order', async () => {
    await expect(gateway.confirm({ orderId: 'pi_1', paymentId: 'pi_2' })).rejects.toBeInstanceOf(VerificationFailedError);
    expect(http.get).not.toHaveBeenCalled();
  });

  it('authenticates a callback naming its own intent', () => {
    expect(gateway.authenticateCallback({ orderId: 'pi_1', paymentId: 'pi_1' })).toBe(true);
    expect(gateway.authenticateCallback({ orderId: 'pi_1', paymentId: 'pi_2' })).toBe(false);
  });

  it('reports network failures as gateway errors', async () => {
    http.get.mockRejectedValue(new Error('socket hang up'));
    await expect(gateway.fetchPayment('pi_1')).rejects.toBeInstanceOf(GatewayError);
  });

  it('refuses to call the API without a secret key', async () => {
    const unconfigured = new StripeGateway({ secretKey: '' }, http);
    await expect(unconfigured.refund('pi_1', '10.00')).rejects.toThrow('Stripe is not configured');
  });
});

describe('GatewayRegistry', () => {
  const razorpay = new RazorpayGateway({ keyId: 'rzp_test_key', keySecret: 'test-secret' }, null);
  const stripe = new StripeGateway({ secretKey: 'sk_test_placeholder' }, { get: jest.fn(), post: jest.fn() });

  it('routes transactions by id prefix', () => {
    const registry = new GatewayRegistry([razorpay, stripe], 'stripe');
    expect(registry.forTransaction('pay_123')).toBe(razorpay);
    expect(registry.forTransaction('pi_123')).toBe(stripe);
    expect(registry.forTransaction('CHQ-001')).toBeNull();
  });

  it('has no active gateway when the chosen one is unconfigured', () => {
    expect(new GatewayRegistry([razorpay, stripe], 'razorpay').active()).toBeNull();
    expect(new GatewayRegistry([razorpay, stripe], 'stripe').active()).toBe(stripe);
  });
});
