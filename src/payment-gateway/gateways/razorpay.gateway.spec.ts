import { RazorpayClient, RazorpayGateway, signCheckout } from './razorpay.gateway';
import { GatewayError, VerificationFailedError } from '../../common/result/operation-result';

describe('RazorpayGateway', () => {
  const settings = { keyId: 'rzp_test_key', keySecret: 'test-secret' };
  let client: { createOrder: jest.Mock; fetchPayment: jest.Mock; refund: jest.Mock };
  let gateway: RazorpayGateway;

  beforeEach(() => {
    client = { createOrder: jest.fn(), fetchPayment: jest.fn(), refund: jest.fn() };
    gateway = new RazorpayGateway(settings, client as RazorpayClient);
  });

  it('creates orders in paise', async () => {
    client.createOrder.mockResolvedValue({ id: 'order_A1', amount: 400000, currency: 'INR' });

    await expect(gateway.createOrder('4000.00', 'INR', 'FEE-20240510093000-ab12cd34')).resolves.toEqual({
      orderId: 'order_A1',
      amount: '4000.00',
      currency: 'INR',
      checkout: { keyId: 'rzp_test_key' },
    });
    expect(client.createOrder).toHaveBeenCalledWith({ amount: 400000, currency: 'INR', receipt: 'FEE-20240510093000-ab12cd34' });
  });

  it('accepts only the HMAC of order and payment id', async () => {
    const signature = signCheckout('order_A1', 'pay_B2', 'test-secret');

    await expect(gateway.verify('order_A1', 'pay_B2', signature)).resolves.toBe(true);
    await expect(gateway.verify('order_A1', 'pay_B3', signature)).resolves.toBe(false);
    await expect(gateway.verify('order_A1', 'pay_B2', 'deadbeef')).resolves.toBe(false);
    await expect(gateway.verify('order_A1', 'pay_B2', null)).resolves.toBe(false);
  });

  it('authenticates callbacks offline', () => {
    const signature = signCheckout('order_A1', 'pay_B2', 'test-secret');

    expect(gateway.authenticateCallback({ orderId: 'order_A1', paymentId: 'pay_B2', signature })).toBe(true);
    expect(gateway.authenticateCallback({ orderId: 'order_C3', paymentId: 'pay_B2', signature })).toBe(false);
    expect(client.fetchPayment).not.toHaveBeenCalled();
  });

  it('confirms a signed, captured payment of the same order', async () => {
    client.fetchPayment.mockResolvedValue({ id: 'pay_B2', order_id: 'order_A1', status: 'captured', amount: 400000 });

    await expect(
      gateway.confirm({ orderId: 'order_A1', paymentId: 'pay_B2', signature: signCheckout('order_A1', 'pay_B2', 'test-secret') }),
    ).resolves.toEqual({ paymentId: 'pay_B2', orderId: 'order_A1', amount: '4000.00' });
  });

  it('rejects a forged signature without calling the API', async () => {
    await expect(gateway.confirm({ orderId: 'order_A1', paymentId: 'pay_B2', signature: 'forged' })).rejects.toBeInstanceOf(
      VerificationFailedError,
    );
    expect(client.fetchPayment).not.toHaveBeenCalled();
  });

  it('rejects payments that have not been captured', async () => {
    client.fetchPayment.mockResolvedValue({ id: 'pay_B2', order_id: 'order_A1', status: 'failed', amount: 400000 });

    await expect(
      gateway.confirm({ orderId: 'order_A1', paymentId: 'pay_B2', signature: signCheckout('order_A1', 'pay_B2', 'test-secret') }),
    ).rejects.toThrow('Payment pay_B2 is failed');
  });

  it('wraps SDK errors as gateway errors', async () => {
    client.refund.mockRejectedValue({ statusCode: 400, error: { description: 'The amount is invalid' } });

    const failure = gateway.refund('pay_B2', '1500.00');
    await expect(failure).rejects.toBeInstanceOf(GatewayError);
    await expect(failure).rejects.toThrow('Razorpay refund payment failed: The amount is invalid');
    expect(client.refund).toHaveBeenCalledWith('pay_B2', { amount: 150000 });
  });

  it('is not configured without a client', () => {
    expect(new RazorpayGateway(settings, null).isConfigured()).toBe(false);
    expect(gateway.ownsTransaction('pay_B2')).toBe(true);
    expect(gateway.ownsTransaction('pi_123')).toBe(false);
  });
});
