import { ConfigService } from '../src/config/config.service';
import { PaymentMode, PaymentStatus } from '../src/finance/entities/payment.entity';
import { FeeNotificationService } from '../src/finance/services/fee-notification.service';
import { SystemLoggingService } from '../src/logs/system-logging.service';
import { GatewayOrderStatus } from '../src/payment-gateway/entities/gateway-order.entity';
import { GatewayRegistry } from '../src/payment-gateway/gateways/gateway-registry';
import { RazorpayGateway, signCheckout } from '../src/payment-gateway/gateways/razorpay.gateway';
import { StripeGateway } from '../src/payment-gateway/gateways/stripe.gateway';
import { ReconciliationService, mockOrderId } from '../src/payment-gateway/reconciliation.service';
import { Role } from '../src/user/enums/role.enum';
import { InMemoryLedgerStore } from './support/in-memory-ledger-store';
import {
  SCHOOL_ID,
  STRUCTURE_ID,
  STUDENT_ID,
  auditMock,
  buildRecorder,
  financeActor,
  fixedClock,
  notificationsMock,
  seedLedger,
} from './support/ledger-fixtures';

const SECRET = 'test-secret';
const RECEIPT_PATTERN = /^FEE-20240510093000-[0-9a-f]{8}$/;

describe('ReconciliationService', () => {
  let store: InMemoryLedgerStore;
  let razorpay: { createOrder: jest.Mock; fetchPayment: jest.Mock; refund: jest.Mock };
  let stripeHttp: { get: jest.Mock; post: jest.Mock };
  let notifications: ReturnType<typeof notificationsMock>;
  let audit: ReturnType<typeof auditMock>;
  let service: ReconciliationService;

  const build = (active: 'razorpay' | 'stripe' = 'razorpay', keySecret = SECRET) => {
    const clock = fixedClock();
    const { posting } = buildRecorder(store, clock);
    const registry = new GatewayRegistry(
      [
        new RazorpayGateway({ keyId: 'rzp_test_key', keySecret }, keySecret ? razorpay : null),
        new StripeGateway({ secretKey: 'sk_test_placeholder' }, stripeHttp),
      ],
      active,
    );
    return new ReconciliationService(
      store,
      registry,
      clock,
      posting,
      notifications as unknown as FeeNotificationService,
      audit as unknown as SystemLoggingService,
      new ConfigService({ PAYMENT_CURRENCY: 'INR' }),
    );
  };

  const razorpayOrder = (amount = '4000.00') =>
    store.addOrder({ gatewayOrderId: 'order_A1', schoolId: SCHOOL_ID, studentId: STUDENT_ID, feeStructureId: STRUCTURE_ID, amount });

  const signed = (orderId = 'order_A1', paymentId = 'pay_B2') => ({
    orderId,
    paymentId,
    signature: signCheckout(orderId, paymentId, SECRET),
  });

  const captured = (amount = 400000) =>
    razorpay.fetchPayment.mockResolvedValue({ id: 'pay_B2', order_id: 'order_A1', status: 'captured', amount });

  const recordCash = async (amount: string) => {
    const { recorder } = buildRecorder(store);
    const result = await recorder.recordPayment(financeActor, {
      studentId: STUDENT_ID,
      feeStructureId: STRUCTURE_ID,
      amount,
      paymentDate: '2024-05-09',
      paymentMode: PaymentMode.CASH,
    });
    if (!result.success) throw new Error(result.message);
    return result.data.payment;
  };

  beforeEach(() => {
    ({ store } = seedLedger());
    razorpay = { createOrder: jest.fn(), fetchPayment: jest.fn(), refund: jest.fn() };
    stripeHttp = { get: jest.fn(), post: jest.fn() };
    notifications = notificationsMock();
    audit = auditMock();
    service = build();
  });

  describe('createOrder', () => {
    it('opens a gateway order for the outstanding balance', async () => {
      await recordCash('4000');
      razorpay.createOrder.mockResolvedValue({ id: 'order_A1', amount: 600000, currency: 'INR' });

      const result = await service.createOrder(financeActor, { studentId: STUDENT_ID });

      expect(result).toMatchObject({
        success: true,
        message: 'Order created',
        data: {
          orderId: 'order_A1',
          gateway: 'razorpay',
          amount: '6000.00',
          currency: 'INR',
          studentId: STUDENT_ID,
          feeStructureId: STRUCTURE_ID,
          checkout: { keyId: 'rzp_test_key' },
        },
      });
      expect(razorpay.createOrder).toHaveBeenCalledWith({
        amount: 600000,
        currency: 'INR',
        receipt: expect.stringMatching(RECEIPT_PATTERN),
      });
      expect(store.order('order_A1')).toMatchObject({ status: GatewayOrderStatus.CREATED, amount: '6000.00', createdById: 'finance-user' });
    });

    it('refuses more than the outstanding balance', async () => {
      await recordCash('4000');

      const result = await service.createOrder(financeActor, { studentId: STUDENT_ID, amount: '6000.01' });

      expect(result).toEqual({
        success: false,
        status: 'validation_error',
        message: 'Amount exceeds the outstanding balance of 6000.00',
      });
      expect(razorpay.createOrder).not.toHaveBeenCalled();
    });

    it('refuses a fully paid fee', async () => {
      await recordCash('10000');

      const result = await service.createOrder(financeActor, { studentId: STUDENT_ID });

      expect(result).toMatchObject({ success: false, message: 'No outstanding balance for this fee structure' });
    });

    it('keeps parents to their own children', async () => {
      const result = await service.createOrder(
        { userId: 'other-parent', role: Role.PARENT, schoolId: SCHOOL_ID },
        { studentId: STUDENT_ID },
      );

      expect(result).toEqual({
        success: false,
        status: 'forbidden',
        message: 'Parents may only act on fees of their own children',
      });
    });

    it('falls back to a mock order when the gateway call fails', async () => {
      razorpay.createOrder.mockRejectedValue({ statusCode: 500, error: { description: 'Service unavailable' } });

      const result = await service.createOrder(financeActor, { studentId: STUDENT_ID, amount: '2500' });

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.message).toBe('Mock order created; it cannot be settled online');
      expect(result.data.gateway).toBe('mock');
      expect(result.data.receipt).toMatch(RECEIPT_PATTERN);
      expect(result.data.orderId).toBe(mockOrderId(result.data.receipt));
      expect(store.order(result.data.orderId)).toMatchObject({ gateway: 'mock', amount: '2500.00' });
    });

    it('issues a mock order when the active gateway has no credentials', async () => {
      service = build('razorpay', '');

      const result = await service.createOrder(financeActor, { studentId: STUDENT_ID });

      expect(result).toMatchObject({ success: true, data: { gateway: 'mock', amount: '10000.00' } });
      expect(razorpay.createOrder).not.toHaveBeenCalled();
    });
  });

  describe('processFeePayment', () => {
    it('records a verified payment against the order', async () => {
      razorpayOrder();
      captured();

      const result = await service.processFeePayment(financeActor, signed());

      expect(result).toMatchObject({
        success: true,
        status: 'ok',
        message: 'Payment verified and recorded. Receipt: RCP-20240510-0001',
      });
      expect(store.payments()).toEqual([
        expect.objectContaining({
          amount: '4000.00',
          paymentMode: PaymentMode.ONLINE,
          transactionId: 'pay_B2',
          paymentDate: '2024-05-10',
          remarks: 'Online payment via razorpay (order order_A1)',
        }),
      ]);
      expect(store.order('order_A1')).toMatchObject({ status: GatewayOrderStatus.PAID, paymentId: 'pay_B2' });
      expect(store.feeStatus(STUDENT_ID, STRUCTURE_ID)).toMatchObject({ paidAmount: '4000.00', remainingAmount: '6000.00' });
      expect(audit.logOnlinePaymentSettled).toHaveBeenCalledWith(financeActor, expect.objectContaining({ transactionId: 'pay_B2' }), 'order_A1');
      expect(notifications.notifyPaymentReceived).toHaveBeenCalledTimes(1);
    });

    it('answers a repeated callback with the payment already recorded', async () => {
      razorpayOrder();
      captured();
      await service.processFeePayment(financeActor, signed());

      const again = await service.processFeePayment(financeActor, signed());

      expect(again).toMatchObject({
        success: true,
        status: 'duplicate',
        message: 'Payment already processed',
        data: { payment: { transactionId: 'pay_B2', receiptNumber: 'RCP-20240510-0001' } },
      });
      expect(store.payments()).toHaveLength(1);
      expect(razorpay.fetchPayment).toHaveBeenCalledTimes(1);
      expect(audit.logDuplicateCallback).toHaveBeenCalledWith(financeActor, 'order_A1', 'pay_B2');
      expect(notifications.notifyPaymentReceived).toHaveBeenCalledTimes(1);
    });

    it('settles concurrent callbacks for the same payment once', async () => {
      razorpayOrder();
      captured();

      const results = await Promise.all([
        service.processFeePayment(financeActor, signed()),
        service.processFeePayment(financeActor, signed()),
      ]);

      expect(results.map((r) => r.success && r.status).sort()).toEqual(['duplicate', 'ok']);
      expect(store.payments()).toHaveLength(1);
      expect(store.feeStatus(STUDENT_ID, STRUCTURE_ID)?.paidAmount).toBe('4000.00');
    });

    it('rejects a forged replay of a settled callback', async () => {
      razorpayOrder();
      captured();
      await service.processFeePayment(financeActor, signed());

      const replay = await service.processFeePayment(financeActor, { orderId: 'order_A1', paymentId: 'pay_B2', signature: 'forged' });

      expect(replay).toEqual({
        success: false,
        status: 'verification_failed',
        message: 'Payment signature verification failed',
      });
      expect(audit.logDuplicateCallback).not.toHaveBeenCalled();
      expect(store.payments()).toHaveLength(1);
    });

    it('never hands out a payment that settled another order', async () => {
      razorpayOrder();
      captured();
      await service.processFeePayment(financeActor, signed());
      store.addStudent({ id: 'student-2', schoolId: SCHOOL_ID, classId: 'class-5a', parentUserId: 'parent-2' });
      store.addOrder({
        gatewayOrderId: 'order_C3',
        schoolId: SCHOOL_ID,
        studentId: 'student-2',
        feeStructureId: STRUCTURE_ID,
        amount: '4000.00',
      });
      const parent = { userId: 'parent-2', role: Role.PARENT, schoolId: SCHOOL_ID };

      const forged = await service.processFeePayment(parent, { orderId: 'order_C3', paymentId: 'pay_B2', signature: 'forged' });
      const signedForOwnOrder = await service.processFeePayment(parent, signed('order_C3', 'pay_B2'));

      expect(forged).toEqual({
        success: false,
        status: 'verification_failed',
        message: 'Payment signature verification failed',
      });
      expect(signedForOwnOrder).toEqual({
        success: false,
        status: 'conflict',
        message: 'Payment pay_B2 does not settle order order_C3',
      });
      expect(store.order('order_C3')?.status).toBe(GatewayOrderStatus.CREATED);
      expect(store.payments()).toHaveLength(1);
      expect(razorpay.fetchPayment).toHaveBeenCalledTimes(1);
    });

    it('rejects a forged signature without touching the ledger', async () => {
      razorpayOrder();

      const result = await service.processFeePayment(financeActor, { orderId: 'order_A1', paymentId: 'pay_B2', signature: 'forged' });

      expect(result).toEqual({
        success: false,
        status: 'verification_failed',
        message: 'Payment signature verification failed',
      });
      expect(store.payments()).toHaveLength(0);
      expect(store.order('order_A1')?.status).toBe(GatewayOrderStatus.CREATED);
      expect(store.commits).toBe(0);
    });

    it('rejects a captured amount that differs from the order', async () => {
      razorpayOrder();
      captured(300000);

      const result = await service.processFeePayment(financeActor, signed());

      expect(result).toEqual({
        success: false,
        status: 'verification_failed',
        message: 'Paid amount 3000.00 does not match the order amount 4000.00',
      });
      expect(store.payments()).toHaveLength(0);
    });

    it('never settles a mock order', async () => {
      store.addOrder({
        gatewayOrderId: 'order_mock_0123456789abcdef',
        gateway: 'mock',
        schoolId: SCHOOL_ID,
        studentId: STUDENT_ID,
        feeStructureId: STRUCTURE_ID,
        amount: '4000.00',
      });

      const result = await service.processFeePayment(financeActor, { orderId: 'order_mock_0123456789abcdef', paymentId: 'pay_X' });

      expect(result).toEqual({
        success: false,
        status: 'verification_failed',
        message: 'Order was issued without a payment gateway and cannot be confirmed',
      });
    });

    it('reports an unknown order', async () => {
      const result = await service.processFeePayment(financeActor, signed('order_missing'));

      expect(result).toEqual({ success: false, status: 'not_found', message: 'Payment order not found' });
    });

    it('reports gateway outages as gateway errors', async () => {
      razorpayOrder();
      razorpay.fetchPayment.mockRejectedValue(new Error('socket hang up'));

      const result = await service.processFeePayment(financeActor, signed());

      expect(result).toEqual({
        success: false,
        status: 'gateway_error',
        message: 'Razorpay fetch payment failed: socket hang up',
      });
    });

    it('confirms Stripe payment intents by their status', async () => {
      store.addOrder({
        gatewayOrderId: 'pi_123',
        gateway: 'stripe',
        schoolId: SCHOOL_ID,
        studentId: STUDENT_ID,
        feeStructureId: STRUCTURE_ID,
        amount: '2500.00',
      });
      stripeHttp.get.mockResolvedValue({
        data: { id: 'pi_123', amount: 250000, amount_received: 250000, currency: 'inr', status: 'succeeded' },
      });

      const result = await service.processFeePayment(financeActor, { orderId: 'pi_123', paymentId: 'pi_123' });

      expect(result).toMatchObject({ success: true, data: { payment: { transactionId: 'pi_123', amount: '2500.00' } } });
      expect(store.order('pi_123')?.status).toBe(GatewayOrderStatus.PAID);
    });

    it('rejects Stripe intents that have not succeeded', async () => {
      store.addOrder({
        gatewayOrderId: 'pi_456',
        gateway: 'stripe',
        schoolId: SCHOOL_ID,
        studentId: STUDENT_ID,
        feeStructureId: STRUCTURE_ID,
        amount: '2500.00',
      });
      stripeHttp.get.mockResolvedValue({ data: { id: 'pi_456', amount: 250000, currency: 'inr', status: 'processing' } });

      const result = await service.processFeePayment(financeActor, { orderId: 'pi_456', paymentId: 'pi_456' });

      expect(result).toEqual({ success: false, status: 'verification_failed', message: 'Payment pi_456 is processing' });
    });
  });

  describe('refundPayment', () => {
    it('reverses part of a cash payment in the ledger only', async () => {
      const payment = await recordCash('4000');

      const result = await service.refundPayment(financeActor, payment.id, { amount: '1500', reason: 'Sibling discount' });

      expect(result).toMatchObject({ success: true, message: 'Refund of 1500.00 recorded for RCP-20240510-0001' });
      expect(store.payments()[0]).toMatchObject({
        status: PaymentStatus.REFUNDED,
        refundedAmount: '1500.00',
        refundReference: null,
      });
      expect(store.feeStatus(STUDENT_ID, STRUCTURE_ID)).toMatchObject({
        paidAmount: '2500.00',
        remainingAmount: '7500.00',
        paymentPercentage: '25.00',
      });
      expect(audit.logPaymentRefunded).toHaveBeenCalledWith(
        financeActor,
        expect.objectContaining({ status: PaymentStatus.COMPLETED }),
        expect.objectContaining({ status: PaymentStatus.REFUNDED, refundedAmount: '1500.00' }),
      );
      expect(notifications.notifyRefund).toHaveBeenCalledTimes(1);
      expect(razorpay.refund).not.toHaveBeenCalled();
    });

    it('refunds a payment only once', async () => {
      const payment = await recordCash('4000');
      await service.refundPayment(financeActor, payment.id, { amount: '1500' });

      const result = await service.refundPayment(financeActor, payment.id);

      expect(result).toEqual({
        success: false,
        status: 'conflict',
        message: 'Only completed payments can be refunded (payment is refunded)',
      });
      expect(store.feeStatus(STUDENT_ID, STRUCTURE_ID)?.paidAmount).toBe('2500.00');
    });

    it('refuses to refund more than was paid', async () => {
      const payment = await recordCash('4000');

      const result = await service.refundPayment(financeActor, payment.id, { amount: '4000.01' });

      expect(result).toEqual({
        success: false,
        status: 'validation_error',
        message: 'Refund amount cannot exceed the payment amount of 4000.00',
      });
    });

    it('refunds online payments through the gateway that took them', async () => {
      razorpayOrder();
      captured();
      await service.processFeePayment(financeActor, signed());
      razorpay.refund.mockResolvedValue({ id: 'rfnd_1', status: 'processed' });
      const [payment] = store.payments();

      const result = await service.refundPayment(financeActor, payment.id);

      expect(result.success).toBe(true);
      expect(razorpay.refund).toHaveBeenCalledWith('pay_B2', { amount: 400000 });
      expect(store.payments()[0]).toMatchObject({ refundedAmount: '4000.00', refundReference: 'rfnd_1' });
      expect(store.feeStatus(STUDENT_ID, STRUCTURE_ID)).toMatchObject({ paidAmount: '0.00', remainingAmount: '10000.00' });
    });

    it('leaves the ledger alone when the gateway refuses the refund', async () => {
      razorpayOrder();
      captured();
      await service.processFeePayment(financeActor, signed());
      razorpay.refund.mockRejectedValue({ statusCode: 400, error: { description: 'The amount is invalid' } });
      const [payment] = store.payments();

      const result = await service.refundPayment(financeActor, payment.id);

      expect(result).toEqual({
        success: false,
        status: 'gateway_error',
        message: 'Razorpay refund payment failed: The amount is invalid',
      });
      expect(store.payments()[0].status).toBe(PaymentStatus.COMPLETED);
      expect(store.feeStatus(STUDENT_ID, STRUCTURE_ID)?.paidAmount).toBe('4000.00');
    });
  });
});
