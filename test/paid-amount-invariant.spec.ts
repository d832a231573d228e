import { addAmounts, subtractAmounts } from '../src/common/money/money';
import { ConfigService } from '../src/config/config.service';
import { PaymentMode, PaymentStatus } from '../src/finance/entities/payment.entity';
import { FeeNotificationService } from '../src/finance/services/fee-notification.service';
import { SystemLoggingService } from '../src/logs/system-logging.service';
import { GatewayRegistry } from '../src/payment-gateway/gateways/gateway-registry';
import { ReconciliationService } from '../src/payment-gateway/reconciliation.service';
import { InMemoryLedgerStore } from './support/in-memory-ledger-store';
import {
  STRUCTURE_ID,
  STUDENT_ID,
  auditMock,
  buildRecorder,
  financeActor,
  fixedClock,
  notificationsMock,
  seedLedger,
} from './support/ledger-fixtures';

/** paidAmount must equal what the student's payments still hold after refunds. */
function expectLedgerBalanced(store: InMemoryLedgerStore): void {
  const held = store
    .paymentsFor(STUDENT_ID, STRUCTURE_ID)
    .filter((p) => p.status !== PaymentStatus.PENDING)
    .map((p) => subtractAmounts(p.amount, p.refundedAmount));
  const status = store.feeStatus(STUDENT_ID, STRUCTURE_ID);

  expect(status?.paidAmount).toBe(addAmounts(...held));
  expect(status?.remainingAmount).toBe(subtractAmounts('10000.00', addAmounts(...held)));
}

describe('paid amount invariant', () => {
  it('holds across payments, rejected payments, failures and refunds', async () => {
    const { store } = seedLedger();
    const clock = fixedClock();
    const { recorder, posting } = buildRecorder(store, clock);
    const reconciliation = new ReconciliationService(
      store,
      new GatewayRegistry([], 'razorpay'),
      clock,
      posting,
      notificationsMock() as unknown as FeeNotificationService,
      auditMock() as unknown as SystemLoggingService,
      new ConfigService({}),
    );
    const cash = (amount: string) =>
      recorder.recordPayment(financeActor, {
        studentId: STUDENT_ID,
        feeStructureId: STRUCTURE_ID,
        amount,
        paymentDate: '2024-05-09',
        paymentMode: PaymentMode.CASH,
      });

    await cash('2500.50');
    expectLedgerBalanced(store);

    await Promise.all([cash('1000'), cash('1999.50'), cash('750')]);
    expectLedgerBalanced(store);

    store.failNext('saveDerivedStatus');
    await expect(cash('300')).rejects.toThrow('saveDerivedStatus failed');
    expectLedgerBalanced(store);

    expect((await cash('9000')).success).toBe(false);
    expectLedgerBalanced(store);

    const [first] = store.payments();
    await reconciliation.refundPayment(financeActor, first.id, { amount: '500.25' });
    expectLedgerBalanced(store);

    expect(store.feeStatus(STUDENT_ID, STRUCTURE_ID)).toMatchObject({
      paidAmount: '5749.75',
      remainingAmount: '4250.25',
    });
    expect(store.payments()).toHaveLength(4);
  });
});
