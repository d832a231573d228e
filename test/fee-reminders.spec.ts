import { ConfigService } from '../src/config/config.service';
import { PaymentMode } from '../src/finance/entities/payment.entity';
import { FeeNotificationService } from '../src/finance/services/fee-notification.service';
import { LedgerPostingService } from '../src/finance/services/ledger-posting.service';
import { SystemLoggingService } from '../src/logs/system-logging.service';
import { NotificationPriority, NotificationType } from '../src/notifications/entities/notification.entity';
import { NotificationService } from '../src/notifications/notification.service';
import { NotificationRecipient, NotificationSender } from '../src/notifications/delivery/notification-sender';
import { InMemoryLedgerStore } from './support/in-memory-ledger-store';
import {
  CLASS_ID,
  SCHOOL_ID,
  STRUCTURE_ID,
  STUDENT_ID,
  auditMock,
  buildRecorder,
  financeActor,
  fixedClock,
  seedLedger,
} from './support/ledger-fixtures';

describe('FeeNotificationService.sendFeeReminders', () => {
  let store: InMemoryLedgerStore;
  let sender: { send: jest.Mock };
  let notificationService: { create: jest.Mock };
  let audit: ReturnType<typeof auditMock>;
  const schoolRepository = {
    findOne: jest.fn().mockResolvedValue({ id: SCHOOL_ID, name: 'Green Valley School', phone: '+910000000000' }),
  };
  const classRepository = { findOne: jest.fn().mockResolvedValue({ id: CLASS_ID, name: 'Grade 5', section: 'A' }) };

  const build = (now?: Date) => {
    const clock = fixedClock(now);
    return new FeeNotificationService(
      store,
      sender as NotificationSender,
      clock,
      new LedgerPostingService(clock),
      notificationService as unknown as NotificationService,
      audit as unknown as SystemLoggingService,
      schoolRepository as never,
      classRepository as never,
      new ConfigService({ PAYMENT_CURRENCY: 'INR' }),
    );
  };

  const pay = async (studentId: string, amount: string) => {
    const { recorder } = buildRecorder(store);
    await recorder.recordPayment(financeActor, {
      studentId,
      feeStructureId: STRUCTURE_ID,
      amount,
      paymentDate: '2024-05-09',
      paymentMode: PaymentMode.CASH,
    });
  };

  beforeEach(async () => {
    ({ store } = seedLedger());
    store.addStudent({
      id: 'student-2',
      schoolId: SCHOOL_ID,
      classId: CLASS_ID,
      firstName: 'Kiran',
      lastName: 'Rao',
      guardianName: 'Meera Rao',
      guardianPhone: '+910000000002',
      guardianEmail: 'rao.guardian@example.test',
      whatsappOptIn: true,
    });
    store.addStudent({ id: 'student-3', schoolId: SCHOOL_ID, classId: CLASS_ID, guardianPhone: '+910000000003' });
    sender = { send: jest.fn().mockResolvedValue({ ok: true }) };
    notificationService = { create: jest.fn().mockResolvedValue({ id: 'n-1' }) };
    audit = auditMock();

    await pay(STUDENT_ID, '4000'); // next due 30 Apr, overdue
    await pay('student-2', '1000'); // next due 30 Apr, overdue
    await pay('student-3', '5000'); // next due 31 Oct
  });

  it('messages guardians of overdue students on every configured channel', async () => {
    const result = await build().sendFeeReminders(financeActor);

    expect(result).toEqual({
      success: true,
      status: 'ok',
      message: 'Sent 4 reminders, 0 failed',
      data: { sent: 4, failed: 0, total: 4, students: 2, failures: [] },
    });
    expect(sender.send).toHaveBeenCalledWith(
      { name: 'Ravi Verma', phone: '+910000000001', email: 'guardian@example.test' },
      'sms',
      'fee_reminder',
      {
        student_name: 'Asha Verma',
        class_name: 'Grade 5 A',
        pending_amount: 'INR 6000.00',
        due_date: '30/04/2024',
        days_overdue: 10,
        school_name: 'Green Valley School',
        school_phone: '+910000000000',
      },
    );
    const recipients = sender.send.mock.calls.map(([recipient]: [NotificationRecipient]) => recipient.phone);
    expect(recipients).not.toContain('+910000000003');
  });

  it('keeps going when a message fails', async () => {
    sender.send.mockImplementation(async (recipient: NotificationRecipient, channel: string) => {
      if (recipient.phone === '+910000000001' && channel === 'email') throw new Error('SMTP connection refused');
      if (recipient.phone === '+910000000002' && channel === 'sms') return { ok: false, error: 'SMS gateway timeout' };
      return { ok: true };
    });

    const result = await build().sendFeeReminders(financeActor);

    expect(result).toMatchObject({
      success: true,
      message: 'Sent 2 reminders, 2 failed',
      data: {
        sent: 2,
        failed: 2,
        total: 4,
        students: 2,
        failures: [
          { studentId: STUDENT_ID, channel: 'email', error: 'SMTP connection refused' },
          { studentId: 'student-2', channel: 'sms', error: 'SMS gateway timeout' },
        ],
      },
    });
    expect(notificationService.create).toHaveBeenCalledWith(
      expect.objectContaining({
        type: NotificationType.FEE_REMINDER,
        priority: NotificationPriority.HIGH,
        schoolId: SCHOOL_ID,
        metadata: { sent: 2, failed: 2, total: 4 },
      }),
    );
    expect(audit.logReminderRun).toHaveBeenCalledWith(financeActor, expect.objectContaining({ sent: 2, failed: 2 }));
  });

  it('records a student whose balance could not be refreshed and moves on', async () => {
    store.failNext('saveDerivedStatus', new Error('lock timeout'));

    const result = await build().sendFeeReminders(financeActor);

    expect(result).toMatchObject({
      data: {
        sent: 2,
        failed: 1,
        students: 1,
        failures: [{ studentId: STUDENT_ID, channel: null, error: 'lock timeout' }],
      },
    });
  });

  it('moves on when the details of one student cannot be loaded', async () => {
    classRepository.findOne.mockRejectedValueOnce(new Error('connection reset'));

    const result = await build().sendFeeReminders(financeActor);

    expect(result).toMatchObject({
      success: true,
      message: 'Sent 2 reminders, 1 failed',
      data: {
        sent: 2,
        failed: 1,
        total: 3,
        students: 1,
        failures: [{ studentId: STUDENT_ID, channel: null, error: 'connection reset' }],
      },
    });
    const recipients = sender.send.mock.calls.map(([recipient]: [NotificationRecipient]) => recipient.phone);
    expect(recipients).toEqual(['+910000000002', '+910000000002']);
    expect(audit.logReminderRun).toHaveBeenCalledWith(financeActor, expect.objectContaining({ sent: 2, failed: 1 }));
  });

  it('refreshes the overdue flag against the current date', async () => {
    expect(store.feeStatus('student-3', STRUCTURE_ID)?.isOverdue).toBe(false);

    const result = await build(new Date(2024, 10, 5, 9, 0, 0)).sendFeeReminders(financeActor, { studentIds: ['student-3'] });

    expect(result).toMatchObject({ data: { sent: 2, students: 1 } });
    expect(store.feeStatus('student-3', STRUCTURE_ID)).toMatchObject({ isOverdue: true, nextDueDate: '2024-10-31' });
    expect(sender.send).toHaveBeenCalledWith(
      expect.objectContaining({ phone: '+910000000003' }),
      'sms',
      'fee_reminder',
      expect.objectContaining({ days_overdue: 5, pending_amount: 'INR 5000.00', due_date: '31/10/2024' }),
    );
  });

  it('uses WhatsApp only for guardians who opted in', async () => {
    const result = await build().sendFeeReminders(financeActor, { channels: ['whatsapp'] });

    expect(result).toMatchObject({ data: { sent: 1, students: 2 } });
    expect(sender.send).toHaveBeenCalledTimes(1);
    expect(sender.send).toHaveBeenCalledWith(
      expect.objectContaining({ phone: '+910000000002' }),
      'whatsapp',
      'fee_reminder',
      expect.objectContaining({ student_name: 'Kiran Rao' }),
    );
  });
});

describe('FeeNotificationService confirmations', () => {
  it('never lets a failed confirmation reach the caller', async () => {
    const { store } = seedLedger();
    const clock = fixedClock();
    const sender = { send: jest.fn().mockRejectedValue(new Error('provider down')) };
    const service = new FeeNotificationService(
      store,
      sender,
      clock,
      new LedgerPostingService(clock),
      { create: jest.fn() } as unknown as NotificationService,
      auditMock() as unknown as SystemLoggingService,
      { findOne: jest.fn().mockResolvedValue(null) } as never,
      { findOne: jest.fn().mockResolvedValue(null) } as never,
      new ConfigService({}),
    );
    const { recorder } = buildRecorder(store);
    const recorded = await recorder.recordPayment(financeActor, {
      studentId: STUDENT_ID,
      feeStructureId: STRUCTURE_ID,
      amount: '4000',
      paymentDate: '2024-05-09',
      paymentMode: PaymentMode.CASH,
    });
    if (!recorded.success) throw new Error(recorded.message);

    await expect(
      service.notifyPaymentReceived(financeActor, recorded.data.payment, recorded.data.feeStatus),
    ).resolves.toBeUndefined();
    expect(sender.send).toHaveBeenCalledWith(
      expect.objectContaining({ phone: '+910000000001' }),
      'sms',
      'payment_confirmation',
      expect.objectContaining({ amount_paid: 'INR 4000.00', receipt_no: 'RCP-20240510-0001', remaining_amount: 'INR 6000.00' }),
    );
  });
});
