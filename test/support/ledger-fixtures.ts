import { Clock } from '../../src/common/clock/clock';
import { ActorContext } from '../../src/common/decorators/school.decorator';
import { FeeNotificationService } from '../../src/finance/services/fee-notification.service';
import { LedgerPostingService } from '../../src/finance/services/ledger-posting.service';
import { PaymentRecorderService } from '../../src/finance/services/payment-recorder.service';
import { SystemLoggingService } from '../../src/logs/system-logging.service';
import { Role } from '../../src/user/enums/role.enum';
import { InMemoryLedgerStore } from './in-memory-ledger-store';

export const SCHOOL_ID = 'school-1';
export const CLASS_ID = 'class-5a';
export const STUDENT_ID = 'student-1';
export const STRUCTURE_ID = 'structure-2024';

export const financeActor: ActorContext = { userId: 'finance-user', role: Role.FINANCE, schoolId: SCHOOL_ID };

/** 10 May 2024, 09:30 local time */
export const fixedClock = (now: Date = new Date(2024, 4, 10, 9, 30, 0)): Clock => ({ now: () => now });

export const notificationsMock = () => ({
  notifyPaymentReceived: jest.fn().mockResolvedValue(undefined),
  notifyRefund: jest.fn().mockResolvedValue(undefined),
  sendFeeReminders: jest.fn(),
});

export const auditMock = () => ({
  logPaymentRecorded: jest.fn().mockResolvedValue(undefined),
  logOnlinePaymentSettled: jest.fn().mockResolvedValue(undefined),
  logDuplicateCallback: jest.fn().mockResolvedValue(undefined),
  logPaymentRefunded: jest.fn().mockResolvedValue(undefined),
  logFeeStructureChange: jest.fn().mockResolvedValue(undefined),
  logReminderRun: jest.fn().mockResolvedValue(undefined),
});

/** A student of class 5A owing 10000.00 in two installments (30 Apr and 31 Oct 2024). */
export function seedLedger(store = new InMemoryLedgerStore()) {
  const student = store.addStudent({
    id: STUDENT_ID,
    schoolId: SCHOOL_ID,
    classId: CLASS_ID,
    firstName: 'Asha',
    lastName: 'Verma',
    admissionNo: 'ADM-001',
    guardianName: 'Ravi Verma',
    guardianPhone: '+910000000001',
    guardianEmail: 'guardian@example.test',
    whatsappOptIn: false,
    userId: 'student-user',
    parentUserId: 'parent-user',
  });
  const structure = store.addFeeStructure({
    id: STRUCTURE_ID,
    schoolId: SCHOOL_ID,
    classId: CLASS_ID,
    totalFee: '10000.00',
    installments: 2,
    dueDates: ['2024-04-30', '2024-10-31'],
  });
  return { store, student, structure };
}

export function buildRecorder(store: InMemoryLedgerStore, clock: Clock = fixedClock()) {
  const notifications = notificationsMock();
  const audit = auditMock();
  const posting = new LedgerPostingService(clock);
  const recorder = new PaymentRecorderService(
    store,
    clock,
    posting,
    notifications as unknown as FeeNotificationService,
    audit as unknown as SystemLoggingService,
  );
  return { recorder, posting, notifications, audit };
}
