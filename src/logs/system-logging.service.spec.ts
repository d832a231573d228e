import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { SystemLoggingService } from './system-logging.service';
import { Log } from './logs.entity';
import { Role } from '../user/enums/role.enum';
import { Payment, PaymentMode, PaymentStatus } from '../finance/entities/payment.entity';

describe('SystemLoggingService', () => {
  let repo: { create: jest.Mock; save: jest.Mock };
  let service: SystemLoggingService;
  const actor = { userId: 'user-1', role: Role.FINANCE, schoolId: 'school-1' };

  beforeEach(async () => {
    repo = {
      create: jest.fn((data: Partial<Log>) => data),
      save: jest.fn(async (data: Partial<Log>) => data),
    };
    const module: TestingModule = await Test.createTestingModule({
      providers: [SystemLoggingService, { provide: getRepositoryToken(Log), useValue: repo }],
    }).compile();

    service = module.get<SystemLoggingService>(SystemLoggingService);
  });

  it('records a payment with its ledger fields', async () => {
    const payment = Object.assign(new Payment(), {
      id: 'pay-1',
      receiptNumber: 'RCP-20240510-0001',
      studentId: 'stu-1',
      feeStructureId: 'fs-1',
      amount: '4000.00',
      paymentMode: PaymentMode.CASH,
      status: PaymentStatus.COMPLETED,
      transactionId: null,
    });

    await service.logPaymentRecorded(actor, payment);

    const saved = repo.save.mock.calls[0][0];
    expect(saved.action).toBe('FEE_PAYMENT_RECORDED');
    expect(saved.schoolId).toBe('school-1');
    expect(saved.performedBy).toEqual({ id: 'user-1', role: Role.FINANCE });
    expect(saved.newValues).toEqual({
      receiptNumber: 'RCP-20240510-0001',
      studentId: 'stu-1',
      feeStructureId: 'fs-1',
      amount: '4000.00',
      paymentMode: 'cash',
      status: 'completed',
      transactionId: null,
    });
  });

  it('does not propagate storage failures', async () => {
    repo.save.mockRejectedValue(new Error('connection reset'));

    await expect(service.logReminderRun(actor, { sent: 2, failed: 1, total: 3 })).resolves.toBeUndefined();
  });

  it('marks reminder runs with failures as warnings', async () => {
    await service.logReminderRun(actor, { sent: 2, failed: 1, total: 3 });

    expect(repo.save.mock.calls[0][0].level).toBe('warn');
  });
});
