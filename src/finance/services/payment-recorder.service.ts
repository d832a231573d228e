import {
  BadRequestException,
  ConflictException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { isValid, parseISO } from 'date-fns';
import { CLOCK, Clock, toDateString } from '../../common/clock/clock';
import { ActorContext } from '../../common/decorators/school.decorator';
import { isDecimalAmount, isPositiveAmount, normalizeAmount } from '../../common/money/money';
import { OperationResult, succeed, toFailure } from '../../common/result/operation-result';
import { SystemLoggingService } from '../../logs/system-logging.service';
import { Student } from '../../student/entities/student.entity';
import { FeeStructure } from '../entities/fee-structure.entity';
import { PaymentMode } from '../entities/payment.entity';
import { LEDGER_STORE, LedgerStore } from '../ledger/ledger-store';
import { FeeNotificationService } from './fee-notification.service';
import { LedgerPostingService, PostedEntry } from './ledger-posting.service';

export interface RecordPaymentInput {
  studentId: string;
  feeStructureId: string;
  amount: string;
  paymentDate: string;
  paymentMode: PaymentMode;
  transactionId?: string | null;
  chequeNo?: string | null;
  bankName?: string | null;
  remarks?: string | null;
}

interface ValidatedPayment {
  student: Student;
  structure: FeeStructure;
  amount: string;
}

/**
 * Records payments collected at the school office (cash, cheque, bank transfer).
 * Online money only enters through gateway verification.
 */
@Injectable()
export class PaymentRecorderService {
  private readonly logger = new Logger(PaymentRecorderService.name);

  constructor(
    @Inject(LEDGER_STORE) private readonly store: LedgerStore,
    @Inject(CLOCK) private readonly clock: Clock,
    private readonly posting: LedgerPostingService,
    private readonly feeNotifications: FeeNotificationService,
    private readonly systemLoggingService: SystemLoggingService,
  ) {}

  async recordPayment(actor: ActorContext, input: RecordPaymentInput): Promise<OperationResult<PostedEntry>> {
    let entry: PostedEntry;
    try {
      const { student, structure, amount } = await this.validate(actor, input);
      entry = await this.store.transaction((tx) =>
        this.posting.postPayment(tx, {
          schoolId: actor.schoolId,
          studentId: student.id,
          structure,
          amount,
          paymentDate: input.paymentDate,
          paymentMode: input.paymentMode,
          transactionId: input.transactionId || null,
          chequeNo: input.chequeNo || null,
          bankName: input.bankName || null,
          remarks: input.remarks || null,
          actorId: actor.userId,
        }),
      );
    } catch (error) {
      const failure = toFailure(error);
      this.logger.warn(`Payment for student ${input.studentId} not recorded: ${failure.message}`);
      return failure;
    }

    this.logger.log(
      `Recorded ${entry.payment.paymentMode} payment ${entry.payment.receiptNumber} of ${entry.payment.amount} for student ${entry.payment.studentId}`,
    );
    await this.systemLoggingService.logPaymentRecorded(actor, entry.payment);
    await this.feeNotifications.notifyPaymentReceived(actor, entry.payment, entry.feeStatus);

    return succeed(entry, `Payment recorded successfully. Receipt: ${entry.payment.receiptNumber}`);
  }

  private async validate(actor: ActorContext, input: RecordPaymentInput): Promise<ValidatedPayment> {
    if (!isDecimalAmount(input.amount) || !isPositiveAmount(String(input.amount))) {
      throw new BadRequestException('Amount must be a positive number with at most two decimal places');
    }
    if (input.paymentMode === PaymentMode.ONLINE) {
      throw new BadRequestException('Online payments are recorded through gateway verification');
    }
    if (input.paymentMode === PaymentMode.CHEQUE && !input.chequeNo) {
      throw new BadRequestException('Cheque number is required for cheque payments');
    }
    const paymentDate = parseISO(input.paymentDate);
    if (!/^\d{4}-\d{2}-\d{2}$/.test(input.paymentDate) || !isValid(paymentDate)) {
      throw new BadRequestException('Payment date must be a valid date (YYYY-MM-DD)');
    }
    if (input.paymentDate > toDateString(this.clock.now())) {
      throw new BadRequestException('Payment date cannot be in the future');
    }

    return this.store.read(async (reader) => {
      const student = await reader.findStudent(actor.schoolId, input.studentId);
      if (!student) {
        throw new NotFoundException('Student not found');
      }
      const structure = await reader.findFeeStructure(actor.schoolId, input.feeStructureId);
      if (!structure) {
        throw new NotFoundException('Fee structure not found');
      }
      if (!structure.isActive) {
        throw new BadRequestException('Fee structure is not active');
      }
      if (structure.classId !== student.classId) {
        throw new BadRequestException("Fee structure does not apply to the student's class");
      }
      if (input.transactionId) {
        const existing = await reader.findPaymentByTransactionId(actor.schoolId, input.transactionId);
        if (existing) {
          throw new ConflictException(`Transaction ${input.transactionId} is already recorded as ${existing.receiptNumber}`);
        }
      }
      return { student, structure, amount: normalizeAmount(input.amount) };
    });
  }
}
