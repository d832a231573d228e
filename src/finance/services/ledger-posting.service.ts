import { ConflictException, Inject, Injectable, NotFoundException, UnprocessableEntityException } from '@nestjs/common';
import { format } from 'date-fns';
import { Amount, compareAmounts, normalizeAmount, subtractAmounts } from '../../common/money/money';
import { CLOCK, Clock } from '../../common/clock/clock';
import { RECEIPT_PREFIX } from '../../common/constants/constants';
import { FeeStructure } from '../entities/fee-structure.entity';
import { Payment, PaymentMode, PaymentStatus } from '../entities/payment.entity';
import { PaymentHistoryAction } from '../entities/payment-history.entity';
import { StudentFeeStatus } from '../entities/student-fee-status.entity';
import { LedgerTransaction } from '../ledger/ledger-store';
import { applyFeeStatus } from './fee-status.calculator';

export interface PaymentPosting {
  schoolId: string;
  studentId: string;
  structure: FeeStructure;
  amount: Amount;
  paymentDate: string;
  paymentMode: PaymentMode;
  transactionId?: string | null;
  chequeNo?: string | null;
  bankName?: string | null;
  remarks?: string | null;
  actorId: string;
}

export interface RefundPosting {
  payment: Payment;
  amount: Amount;
  refundReference: string | null;
  reason?: string | null;
  actorId: string;
}

export interface PostedEntry {
  payment: Payment;
  feeStatus: StudentFeeStatus;
}

export const formatReceiptNumber = (day: string, sequence: number): string =>
  `${RECEIPT_PREFIX}-${day}-${String(sequence).padStart(4, '0')}`;

const laterDate = (a: string | null | undefined, b: string): string => (a && a > b ? a : b);

/**
 * The single path through which money enters or leaves a student's balance.
 * Every method runs inside the caller's ledger transaction.
 */
@Injectable()
export class LedgerPostingService {
  constructor(@Inject(CLOCK) private readonly clock: Clock) {}

  async postPayment(tx: LedgerTransaction, posting: PaymentPosting): Promise<PostedEntry> {
    const today = this.clock.now();
    const day = format(today, 'yyyyMMdd');
    const sequence = await tx.nextReceiptSequence(posting.schoolId, day);

    const payment = await tx.insertPayment({
      schoolId: posting.schoolId,
      studentId: posting.studentId,
      feeStructureId: posting.structure.id,
      receiptNumber: formatReceiptNumber(day, sequence),
      amount: normalizeAmount(posting.amount),
      paymentDate: posting.paymentDate,
      paymentMode: posting.paymentMode,
      status: PaymentStatus.COMPLETED,
      transactionId: posting.transactionId ?? null,
      chequeNo: posting.chequeNo ?? null,
      bankName: posting.bankName ?? null,
      remarks: posting.remarks ?? null,
      collectedById: posting.actorId,
    });

    await tx.insertPaymentHistory({
      paymentId: payment.id,
      action: PaymentHistoryAction.CREATED,
      oldStatus: null,
      newStatus: PaymentStatus.COMPLETED,
      amountChanged: payment.amount,
      remarks: posting.remarks ?? null,
      changedById: posting.actorId,
    });

    const seeded = await tx.ensureFeeStatus({
      schoolId: posting.schoolId,
      studentId: posting.studentId,
      feeStructureId: posting.structure.id,
      totalFee: posting.structure.totalFee,
    });
    const status = await tx.incrementPaidAmount(seeded.id, payment.amount);

    if (compareAmounts(status.paidAmount, posting.structure.totalFee) > 0) {
      const outstanding = subtractAmounts(posting.structure.totalFee, subtractAmounts(status.paidAmount, payment.amount));
      throw new UnprocessableEntityException(
        `Payment of ${payment.amount} exceeds the outstanding balance of ${outstanding}`,
      );
    }

    status.lastPaymentDate = laterDate(status.lastPaymentDate, posting.paymentDate);
    await this.persistDerived(tx, status, posting.structure, today);
    return { payment, feeStatus: status };
  }

  async postRefund(tx: LedgerTransaction, posting: RefundPosting): Promise<PostedEntry> {
    const { payment } = posting;
    const refundedAmount = normalizeAmount(posting.amount);

    const marked = await tx.markPaymentRefunded(payment.id, {
      refundedAmount,
      refundReference: posting.refundReference,
    });
    if (!marked) {
      throw new ConflictException(`Payment ${payment.receiptNumber} is no longer refundable`);
    }

    await tx.insertPaymentHistory({
      paymentId: payment.id,
      action: PaymentHistoryAction.REFUNDED,
      oldStatus: PaymentStatus.COMPLETED,
      newStatus: PaymentStatus.REFUNDED,
      amountChanged: refundedAmount,
      remarks: posting.reason ?? null,
      changedById: posting.actorId,
    });

    const locked = await tx.lockFeeStatus(payment.studentId, payment.feeStructureId);
    if (!locked) {
      throw new NotFoundException(`No fee status recorded for payment ${payment.receiptNumber}`);
    }
    const structure = await tx.findFeeStructure(payment.schoolId, payment.feeStructureId);
    const status = await tx.incrementPaidAmount(locked.id, `-${refundedAmount}`);
    await this.persistDerived(tx, status, structure, this.clock.now());

    const refunded: Payment = {
      ...payment,
      status: PaymentStatus.REFUNDED,
      refundedAmount,
      refundReference: posting.refundReference,
    };
    return { payment: refunded, feeStatus: status };
  }

  /** Recomputes the derived figures of a locked status row. */
  async persistDerived(
    tx: LedgerTransaction,
    status: StudentFeeStatus,
    structure: FeeStructure | null,
    today: Date,
  ): Promise<StudentFeeStatus> {
    applyFeeStatus(status, structure, today);
    await tx.saveDerivedStatus({
      id: status.id,
      totalFee: status.totalFee,
      remainingAmount: status.remainingAmount,
      paymentPercentage: status.paymentPercentage,
      isFullyPaid: status.isFullyPaid,
      isOverdue: status.isOverdue,
      nextDueDate: status.nextDueDate ?? null,
      lastPaymentDate: status.lastPaymentDate ?? null,
    });
    return status;
  }
}
