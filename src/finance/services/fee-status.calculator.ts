import {
  Amount,
  clampToZero,
  compareAmounts,
  percentageOf,
  splitAmount,
  subtractAmounts,
  toMinorUnits,
} from '../../common/money/money';
import { toDateString } from '../../common/clock/clock';
import { FeeStructure } from '../entities/fee-structure.entity';
import { StudentFeeStatus } from '../entities/student-fee-status.entity';

export interface FeeStatusInput {
  totalFee: Amount;
  paidAmount: Amount;
  /** yyyy-MM-dd, or null when nothing is due */
  nextDueDate: string | null;
}

export interface FeeStatusFigures {
  remainingAmount: Amount;
  paymentPercentage: number;
  isFullyPaid: boolean;
  isOverdue: boolean;
}

export function calculateFeeStatus(input: FeeStatusInput, today: Date): FeeStatusFigures {
  const remainingAmount = clampToZero(subtractAmounts(input.totalFee, input.paidAmount));
  const hasBalance = toMinorUnits(remainingAmount) > 0n;
  const paymentPercentage =
    toMinorUnits(input.totalFee) > 0n ? Math.min(100, percentageOf(input.paidAmount, input.totalFee)) : 0;

  return {
    remainingAmount,
    paymentPercentage,
    isFullyPaid: !hasBalance,
    // date strings compare in calendar order
    isOverdue: hasBalance && input.nextDueDate !== null && input.nextDueDate < toDateString(today),
  };
}

/**
 * Due date of the first installment the paid amount does not yet cover.
 * Installments split the total evenly; the last one takes the rounding remainder.
 */
export function resolveNextDueDate(
  structure: Pick<FeeStructure, 'totalFee' | 'dueDates'>,
  paidAmount: Amount,
): string | null {
  const dueDates = [...(structure.dueDates ?? [])].sort();
  if (dueDates.length === 0 || compareAmounts(paidAmount, structure.totalFee) >= 0) {
    return null;
  }

  const shares = splitAmount(structure.totalFee, dueDates.length);
  const paid = toMinorUnits(paidAmount);
  let covered = 0n;
  for (let i = 0; i < dueDates.length; i++) {
    covered += toMinorUnits(shares[i]);
    if (covered > paid) {
      return dueDates[i];
    }
  }
  return null;
}

/** Writes every derived field of `status` from its totals and the structure's schedule. */
export function applyFeeStatus(
  status: StudentFeeStatus,
  structure: Pick<FeeStructure, 'totalFee' | 'dueDates'> | null,
  today: Date,
): StudentFeeStatus {
  if (structure) {
    status.totalFee = structure.totalFee;
  }
  const nextDueDate = structure ? resolveNextDueDate(structure, status.paidAmount) : status.nextDueDate ?? null;
  const figures = calculateFeeStatus(
    { totalFee: status.totalFee, paidAmount: status.paidAmount, nextDueDate },
    today,
  );
  status.nextDueDate = nextDueDate;
  status.remainingAmount = figures.remainingAmount;
  status.paymentPercentage = figures.paymentPercentage.toFixed(2);
  status.isFullyPaid = figures.isFullyPaid;
  status.isOverdue = figures.isOverdue;
  return status;
}
