import { Amount } from '../../common/money/money';
import { Student } from '../../student/entities/student.entity';
import { FeeStructure } from '../entities/fee-structure.entity';
import { Payment, PaymentMode, PaymentStatus } from '../entities/payment.entity';
import { PaymentHistory, PaymentHistoryAction } from '../entities/payment-history.entity';
import { StudentFeeStatus } from '../entities/student-fee-status.entity';
import { GatewayName, GatewayOrder } from '../../payment-gateway/entities/gateway-order.entity';

export const LEDGER_STORE = 'LEDGER_STORE';

export interface NewPayment {
  schoolId: string;
  studentId: string;
  feeStructureId: string;
  receiptNumber: string;
  amount: Amount;
  paymentDate: string;
  paymentMode: PaymentMode;
  status: PaymentStatus;
  transactionId?: string | null;
  chequeNo?: string | null;
  bankName?: string | null;
  remarks?: string | null;
  collectedById?: string | null;
}

export interface NewPaymentHistory {
  paymentId: string;
  action: PaymentHistoryAction;
  oldStatus: PaymentStatus | null;
  newStatus: PaymentStatus;
  amountChanged: Amount;
  remarks?: string | null;
  changedById?: string | null;
}

export interface NewGatewayOrder {
  schoolId: string;
  studentId: string;
  feeStructureId: string;
  gateway: GatewayName;
  gatewayOrderId: string;
  receipt: string;
  amount: Amount;
  currency: string;
  createdById: string | null;
}

export interface FeeStatusSeed {
  schoolId: string;
  studentId: string;
  feeStructureId: string;
  totalFee: Amount;
}

export interface RefundMark {
  refundedAmount: Amount;
  refundReference: string | null;
}

/** Derived columns written back after the calculator runs. `paidAmount` is never among them. */
export type DerivedFeeStatus = Pick<
  StudentFeeStatus,
  | 'id'
  | 'totalFee'
  | 'remainingAmount'
  | 'paymentPercentage'
  | 'isFullyPaid'
  | 'isOverdue'
  | 'nextDueDate'
  | 'lastPaymentDate'
>;

export interface LedgerReader {
  findStudent(schoolId: string, studentId: string): Promise<Student | null>;
  findFeeStructure(schoolId: string, feeStructureId: string): Promise<FeeStructure | null>;
  findActiveFeeStructure(schoolId: string, classId: string): Promise<FeeStructure | null>;
  findPayment(schoolId: string, paymentId: string): Promise<Payment | null>;
  findPaymentByTransactionId(schoolId: string, transactionId: string): Promise<Payment | null>;
  findFeeStatus(studentId: string, feeStructureId: string): Promise<StudentFeeStatus | null>;
  findOrder(schoolId: string, gatewayOrderId: string): Promise<GatewayOrder | null>;
  /** Status rows of the school with a balance left, optionally for some students only. */
  listOpenFeeStatuses(schoolId: string, studentIds?: string[]): Promise<StudentFeeStatus[]>;
}

export interface LedgerTransaction extends LedgerReader {
  insertPayment(payment: NewPayment): Promise<Payment>;
  insertPaymentHistory(entry: NewPaymentHistory): Promise<PaymentHistory>;
  /** Inserts the status row if it does not exist yet and returns it. */
  ensureFeeStatus(seed: FeeStatusSeed): Promise<StudentFeeStatus>;
  /** Takes the row lock for the rest of the transaction. */
  lockFeeStatus(studentId: string, feeStructureId: string): Promise<StudentFeeStatus | null>;
  /** `paidAmount = paidAmount + delta` evaluated by the store, returning the updated row. */
  incrementPaidAmount(statusId: string, delta: Amount): Promise<StudentFeeStatus>;
  saveDerivedStatus(status: DerivedFeeStatus): Promise<void>;
  /** completed -> refunded; false when the payment was no longer completed. */
  markPaymentRefunded(paymentId: string, refund: RefundMark): Promise<boolean>;
  nextReceiptSequence(schoolId: string, day: string): Promise<number>;
  insertOrder(order: NewGatewayOrder): Promise<GatewayOrder>;
  /** created -> paid; false when the order was already settled. */
  markOrderPaid(orderId: string, paymentId: string): Promise<boolean>;
}

/**
 * Persistence boundary of the fee ledger. `transaction` commits only when
 * `work` resolves; a rejection rolls back every write made through `tx`.
 */
export interface LedgerStore {
  read<T>(work: (reader: LedgerReader) => Promise<T>): Promise<T>;
  transaction<T>(work: (tx: LedgerTransaction) => Promise<T>): Promise<T>;
}
