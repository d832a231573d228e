import { Inject, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { differenceInCalendarDays, parseISO } from 'date-fns';
import { CLOCK, Clock, toDateString } from '../../common/clock/clock';
import { ActorContext } from '../../common/decorators/school.decorator';
import { Amount, averageAmount, normalizeAmount, percentageOf } from '../../common/money/money';
import { studentFullName } from '../../student/entities/student.entity';
import { Payment, PaymentMode, PaymentStatus } from '../entities/payment.entity';
import { StudentFeeStatus } from '../entities/student-fee-status.entity';

export interface AnalyticsRange {
  startDate?: string;
  endDate?: string;
}

export interface FeeAnalytics {
  period: { startDate: string | null; endDate: string | null };
  totalCollected: Amount;
  transactionCount: number;
  averagePayment: Amount;
  totalRefunded: Amount;
  totalExpected: Amount;
  totalOutstanding: Amount;
  collectionRate: number;
  overdueCount: number;
  studentsWithBalance: number;
  paymentModes: Array<{ mode: PaymentMode; count: number; amount: Amount }>;
  monthlyTrend: Array<{ month: string; count: number; amount: Amount }>;
}

export interface Defaulter {
  studentId: string;
  studentName: string;
  admissionNo: string;
  className: string | null;
  guardianPhone: string | null;
  feeStructureId: string;
  academicYear: string | null;
  totalFee: Amount;
  paidAmount: Amount;
  amountDue: Amount;
  dueDate: string;
  daysOverdue: number;
  lastPaymentDate: string | null;
}

interface CollectionRow {
  collected: string | null;
  refunded: string | null;
  count: string;
}

interface BalanceRow {
  expected: string | null;
  paid: string | null;
  outstanding: string | null;
  overdue: string;
  withBalance: string;
}

interface GroupRow {
  key: string;
  count: string;
  amount: string | null;
}

const SETTLED = [PaymentStatus.COMPLETED, PaymentStatus.REFUNDED];

const amountOf = (raw: string | null | undefined): Amount => normalizeAmount(raw ?? '0');

/** A refunded payment still counts for what was kept. */
const NET_AMOUNT = 'payment.amount - payment.refundedAmount';

@Injectable()
export class FeeAnalyticsService {
  private readonly logger = new Logger(FeeAnalyticsService.name);

  constructor(
    @InjectRepository(Payment)
    private readonly paymentRepository: Repository<Payment>,
    @InjectRepository(StudentFeeStatus)
    private readonly feeStatusRepository: Repository<StudentFeeStatus>,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  async getFeeAnalytics(actor: ActorContext, range: AnalyticsRange = {}): Promise<FeeAnalytics> {
    const collection = await this.settledPayments(actor, range)
      .select(`SUM(${NET_AMOUNT})`, 'collected')
      .addSelect('SUM(payment.refundedAmount)', 'refunded')
      .addSelect('COUNT(*)', 'count')
      .getRawOne<CollectionRow>();

    const modes = await this.settledPayments(actor, range)
      .select('payment.paymentMode', 'key')
      .addSelect('COUNT(*)', 'count')
      .addSelect(`SUM(${NET_AMOUNT})`, 'amount')
      .groupBy('payment.paymentMode')
      .orderBy('amount', 'DESC')
      .getRawMany<GroupRow>();

    const months = await this.settledPayments(actor, range)
      .select(`to_char(payment.paymentDate, 'YYYY-MM')`, 'key')
      .addSelect('COUNT(*)', 'count')
      .addSelect(`SUM(${NET_AMOUNT})`, 'amount')
      .groupBy('key')
      .orderBy('key', 'ASC')
      .getRawMany<GroupRow>();

    const balances = await this.feeStatusRepository
      .createQueryBuilder('status')
      .innerJoin('status.feeStructure', 'structure')
      .select('SUM(status.totalFee)', 'expected')
      .addSelect('SUM(status.paidAmount)', 'paid')
      .addSelect('SUM(status.remainingAmount)', 'outstanding')
      .addSelect(
        'COUNT(*) FILTER (WHERE status.remainingAmount > 0 AND status.nextDueDate < :today)',
        'overdue',
      )
      .addSelect('COUNT(*) FILTER (WHERE status.remainingAmount > 0)', 'withBalance')
      .where('status.schoolId = :schoolId', { schoolId: actor.schoolId })
      .andWhere('structure.isActive = true')
      .setParameter('today', toDateString(this.clock.now()))
      .getRawOne<BalanceRow>();

    const totalCollected = amountOf(collection?.collected);
    const transactionCount = Number(collection?.count ?? 0);
    const totalExpected = amountOf(balances?.expected);

    this.logger.debug(`Analytics for school ${actor.schoolId}: ${transactionCount} payments, ${totalCollected} collected`);

    return {
      period: { startDate: range.startDate ?? null, endDate: range.endDate ?? null },
      totalCollected,
      transactionCount,
      averagePayment: averageAmount(totalCollected, transactionCount),
      totalRefunded: amountOf(collection?.refunded),
      totalExpected,
      totalOutstanding: amountOf(balances?.outstanding),
      collectionRate: percentageOf(amountOf(balances?.paid), totalExpected),
      overdueCount: Number(balances?.overdue ?? 0),
      studentsWithBalance: Number(balances?.withBalance ?? 0),
      paymentModes: modes.map((row) => ({
        mode: toPaymentMode(row.key),
        count: Number(row.count),
        amount: amountOf(row.amount),
      })),
      monthlyTrend: months.map((row) => ({ month: row.key, count: Number(row.count), amount: amountOf(row.amount) })),
    };
  }

  /** Students of active structures whose next installment date has passed, oldest due date first. */
  async getDefaulters(actor: ActorContext): Promise<Defaulter[]> {
    const today = this.clock.now();
    const rows = await this.feeStatusRepository
      .createQueryBuilder('status')
      .innerJoinAndSelect('status.student', 'student')
      .innerJoinAndSelect('status.feeStructure', 'structure')
      .leftJoinAndSelect('student.class', 'class')
      .where('status.schoolId = :schoolId', { schoolId: actor.schoolId })
      .andWhere('structure.isActive = true')
      .andWhere('status.remainingAmount > 0')
      .andWhere('status.nextDueDate < :today', { today: toDateString(today) })
      .orderBy('status.nextDueDate', 'ASC')
      .addOrderBy('status.remainingAmount', 'DESC')
      .getMany();

    return rows.flatMap((status) => {
      const { student, nextDueDate } = status;
      if (!student || !nextDueDate) return [];
      return [
        {
          studentId: student.id,
          studentName: studentFullName(student),
          admissionNo: student.admissionNo,
          className: student.class ? student.class.name : null,
          guardianPhone: student.guardianPhone ?? null,
          feeStructureId: status.feeStructureId,
          academicYear: status.feeStructure ? status.feeStructure.academicYear : null,
          totalFee: status.totalFee,
          paidAmount: status.paidAmount,
          amountDue: status.remainingAmount,
          dueDate: nextDueDate,
          daysOverdue: differenceInCalendarDays(today, parseISO(nextDueDate)),
          lastPaymentDate: status.lastPaymentDate ?? null,
        },
      ];
    });
  }

  private settledPayments(actor: ActorContext, range: AnalyticsRange) {
    const qb = this.paymentRepository
      .createQueryBuilder('payment')
      .where('payment.schoolId = :schoolId', { schoolId: actor.schoolId })
      .andWhere('payment.status IN (:...statuses)', { statuses: SETTLED });
    if (range.startDate) qb.andWhere('payment.paymentDate >= :startDate', { startDate: range.startDate });
    if (range.endDate) qb.andWhere('payment.paymentDate <= :endDate', { endDate: range.endDate });
    return qb;
  }
}

function toPaymentMode(value: string): PaymentMode {
  const mode = Object.values(PaymentMode).find((candidate) => candidate === value);
  if (!mode) {
    throw new Error(`Unknown payment mode in ledger: ${value}`);
  }
  return mode;
}
