import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import * as XLSX from 'xlsx';
import { ActorContext } from '../../common/decorators/school.decorator';
import { studentFullName } from '../../student/entities/student.entity';
import { Payment } from '../entities/payment.entity';
import { StudentFeeStatus } from '../entities/student-fee-status.entity';
import { AnalyticsRange, FeeAnalyticsService } from './fee-analytics.service';

export type ExportKind = 'payments' | 'outstanding' | 'defaulters';

export const EXPORT_KINDS: readonly ExportKind[] = ['payments', 'outstanding', 'defaulters'];

export const isExportKind = (value: string): value is ExportKind =>
  EXPORT_KINDS.some((kind) => kind === value);

type Row = Record<string, string | number>;

/** Renders rows as CSV with a fixed header, so an empty export still carries the columns. */
export function toCsv(headers: string[], rows: Row[]): string {
  const sheet = XLSX.utils.json_to_sheet(rows, { header: headers });
  if (rows.length === 0) {
    XLSX.utils.sheet_add_aoa(sheet, [headers], { origin: 'A1' });
  }
  return XLSX.utils.sheet_to_csv(sheet);
}

const PAYMENT_HEADERS = [
  'Receipt Number',
  'Payment Date',
  'Admission No',
  'Student Name',
  'Amount',
  'Refunded Amount',
  'Payment Mode',
  'Status',
  'Transaction ID',
  'Cheque No',
  'Bank Name',
];

const OUTSTANDING_HEADERS = [
  'Admission No',
  'Student Name',
  'Class',
  'Academic Year',
  'Total Fee',
  'Paid Amount',
  'Remaining Amount',
  'Payment %',
  'Next Due Date',
  'Overdue',
];

const DEFAULTER_HEADERS = [
  'Admission No',
  'Student Name',
  'Class',
  'Guardian Phone',
  'Amount Due',
  'Due Date',
  'Days Overdue',
  'Last Payment Date',
];

@Injectable()
export class FeeExportService {
  constructor(
    @InjectRepository(Payment)
    private readonly paymentRepository: Repository<Payment>,
    @InjectRepository(StudentFeeStatus)
    private readonly feeStatusRepository: Repository<StudentFeeStatus>,
    private readonly feeAnalyticsService: FeeAnalyticsService,
  ) {}

  async export(actor: ActorContext, kind: ExportKind, range: AnalyticsRange = {}): Promise<string> {
    switch (kind) {
      case 'payments':
        return this.exportPayments(actor, range);
      case 'outstanding':
        return this.exportOutstanding(actor);
      case 'defaulters':
        return this.exportDefaulters(actor);
    }
  }

  async exportPayments(actor: ActorContext, range: AnalyticsRange = {}): Promise<string> {
    const qb = this.paymentRepository
      .createQueryBuilder('payment')
      .leftJoinAndSelect('payment.student', 'student')
      .where('payment.schoolId = :schoolId', { schoolId: actor.schoolId })
      .orderBy('payment.paymentDate', 'ASC')
      .addOrderBy('payment.receiptNumber', 'ASC');
    if (range.startDate) qb.andWhere('payment.paymentDate >= :startDate', { startDate: range.startDate });
    if (range.endDate) qb.andWhere('payment.paymentDate <= :endDate', { endDate: range.endDate });
    const payments = await qb.getMany();

    return toCsv(
      PAYMENT_HEADERS,
      payments.map((payment) => ({
        'Receipt Number': payment.receiptNumber,
        'Payment Date': payment.paymentDate,
        'Admission No': payment.student ? payment.student.admissionNo : '',
        'Student Name': payment.student ? studentFullName(payment.student) : '',
        Amount: payment.amount,
        'Refunded Amount': payment.refundedAmount,
        'Payment Mode': payment.paymentMode,
        Status: payment.status,
        'Transaction ID': payment.transactionId ?? '',
        'Cheque No': payment.chequeNo ?? '',
        'Bank Name': payment.bankName ?? '',
      })),
    );
  }

  async exportOutstanding(actor: ActorContext): Promise<string> {
    const statuses = await this.feeStatusRepository
      .createQueryBuilder('status')
      .innerJoinAndSelect('status.student', 'student')
      .innerJoinAndSelect('status.feeStructure', 'structure')
      .leftJoinAndSelect('student.class', 'class')
      .where('status.schoolId = :schoolId', { schoolId: actor.schoolId })
      .andWhere('structure.isActive = true')
      .andWhere('status.remainingAmount > 0')
      .orderBy('status.remainingAmount', 'DESC')
      .getMany();

    return toCsv(
      OUTSTANDING_HEADERS,
      statuses.map((status) => ({
        'Admission No': status.student ? status.student.admissionNo : '',
        'Student Name': status.student ? studentFullName(status.student) : '',
        Class: status.student && status.student.class ? status.student.class.name : '',
        'Academic Year': status.feeStructure ? status.feeStructure.academicYear : '',
        'Total Fee': status.totalFee,
        'Paid Amount': status.paidAmount,
        'Remaining Amount': status.remainingAmount,
        'Payment %': status.paymentPercentage,
        'Next Due Date': status.nextDueDate ?? '',
        Overdue: status.isOverdue ? 'Yes' : 'No',
      })),
    );
  }

  async exportDefaulters(actor: ActorContext): Promise<string> {
    const defaulters = await this.feeAnalyticsService.getDefaulters(actor);
    return toCsv(
      DEFAULTER_HEADERS,
      defaulters.map((d) => ({
        'Admission No': d.admissionNo,
        'Student Name': d.studentName,
        Class: d.className ?? '',
        'Guardian Phone': d.guardianPhone ?? '',
        'Amount Due': d.amountDue,
        'Due Date': d.dueDate,
        'Days Overdue': d.daysOverdue,
        'Last Payment Date': d.lastPaymentDate ?? '',
      })),
    );
  }
}
