import { Injectable, Logger } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource, EntityManager, In } from 'typeorm';
import { Amount, normalizeAmount } from '../../common/money/money';
import { Student } from '../../student/entities/student.entity';
import { FeeStructure } from '../entities/fee-structure.entity';
import { Payment, PaymentStatus } from '../entities/payment.entity';
import { PaymentHistory } from '../entities/payment-history.entity';
import { StudentFeeStatus } from '../entities/student-fee-status.entity';
import { ReceiptSequence } from '../entities/receipt-sequence.entity';
import { GatewayOrder, GatewayOrderStatus } from '../../payment-gateway/entities/gateway-order.entity';
import {
  DerivedFeeStatus,
  FeeStatusSeed,
  LedgerReader,
  LedgerStore,
  LedgerTransaction,
  NewGatewayOrder,
  NewPayment,
  NewPaymentHistory,
  RefundMark,
} from './ledger-store';

class TypeOrmLedgerReader implements LedgerReader {
  constructor(protected readonly manager: EntityManager) {}

  findStudent(schoolId: string, studentId: string): Promise<Student | null> {
    return this.manager.findOne(Student, { where: { id: studentId, schoolId } });
  }

  findFeeStructure(schoolId: string, feeStructureId: string): Promise<FeeStructure | null> {
    return this.manager.findOne(FeeStructure, { where: { id: feeStructureId, schoolId } });
  }

  findActiveFeeStructure(schoolId: string, classId: string): Promise<FeeStructure | null> {
    return this.manager.findOne(FeeStructure, { where: { schoolId, classId, isActive: true } });
  }

  findPayment(schoolId: string, paymentId: string): Promise<Payment | null> {
    return this.manager.findOne(Payment, { where: { id: paymentId, schoolId } });
  }

  findPaymentByTransactionId(schoolId: string, transactionId: string): Promise<Payment | null> {
    return this.manager.findOne(Payment, { where: { transactionId, schoolId } });
  }

  findFeeStatus(studentId: string, feeStructureId: string): Promise<StudentFeeStatus | null> {
    return this.manager.findOne(StudentFeeStatus, { where: { studentId, feeStructureId } });
  }

  findOrder(schoolId: string, gatewayOrderId: string): Promise<GatewayOrder | null> {
    return this.manager.findOne(GatewayOrder, { where: { gatewayOrderId, schoolId } });
  }

  listOpenFeeStatuses(schoolId: string, studentIds?: string[]): Promise<StudentFeeStatus[]> {
    return this.manager.find(StudentFeeStatus, {
      where: {
        schoolId,
        isFullyPaid: false,
        ...(studentIds && studentIds.length > 0 ? { studentId: In(studentIds) } : {}),
      },
      order: { nextDueDate: 'ASC' },
    });
  }
}

class TypeOrmLedgerTransaction extends TypeOrmLedgerReader implements LedgerTransaction {
  insertPayment(payment: NewPayment): Promise<Payment> {
    return this.manager.save(this.manager.create(Payment, payment));
  }

  insertPaymentHistory(entry: NewPaymentHistory): Promise<PaymentHistory> {
    return this.manager.save(this.manager.create(PaymentHistory, entry));
  }

  async ensureFeeStatus(seed: FeeStatusSeed): Promise<StudentFeeStatus> {
    await this.manager
      .createQueryBuilder()
      .insert()
      .into(StudentFeeStatus)
      .values({
        ...seed,
        paidAmount: '0.00',
        remainingAmount: seed.totalFee,
        paymentPercentage: '0.00',
      })
      .orIgnore()
      .execute();
    return this.manager.findOneOrFail(StudentFeeStatus, {
      where: { studentId: seed.studentId, feeStructureId: seed.feeStructureId },
    });
  }

  lockFeeStatus(studentId: string, feeStructureId: string): Promise<StudentFeeStatus | null> {
    return this.manager.findOne(StudentFeeStatus, {
      where: { studentId, feeStructureId },
      lock: { mode: 'pessimistic_write' },
    });
  }

  async incrementPaidAmount(statusId: string, delta: Amount): Promise<StudentFeeStatus> {
    // the UPDATE takes the row lock; concurrent payers queue behind it
    await this.manager
      .createQueryBuilder()
      .update(StudentFeeStatus)
      .set({ paidAmount: () => '"paidAmount" + CAST(:delta AS numeric)' })
      .setParameter('delta', normalizeAmount(delta))
      .where('id = :id', { id: statusId })
      .execute();
    return this.manager.findOneOrFail(StudentFeeStatus, { where: { id: statusId } });
  }

  async saveDerivedStatus(status: DerivedFeeStatus): Promise<void> {
    const { id, ...derived } = status;
    await this.manager.update(StudentFeeStatus, { id }, derived);
  }

  async markPaymentRefunded(paymentId: string, refund: RefundMark): Promise<boolean> {
    const result = await this.manager
      .createQueryBuilder()
      .update(Payment)
      .set({
        status: PaymentStatus.REFUNDED,
        refundedAmount: refund.refundedAmount,
        refundReference: refund.refundReference,
      })
      .where('id = :id AND status = :status', { id: paymentId, status: PaymentStatus.COMPLETED })
      .execute();
    return result.affected === 1;
  }

  async nextReceiptSequence(schoolId: string, day: string): Promise<number> {
    const table = this.manager.getRepository(ReceiptSequence).metadata.tablePath;
    const rows: unknown = await this.manager.query(
      `INSERT INTO "${table}" ("schoolId", "day", "lastValue") VALUES ($1, $2, 1)
       ON CONFLICT ("schoolId", "day") DO UPDATE SET "lastValue" = "${table}"."lastValue" + 1
       RETURNING "lastValue"`,
      [schoolId, day],
    );
    const value = Array.isArray(rows) && rows.length > 0 ? Number(Reflect.get(rows[0], 'lastValue')) : NaN;
    if (!Number.isInteger(value)) {
      throw new Error(`Receipt sequence for ${schoolId}/${day} returned no value`);
    }
    return value;
  }

  insertOrder(order: NewGatewayOrder): Promise<GatewayOrder> {
    return this.manager.save(this.manager.create(GatewayOrder, { ...order, status: GatewayOrderStatus.CREATED }));
  }

  async markOrderPaid(orderId: string, paymentId: string): Promise<boolean> {
    const result = await this.manager
      .createQueryBuilder()
      .update(GatewayOrder)
      .set({ status: GatewayOrderStatus.PAID, paymentId })
      .where('id = :id AND status != :paid', { id: orderId, paid: GatewayOrderStatus.PAID })
      .execute();
    return result.affected === 1;
  }
}

@Injectable()
export class TypeOrmLedgerStore implements LedgerStore {
  private readonly logger = new Logger(TypeOrmLedgerStore.name);

  constructor(@InjectDataSource() private readonly dataSource: DataSource) {}

  read<T>(work: (reader: LedgerReader) => Promise<T>): Promise<T> {
    return work(new TypeOrmLedgerReader(this.dataSource.manager));
  }

  async transaction<T>(work: (tx: LedgerTransaction) => Promise<T>): Promise<T> {
    const queryRunner = this.dataSource.createQueryRunner();
    await queryRunner.connect();
    await queryRunner.startTransaction();

    try {
      const result = await work(new TypeOrmLedgerTransaction(queryRunner.manager));
      await queryRunner.commitTransaction();
      return result;
    } catch (error) {
      if (queryRunner.isTransactionActive) {
        await queryRunner.rollbackTransaction();
      }
      this.logger.warn(`Ledger transaction rolled back: ${error instanceof Error ? error.message : String(error)}`);
      throw error;
    } finally {
      await queryRunner.release();
    }
  }
}
