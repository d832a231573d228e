import { Inject, Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { CLOCK, Clock } from '../common/clock/clock';
import { ActorContext } from '../common/decorators/school.decorator';
import { Amount, addAmounts } from '../common/money/money';
import { Student, studentFullName } from '../student/entities/student.entity';
import { Payment } from './entities/payment.entity';
import { StudentFeeStatus } from './entities/student-fee-status.entity';
import { PaymentQueryDto } from './dtos/fee-query.dto';
import { applyFeeStatus } from './services/fee-status.calculator';
import { assertCanActForStudent } from './services/student-access';

export interface StudentFeeOverview {
  student: {
    id: string;
    name: string;
    admissionNo: string;
    classId: string;
  };
  feeStatuses: StudentFeeStatus[];
  totals: {
    totalFee: Amount;
    paidAmount: Amount;
    remainingAmount: Amount;
  };
  payments: Payment[];
}

export interface PaymentPage {
  payments: Payment[];
  pagination: {
    currentPage: number;
    totalPages: number;
    totalItems: number;
    itemsPerPage: number;
  };
}

const RECENT_PAYMENTS = 20;

@Injectable()
export class FinanceService {
  constructor(
    @InjectRepository(Payment)
    private readonly paymentRepository: Repository<Payment>,
    @InjectRepository(Student)
    private readonly studentRepository: Repository<Student>,
    @InjectRepository(StudentFeeStatus)
    private readonly feeStatusRepository: Repository<StudentFeeStatus>,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  /** Balances as of today; overdue flags are derived on read, nothing is written. */
  async getStudentFeeStatus(actor: ActorContext, studentId: string): Promise<StudentFeeOverview> {
    const student = await this.studentRepository.findOne({ where: { id: studentId, schoolId: actor.schoolId } });
    if (!student) {
      throw new NotFoundException('Student not found');
    }
    assertCanActForStudent(actor, student);

    const today = this.clock.now();
    const feeStatuses = (
      await this.feeStatusRepository.find({
        where: { studentId: student.id, schoolId: actor.schoolId },
        relations: ['feeStructure'],
        order: { updatedAt: 'DESC' },
      })
    ).map((status) => applyFeeStatus(status, status.feeStructure ?? null, today));

    const payments = await this.paymentRepository.find({
      where: { studentId: student.id, schoolId: actor.schoolId },
      order: { paymentDate: 'DESC', createdAt: 'DESC' },
      take: RECENT_PAYMENTS,
    });

    return {
      student: {
        id: student.id,
        name: studentFullName(student),
        admissionNo: student.admissionNo,
        classId: student.classId,
      },
      feeStatuses,
      totals: {
        totalFee: addAmounts(...feeStatuses.map((s) => s.totalFee)),
        paidAmount: addAmounts(...feeStatuses.map((s) => s.paidAmount)),
        remainingAmount: addAmounts(...feeStatuses.map((s) => s.remainingAmount)),
      },
      payments,
    };
  }

  async listPayments(actor: ActorContext, query: PaymentQueryDto = {}): Promise<PaymentPage> {
    const page = query.page ?? 1;
    const limit = query.limit ?? 20;

    const qb = this.paymentRepository
      .createQueryBuilder('payment')
      .leftJoinAndSelect('payment.student', 'student')
      .where('payment.schoolId = :schoolId', { schoolId: actor.schoolId })
      .orderBy('payment.paymentDate', 'DESC')
      .addOrderBy('payment.createdAt', 'DESC')
      .skip((page - 1) * limit)
      .take(limit);

    if (query.studentId) qb.andWhere('payment.studentId = :studentId', { studentId: query.studentId });
    if (query.feeStructureId) {
      qb.andWhere('payment.feeStructureId = :feeStructureId', { feeStructureId: query.feeStructureId });
    }
    if (query.paymentMode) qb.andWhere('payment.paymentMode = :paymentMode', { paymentMode: query.paymentMode });
    if (query.status) qb.andWhere('payment.status = :status', { status: query.status });
    if (query.startDate) qb.andWhere('payment.paymentDate >= :startDate', { startDate: query.startDate });
    if (query.endDate) qb.andWhere('payment.paymentDate <= :endDate', { endDate: query.endDate });

    const [payments, total] = await qb.getManyAndCount();
    return {
      payments,
      pagination: {
        currentPage: page,
        totalPages: Math.ceil(total / limit),
        totalItems: total,
        itemsPerPage: limit,
      },
    };
  }

  async getPayment(actor: ActorContext, id: string): Promise<Payment> {
    const payment = await this.paymentRepository.findOne({
      where: { id, schoolId: actor.schoolId },
      relations: ['student', 'feeStructure', 'school'],
    });
    if (!payment || !payment.student) {
      throw new NotFoundException('Payment not found');
    }
    assertCanActForStudent(actor, payment.student);
    return payment;
  }
}
