import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  CreateDateColumn,
  UpdateDateColumn,
  JoinColumn,
  Index,
} from 'typeorm';
import { Student } from '../../student/entities/student.entity';
import { School } from '../../school/entities/school.entity';
import { FeeStructure } from './fee-structure.entity';

export enum PaymentMode {
  CASH = 'cash',
  CHEQUE = 'cheque',
  BANK_TRANSFER = 'bank_transfer',
  ONLINE = 'online',
}

export enum PaymentStatus {
  PENDING = 'pending',
  COMPLETED = 'completed',
  REFUNDED = 'refunded',
}

/**
 * One row per payment received, whatever the channel. Rows are never edited
 * apart from the completed -> refunded transition.
 */
@Entity('payments')
@Index('UQ_payments_school_receipt', ['schoolId', 'receiptNumber'], { unique: true })
@Index('UQ_payments_school_transaction', ['schoolId', 'transactionId'], {
  unique: true,
  where: '"transactionId" IS NOT NULL',
})
@Index('idx_payments_student_structure', ['studentId', 'feeStructureId'])
export class Payment {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 50 })
  receiptNumber!: string;

  @Column({ type: 'decimal', precision: 12, scale: 2 })
  amount!: string;

  /** Date the money was received */
  @Column({ type: 'date' })
  paymentDate!: string;

  @Column({ type: 'enum', enum: PaymentMode })
  paymentMode!: PaymentMode;

  @Column({ type: 'enum', enum: PaymentStatus, default: PaymentStatus.COMPLETED })
  status!: PaymentStatus;

  /** Gateway payment id for online payments, bank reference otherwise */
  @Column({ type: 'varchar', length: 100, nullable: true })
  transactionId?: string | null;

  @Column({ type: 'varchar', length: 50, nullable: true })
  chequeNo?: string | null;

  @Column({ type: 'varchar', length: 100, nullable: true })
  bankName?: string | null;

  @Column({ type: 'text', nullable: true })
  remarks?: string | null;

  @Column({ type: 'decimal', precision: 12, scale: 2, default: '0.00' })
  refundedAmount!: string;

  @Column({ type: 'varchar', length: 100, nullable: true })
  refundReference?: string | null;

  @Column({ type: 'uuid' })
  studentId!: string;

  @ManyToOne(() => Student)
  @JoinColumn({ name: 'studentId' })
  student?: Student;

  @Column({ type: 'uuid' })
  feeStructureId!: string;

  @ManyToOne(() => FeeStructure, { onDelete: 'RESTRICT' })
  @JoinColumn({ name: 'feeStructureId' })
  feeStructure?: FeeStructure;

  @Column({ type: 'uuid' })
  schoolId!: string;

  @ManyToOne(() => School, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'schoolId' })
  school?: School;

  @Column({ type: 'uuid', nullable: true })
  collectedById?: string | null;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
