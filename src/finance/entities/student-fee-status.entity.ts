import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn, UpdateDateColumn, Index } from 'typeorm';
import { Student } from '../../student/entities/student.entity';
import { FeeStructure } from './fee-structure.entity';

/**
 * Materialized balance of one student against one fee structure. `paidAmount`
 * only moves through an atomic increment; the other figures are derived from it.
 */
@Entity('student_fee_status')
@Index('UQ_student_fee_status_student_structure', ['studentId', 'feeStructureId'], { unique: true })
@Index('idx_student_fee_status_school_overdue', ['schoolId', 'isOverdue'])
export class StudentFeeStatus {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  studentId!: string;

  @ManyToOne(() => Student, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'studentId' })
  student?: Student;

  @Column({ type: 'uuid' })
  feeStructureId!: string;

  @ManyToOne(() => FeeStructure, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'feeStructureId' })
  feeStructure?: FeeStructure;

  @Column({ type: 'uuid' })
  schoolId!: string;

  @Column({ type: 'decimal', precision: 12, scale: 2 })
  totalFee!: string;

  @Column({ type: 'decimal', precision: 12, scale: 2, default: '0.00' })
  paidAmount!: string;

  @Column({ type: 'decimal', precision: 12, scale: 2 })
  remainingAmount!: string;

  @Column({ type: 'decimal', precision: 5, scale: 2, default: '0.00' })
  paymentPercentage!: string;

  @Column({ type: 'boolean', default: false })
  isFullyPaid!: boolean;

  @Column({ type: 'boolean', default: false })
  isOverdue!: boolean;

  @Column({ type: 'date', nullable: true })
  nextDueDate?: string | null;

  @Column({ type: 'date', nullable: true })
  lastPaymentDate?: string | null;

  @UpdateDateColumn()
  updatedAt!: Date;
}
