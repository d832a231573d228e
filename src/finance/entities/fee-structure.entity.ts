import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn, CreateDateColumn, UpdateDateColumn, Index } from 'typeorm';
import { Class } from '../../classes/entity/class.entity';
import { School } from '../../school/entities/school.entity';

export const FEE_COMPONENTS = [
  'tuitionFee',
  'admissionFee',
  'developmentFee',
  'transportFee',
  'libraryFee',
  'labFee',
  'sportsFee',
  'otherFee',
] as const;

export type FeeComponent = (typeof FEE_COMPONENTS)[number];

export type FeeComponents = Record<FeeComponent, string>;

const money = { type: 'decimal', precision: 12, scale: 2, default: '0.00' } as const;

@Entity('fee_structures')
@Index('UQ_fee_structure_school_class_year', ['schoolId', 'classId', 'academicYear'], { unique: true })
@Index('UQ_fee_structure_active_class', ['schoolId', 'classId'], { unique: true, where: '"isActive" = true' })
export class FeeStructure {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 20 })
  academicYear!: string; // e.g. 2024-25

  @Column(money)
  tuitionFee!: string;

  @Column(money)
  admissionFee!: string;

  @Column(money)
  developmentFee!: string;

  @Column(money)
  transportFee!: string;

  @Column(money)
  libraryFee!: string;

  @Column(money)
  labFee!: string;

  @Column(money)
  sportsFee!: string;

  @Column(money)
  otherFee!: string;

  /** Sum of the components, maintained by the service */
  @Column({ type: 'decimal', precision: 12, scale: 2 })
  totalFee!: string;

  @Column({ type: 'int', default: 1 })
  installments!: number;

  /** ISO dates, one per installment */
  @Column({ type: 'jsonb', default: () => "'[]'" })
  dueDates!: string[];

  @Column({ type: 'boolean', default: true })
  isActive!: boolean;

  @Column({ type: 'uuid' })
  classId!: string;

  @ManyToOne(() => Class, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'classId' })
  class?: Class;

  // Multi-tenant scope
  @Column({ type: 'uuid' })
  schoolId!: string;

  @ManyToOne(() => School, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'schoolId' })
  school?: School;

  @Column({ type: 'uuid', nullable: true })
  createdById?: string | null;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
