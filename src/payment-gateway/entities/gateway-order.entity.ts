import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, UpdateDateColumn, Index } from 'typeorm';

export enum GatewayOrderStatus {
  CREATED = 'created',
  PAID = 'paid',
  FAILED = 'failed',
}

export type GatewayName = 'razorpay' | 'stripe' | 'mock';

/**
 * An order opened with a gateway for a student's fee. Holds no money: the
 * ledger only moves once the gateway confirms a payment against it.
 */
@Entity('gateway_orders')
@Index('idx_gateway_orders_school_student', ['schoolId', 'studentId'])
export class GatewayOrder {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 20 })
  gateway!: GatewayName;

  @Index({ unique: true })
  @Column({ type: 'varchar', length: 100 })
  gatewayOrderId!: string;

  @Column({ type: 'varchar', length: 60 })
  receipt!: string;

  @Column({ type: 'decimal', precision: 12, scale: 2 })
  amount!: string;

  @Column({ type: 'varchar', length: 3 })
  currency!: string;

  @Column({ type: 'enum', enum: GatewayOrderStatus, default: GatewayOrderStatus.CREATED })
  status!: GatewayOrderStatus;

  @Column({ type: 'varchar', length: 100, nullable: true })
  paymentId?: string | null;

  @Column({ type: 'uuid' })
  studentId!: string;

  @Column({ type: 'uuid' })
  feeStructureId!: string;

  @Column({ type: 'uuid' })
  schoolId!: string;

  @Column({ type: 'uuid', nullable: true })
  createdById?: string | null;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
