import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, ManyToOne, JoinColumn, Index } from 'typeorm';
import { Payment, PaymentStatus } from './payment.entity';

export enum PaymentHistoryAction {
  CREATED = 'created',
  REFUNDED = 'refunded',
}

@Entity('payment_history')
export class PaymentHistory {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index()
  @Column({ type: 'uuid' })
  paymentId!: string;

  @ManyToOne(() => Payment, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'paymentId' })
  payment?: Payment;

  @Column({ type: 'enum', enum: PaymentHistoryAction })
  action!: PaymentHistoryAction;

  @Column({ type: 'enum', enum: PaymentStatus, nullable: true })
  oldStatus?: PaymentStatus | null;

  @Column({ type: 'enum', enum: PaymentStatus })
  newStatus!: PaymentStatus;

  @Column({ type: 'decimal', precision: 12, scale: 2 })
  amountChanged!: string;

  @Column({ type: 'text', nullable: true })
  remarks?: string | null;

  @Column({ type: 'uuid', nullable: true })
  changedById?: string | null;

  @CreateDateColumn()
  changedAt!: Date;
}
