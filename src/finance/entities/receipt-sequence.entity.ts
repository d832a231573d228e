import { Entity, PrimaryColumn, Column } from 'typeorm';

/** Last receipt number issued per school and day. */
@Entity('receipt_sequences')
export class ReceiptSequence {
  @PrimaryColumn({ type: 'uuid' })
  schoolId!: string;

  @PrimaryColumn({ type: 'varchar', length: 8 })
  day!: string; // yyyyMMdd

  @Column({ type: 'int', default: 0 })
  lastValue!: number;
}
