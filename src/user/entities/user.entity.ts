import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn, CreateDateColumn } from 'typeorm';
import { Role } from '../enums/role.enum';
import { School } from '../../school/entities/school.entity';

@Entity('users')
export class User {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ unique: true })
  username!: string;

  // Explicit type to avoid reflect-metadata emitting Object for union (string | null)
  @Column({ type: 'varchar', length: 255, unique: true, nullable: true })
  email?: string | null;

  @Column({
    type: 'enum',
    enum: Role,
    default: Role.STUDENT,
  })
  role!: Role;

  @Column({ type: 'varchar', length: 20, nullable: true })
  phone?: string | null;

  // Multi-tenancy: nullable for SUPER_ADMIN only
  @Column({ type: 'uuid', nullable: true })
  schoolId?: string | null;

  @ManyToOne(() => School, (school) => school.users, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'schoolId' })
  school?: School | null;

  @CreateDateColumn()
  createdAt!: Date;
}
