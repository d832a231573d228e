import {
  Entity,
  Column,
  ManyToOne,
  JoinColumn,
  PrimaryGeneratedColumn,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';
import { Class } from '../../classes/entity/class.entity';
import { School } from '../../school/entities/school.entity';

export enum StudentStatus {
  ACTIVE = 'active',
  INACTIVE = 'inactive',
  GRADUATED = 'graduated',
}

@Index('UQ_student_admission_school', ['schoolId', 'admissionNo'], { unique: true })
@Entity('students')
export class Student {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ length: 50 })
  admissionNo!: string;

  @Column()
  firstName!: string;

  @Column()
  lastName!: string;

  @Column({ type: 'enum', enum: StudentStatus, default: StudentStatus.ACTIVE })
  status!: StudentStatus;

  @Column({ type: 'varchar', length: 150, nullable: true })
  guardianName?: string | null;

  @Column({ type: 'varchar', length: 20, nullable: true })
  guardianPhone?: string | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  guardianEmail?: string | null;

  @Column({ default: false })
  whatsappOptIn!: boolean;

  // login of the student, when they have one
  @Column({ type: 'uuid', nullable: true })
  userId?: string | null;

  @Column({ type: 'uuid', nullable: true })
  parentUserId?: string | null;

  @Index()
  @Column({ type: 'uuid' })
  classId!: string;

  @ManyToOne(() => Class, (cls) => cls.students)
  @JoinColumn({ name: 'classId' })
  class?: Class;

  @Index()
  @Column({ type: 'uuid' })
  schoolId!: string;

  @ManyToOne(() => School, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'schoolId' })
  school?: School;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}

export const studentFullName = (student: Pick<Student, 'firstName' | 'lastName'>): string =>
  `${student.firstName} ${student.lastName}`.trim();
