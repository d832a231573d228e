import {
  BadRequestException,
  ConflictException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, FindOptionsWhere, Repository } from 'typeorm';
import { CLOCK, Clock } from '../../common/clock/clock';
import { ActorContext } from '../../common/decorators/school.decorator';
import { addAmounts, compareAmounts, normalizeAmount } from '../../common/money/money';
import { isUniqueViolation } from '../../common/utils/errors';
import { SystemLoggingService } from '../../logs/system-logging.service';
import { Class } from '../../classes/entity/class.entity';
import { Student, StudentStatus } from '../../student/entities/student.entity';
import { FEE_COMPONENTS, FeeComponent, FeeComponents, FeeStructure } from '../entities/fee-structure.entity';
import { Payment } from '../entities/payment.entity';
import { StudentFeeStatus } from '../entities/student-fee-status.entity';
import { CreateFeeStructureDto, FeeComponentsDto, UpdateFeeStructureDto } from '../dtos/fees-structure.dto';
import { applyFeeStatus } from './fee-status.calculator';

export interface FeeStructureFilters {
  classId?: string;
  academicYear?: string;
  activeOnly?: boolean;
}

export interface FeeStructureChange {
  structure: FeeStructure;
  /** status rows seeded or re-derived by the change */
  statusesUpdated: number;
}

const ZERO = '0.00';

/** Components from the request; a bare total with no components is booked as "other". */
export function resolveComponents(dto: FeeComponentsDto & { totalFee?: string }): FeeComponents {
  const pick = (key: FeeComponent) => normalizeAmount(dto[key] ?? ZERO);
  const components: FeeComponents = {
    tuitionFee: pick('tuitionFee'),
    admissionFee: pick('admissionFee'),
    developmentFee: pick('developmentFee'),
    transportFee: pick('transportFee'),
    libraryFee: pick('libraryFee'),
    labFee: pick('labFee'),
    sportsFee: pick('sportsFee'),
    otherFee: pick('otherFee'),
  };
  const given = FEE_COMPONENTS.some((key) => dto[key] !== undefined);

  if (!given) {
    if (!dto.totalFee) {
      throw new BadRequestException('At least one fee component or a totalFee is required');
    }
    components.otherFee = normalizeAmount(dto.totalFee);
    return components;
  }
  if (dto.totalFee && compareAmounts(dto.totalFee, sumComponents(components)) !== 0) {
    throw new BadRequestException('totalFee does not match the sum of the fee components');
  }
  return components;
}

export const sumComponents = (components: FeeComponents): string =>
  addAmounts(...FEE_COMPONENTS.map((key) => components[key]));

/** One due date per installment, returned in calendar order. */
export function resolveSchedule(installments: number | undefined, dueDates: string[] | undefined) {
  const dates = [...(dueDates ?? [])].sort();
  const count = installments ?? (dates.length || 1);
  if (dates.length > 0 && dates.length !== count) {
    throw new BadRequestException(`Expected ${count} due dates for ${count} installments, got ${dates.length}`);
  }
  if (new Set(dates).size !== dates.length) {
    throw new BadRequestException('Due dates must be distinct');
  }
  return { installments: count, dueDates: dates };
}

const componentValues = (structure: FeeStructure): Record<string, unknown> => ({
  ...Object.fromEntries(FEE_COMPONENTS.map((key) => [key, structure[key]])),
  totalFee: structure.totalFee,
  installments: structure.installments,
  dueDates: structure.dueDates,
});

@Injectable()
export class FeeStructureService {
  private readonly logger = new Logger(FeeStructureService.name);

  constructor(
    @InjectRepository(FeeStructure)
    private readonly feeStructureRepository: Repository<FeeStructure>,
    @InjectRepository(Class)
    private readonly classRepository: Repository<Class>,
    @InjectRepository(Payment)
    private readonly paymentRepository: Repository<Payment>,
    private readonly dataSource: DataSource,
    @Inject(CLOCK) private readonly clock: Clock,
    private readonly systemLoggingService: SystemLoggingService,
  ) {}

  async listFeeStructures(actor: ActorContext, filters: FeeStructureFilters = {}): Promise<FeeStructure[]> {
    const where: FindOptionsWhere<FeeStructure> = { schoolId: actor.schoolId };
    if (filters.classId) where.classId = filters.classId;
    if (filters.academicYear) where.academicYear = filters.academicYear;
    if (filters.activeOnly) where.isActive = true;

    return this.feeStructureRepository.find({
      where,
      relations: ['class'],
      order: { academicYear: 'DESC', createdAt: 'DESC' },
    });
  }

  async getFeeStructure(actor: ActorContext, id: string): Promise<FeeStructure> {
    const structure = await this.feeStructureRepository.findOne({ where: { id, schoolId: actor.schoolId } });
    if (!structure) {
      throw new NotFoundException('Fee structure not found');
    }
    return structure;
  }

  async createFeeStructure(actor: ActorContext, dto: CreateFeeStructureDto): Promise<FeeStructureChange> {
    const klass = await this.classRepository.findOne({ where: { id: dto.classId, schoolId: actor.schoolId } });
    if (!klass) {
      throw new NotFoundException('Class not found');
    }
    const components = resolveComponents(dto);
    const schedule = resolveSchedule(dto.installments, dto.dueDates);
    const isActive = dto.isActive ?? true;

    const change = await this.withConflictMapping(() =>
      this.dataSource.transaction(async (manager) => {
        const existing = await manager.findOne(FeeStructure, {
          where: { schoolId: actor.schoolId, classId: dto.classId, academicYear: dto.academicYear },
        });
        if (existing) {
          throw new ConflictException(`A fee structure for ${dto.academicYear} already exists for this class`);
        }
        if (isActive) {
          await this.deactivateOthers(manager, actor.schoolId, dto.classId);
        }

        const structure = await manager.save(
          manager.create(FeeStructure, {
            ...components,
            totalFee: sumComponents(components),
            academicYear: dto.academicYear,
            installments: schedule.installments,
            dueDates: schedule.dueDates,
            isActive,
            classId: dto.classId,
            schoolId: actor.schoolId,
            createdById: actor.userId,
          }),
        );
        const statusesUpdated = isActive ? await this.seedStatuses(manager, structure) : 0;
        return { structure, statusesUpdated };
      }),
    );

    this.logger.log(
      `Created fee structure ${change.structure.id} (${change.structure.academicYear}) for class ${klass.name}, total ${change.structure.totalFee}`,
    );
    await this.systemLoggingService.logFeeStructureChange(actor, 'CREATED', change.structure);
    return change;
  }

  /** Changing amounts or the schedule re-derives every status row of the structure. */
  async updateFeeStructure(actor: ActorContext, id: string, dto: UpdateFeeStructureDto): Promise<FeeStructureChange> {
    let oldValues: Record<string, unknown> = {};
    const change = await this.dataSource.transaction(async (manager) => {
      const structure = await manager.findOne(FeeStructure, {
        where: { id, schoolId: actor.schoolId },
        lock: { mode: 'pessimistic_write' },
      });
      if (!structure) {
        throw new NotFoundException('Fee structure not found');
      }
      oldValues = componentValues(structure);

      for (const key of FEE_COMPONENTS) {
        const value = dto[key];
        if (value !== undefined) {
          structure[key] = normalizeAmount(value);
        }
      }
      structure.totalFee = sumComponents(structure);
      if (dto.installments !== undefined || dto.dueDates !== undefined) {
        const schedule = resolveSchedule(
          dto.installments ?? (dto.dueDates ? undefined : structure.installments),
          dto.dueDates ?? structure.dueDates,
        );
        structure.installments = schedule.installments;
        structure.dueDates = schedule.dueDates;
      }

      const saved = await manager.save(structure);
      const statusesUpdated = await this.rederiveStatuses(manager, saved);
      return { structure: saved, statusesUpdated };
    });

    this.logger.log(`Updated fee structure ${id}; re-derived ${change.statusesUpdated} student balances`);
    await this.systemLoggingService.logFeeStructureChange(actor, 'UPDATED', change.structure, oldValues);
    return change;
  }

  async activateFeeStructure(actor: ActorContext, id: string): Promise<FeeStructureChange> {
    const change = await this.withConflictMapping(() =>
      this.dataSource.transaction(async (manager) => {
        const structure = await manager.findOne(FeeStructure, {
          where: { id, schoolId: actor.schoolId },
          lock: { mode: 'pessimistic_write' },
        });
        if (!structure) {
          throw new NotFoundException('Fee structure not found');
        }
        if (structure.isActive) {
          return { structure, statusesUpdated: 0 };
        }

        await this.deactivateOthers(manager, actor.schoolId, structure.classId);
        structure.isActive = true;
        const saved = await manager.save(structure);
        const statusesUpdated = await this.seedStatuses(manager, saved);
        return { structure: saved, statusesUpdated };
      }),
    );

    this.logger.log(`Activated fee structure ${id} for class ${change.structure.classId}`);
    await this.systemLoggingService.logFeeStructureChange(actor, 'ACTIVATED', change.structure);
    return change;
  }

  async deleteFeeStructure(actor: ActorContext, id: string): Promise<void> {
    const structure = await this.getFeeStructure(actor, id);
    const payments = await this.paymentRepository.count({ where: { feeStructureId: id, schoolId: actor.schoolId } });
    if (payments > 0) {
      throw new ConflictException(`Fee structure has ${payments} recorded payment(s) and cannot be deleted`);
    }

    await this.feeStructureRepository.delete({ id, schoolId: actor.schoolId });
    this.logger.log(`Deleted fee structure ${id}`);
    await this.systemLoggingService.logFeeStructureChange(actor, 'DELETED', structure, componentValues(structure));
  }

  private async deactivateOthers(manager: EntityManager, schoolId: string, classId: string): Promise<void> {
    await manager.update(FeeStructure, { schoolId, classId, isActive: true }, { isActive: false });
  }

  /** Opens a zero balance for every active student of the class that has none yet. */
  private async seedStatuses(manager: EntityManager, structure: FeeStructure): Promise<number> {
    const students = await manager.find(Student, {
      where: { schoolId: structure.schoolId, classId: structure.classId, status: StudentStatus.ACTIVE },
    });
    if (students.length === 0) {
      return 0;
    }

    const today = this.clock.now();
    const rows = students.map((student) =>
      applyFeeStatus(
        manager.create(StudentFeeStatus, {
          studentId: student.id,
          feeStructureId: structure.id,
          schoolId: structure.schoolId,
          totalFee: structure.totalFee,
          paidAmount: ZERO,
          lastPaymentDate: null,
        }),
        structure,
        today,
      ),
    );
    await manager.createQueryBuilder().insert().into(StudentFeeStatus).values(rows).orIgnore().execute();
    return rows.length;
  }

  private async rederiveStatuses(manager: EntityManager, structure: FeeStructure): Promise<number> {
    const statuses = await manager.find(StudentFeeStatus, {
      where: { feeStructureId: structure.id },
      lock: { mode: 'pessimistic_write' },
    });
    const today = this.clock.now();
    for (const status of statuses) {
      applyFeeStatus(status, structure, today);
      await manager.update(StudentFeeStatus, status.id, {
        totalFee: status.totalFee,
        remainingAmount: status.remainingAmount,
        paymentPercentage: status.paymentPercentage,
        isFullyPaid: status.isFullyPaid,
        isOverdue: status.isOverdue,
        nextDueDate: status.nextDueDate ?? null,
      });
    }
    return statuses.length;
  }

  private async withConflictMapping<T>(work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictException('Another active fee structure was saved for this class at the same time');
      }
      throw error;
    }
  }
}
