import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Log, LogLevel } from './logs.entity';
import { ActorContext } from '../common/decorators/school.decorator';
import { errorStack } from '../common/utils/errors';
import { Payment } from '../finance/entities/payment.entity';
import { FeeStructure } from '../finance/entities/fee-structure.entity';

export interface LogEntry {
  action: string;
  module: string;
  level: LogLevel;
  schoolId?: string | null; // tenant scope
  performedBy?: {
    id: string;
    role: string;
  };
  entityId?: string;
  entityType?: string;
  oldValues?: Record<string, unknown>;
  newValues?: Record<string, unknown>;
  metadata?: Record<string, unknown>;
}

export interface ReminderRunSummary {
  sent: number;
  failed: number;
  total: number;
}

const performer = (actor: ActorContext) => ({ id: actor.userId, role: actor.role });

const paymentValues = (payment: Payment): Record<string, unknown> => ({
  receiptNumber: payment.receiptNumber,
  studentId: payment.studentId,
  feeStructureId: payment.feeStructureId,
  amount: payment.amount,
  paymentMode: payment.paymentMode,
  status: payment.status,
  transactionId: payment.transactionId ?? null,
});

@Injectable()
export class SystemLoggingService {
  private readonly logger = new Logger(SystemLoggingService.name);

  constructor(
    @InjectRepository(Log)
    private logRepository: Repository<Log>,
  ) {}

  /** Persists an audit row. Never throws: a lost audit line must not undo a committed payment. */
  async logAction(logEntry: LogEntry): Promise<void> {
    try {
      const log = this.logRepository.create({
        action: logEntry.action,
        module: logEntry.module,
        level: logEntry.level,
        performedBy: logEntry.performedBy ?? null,
        schoolId: logEntry.schoolId ?? null,
        entityId: logEntry.entityId ?? null,
        entityType: logEntry.entityType ?? null,
        oldValues: logEntry.oldValues ?? null,
        newValues: logEntry.newValues ?? null,
        metadata: {
          ...logEntry.metadata,
          timestamp: new Date().toISOString(),
        },
      });

      await this.logRepository.save(log);

      const message = `[${logEntry.module}] ${logEntry.action}`;
      const context = `${logEntry.entityType ?? 'entity'}:${logEntry.entityId ?? '-'}`;
      switch (logEntry.level) {
        case 'error':
          this.logger.error(`${message} ${context}`);
          break;
        case 'warn':
          this.logger.warn(`${message} ${context}`);
          break;
        case 'debug':
          this.logger.debug(`${message} ${context}`);
          break;
        default:
          this.logger.log(`${message} ${context}`);
      }
    } catch (error) {
      this.logger.error('Failed to save log entry', errorStack(error));
    }
  }

  // Finance Module Specific Logging
  async logPaymentRecorded(actor: ActorContext, payment: Payment) {
    await this.logAction({
      action: 'FEE_PAYMENT_RECORDED',
      module: 'FINANCE',
      level: 'info',
      schoolId: actor.schoolId,
      performedBy: performer(actor),
      entityId: payment.id,
      entityType: 'Payment',
      newValues: paymentValues(payment),
      metadata: {
        description: `Payment of ${payment.amount} recorded for student ${payment.studentId}`,
      },
    });
  }

  async logOnlinePaymentSettled(actor: ActorContext, payment: Payment, gatewayOrderId: string) {
    await this.logAction({
      action: 'ONLINE_PAYMENT_SETTLED',
      module: 'PAYMENT_GATEWAY',
      level: 'info',
      schoolId: actor.schoolId,
      performedBy: performer(actor),
      entityId: payment.id,
      entityType: 'Payment',
      newValues: paymentValues(payment),
      metadata: { gatewayOrderId },
    });
  }

  async logDuplicateCallback(actor: ActorContext, gatewayOrderId: string, transactionId: string) {
    await this.logAction({
      action: 'DUPLICATE_PAYMENT_CALLBACK',
      module: 'PAYMENT_GATEWAY',
      level: 'warn',
      schoolId: actor.schoolId,
      performedBy: performer(actor),
      entityId: gatewayOrderId,
      entityType: 'GatewayOrder',
      metadata: { transactionId },
    });
  }

  async logPaymentRefunded(actor: ActorContext, before: Payment, after: Payment) {
    await this.logAction({
      action: 'FEE_PAYMENT_REFUNDED',
      module: 'FINANCE',
      level: 'info',
      schoolId: actor.schoolId,
      performedBy: performer(actor),
      entityId: after.id,
      entityType: 'Payment',
      oldValues: { status: before.status, refundedAmount: before.refundedAmount },
      newValues: {
        status: after.status,
        refundedAmount: after.refundedAmount,
        refundReference: after.refundReference ?? null,
      },
    });
  }

  async logFeeStructureChange(
    actor: ActorContext,
    action: 'CREATED' | 'UPDATED' | 'ACTIVATED' | 'DELETED',
    structure: FeeStructure,
    oldValues?: Record<string, unknown>,
  ) {
    await this.logAction({
      action: `FEE_STRUCTURE_${action}`,
      module: 'FINANCE',
      level: 'info',
      schoolId: actor.schoolId,
      performedBy: performer(actor),
      entityId: structure.id,
      entityType: 'FeeStructure',
      oldValues,
      newValues: {
        classId: structure.classId,
        academicYear: structure.academicYear,
        totalFee: structure.totalFee,
        isActive: structure.isActive,
      },
    });
  }

  async logReminderRun(actor: ActorContext, summary: ReminderRunSummary) {
    await this.logAction({
      action: 'FEE_REMINDERS_SENT',
      module: 'NOTIFICATIONS',
      level: summary.failed > 0 ? 'warn' : 'info',
      schoolId: actor.schoolId,
      performedBy: performer(actor),
      entityType: 'StudentFeeStatus',
      metadata: { sent: summary.sent, failed: summary.failed, total: summary.total },
    });
  }
}
