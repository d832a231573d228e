import { Inject, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { differenceInCalendarDays, format, parseISO } from 'date-fns';
import { CLOCK, Clock } from '../../common/clock/clock';
import { ActorContext } from '../../common/decorators/school.decorator';
import { OperationResult, succeed } from '../../common/result/operation-result';
import { errorMessage } from '../../common/utils/errors';
import { ConfigService } from '../../config/config.service';
import { SystemLoggingService } from '../../logs/system-logging.service';
import { NotificationService } from '../../notifications/notification.service';
import { NotificationPriority, NotificationType } from '../../notifications/entities/notification.entity';
import {
  NOTIFICATION_SENDER,
  NotificationChannel,
  NotificationRecipient,
  NotificationSender,
  TemplateKey,
  TemplateVariables,
  isNotificationChannel,
} from '../../notifications/delivery/notification-sender';
import { School } from '../../school/entities/school.entity';
import { Class } from '../../classes/entity/class.entity';
import { Student, studentFullName } from '../../student/entities/student.entity';
import { Payment } from '../entities/payment.entity';
import { StudentFeeStatus } from '../entities/student-fee-status.entity';
import { LEDGER_STORE, LedgerStore } from '../ledger/ledger-store';
import { LedgerPostingService } from './ledger-posting.service';

export interface ReminderRequest {
  studentIds?: string[];
  channels?: NotificationChannel[];
}

export interface ReminderFailure {
  studentId: string;
  channel: NotificationChannel | null;
  error: string;
}

export interface ReminderSummary {
  sent: number;
  failed: number;
  /** messages attempted */
  total: number;
  students: number;
  failures: ReminderFailure[];
}

const displayDate = (isoDate: string | null | undefined): string =>
  isoDate ? format(parseISO(isoDate), 'dd/MM/yyyy') : 'N/A';

export const guardianOf = (student: Student): NotificationRecipient => ({
  name: student.guardianName || 'Parent',
  phone: student.guardianPhone ?? null,
  email: student.guardianEmail ?? null,
});

@Injectable()
export class FeeNotificationService {
  private readonly logger = new Logger(FeeNotificationService.name);
  private readonly currency: string;
  private readonly reminderChannels: NotificationChannel[];
  private readonly confirmationChannels: NotificationChannel[] = ['sms', 'email'];

  constructor(
    @Inject(LEDGER_STORE) private readonly store: LedgerStore,
    @Inject(NOTIFICATION_SENDER) private readonly sender: NotificationSender,
    @Inject(CLOCK) private readonly clock: Clock,
    private readonly posting: LedgerPostingService,
    private readonly notificationService: NotificationService,
    private readonly systemLoggingService: SystemLoggingService,
    @InjectRepository(School) private readonly schoolRepository: Repository<School>,
    @InjectRepository(Class) private readonly classRepository: Repository<Class>,
    configService: ConfigService,
  ) {
    this.currency = configService.getOptional('PAYMENT_CURRENCY', 'INR');
    const configured = configService.getList('REMINDER_CHANNELS', ['sms', 'email']).filter(isNotificationChannel);
    this.reminderChannels = configured.length > 0 ? configured : ['sms', 'email'];
  }

  /**
   * Refreshes the overdue flag of every open balance in the school, then messages
   * the guardians of overdue students. One failed message never stops the run.
   */
  async sendFeeReminders(actor: ActorContext, request: ReminderRequest = {}): Promise<OperationResult<ReminderSummary>> {
    const today = this.clock.now();
    const channels = request.channels && request.channels.length > 0 ? request.channels : this.reminderChannels;
    const open = await this.store.read((reader) => reader.listOpenFeeStatuses(actor.schoolId, request.studentIds));
    const school = await this.schoolRepository.findOne({ where: { id: actor.schoolId } });

    const summary: ReminderSummary = { sent: 0, failed: 0, total: 0, students: 0, failures: [] };

    for (const candidate of open) {
      try {
        await this.remindStudent(actor, candidate, channels, school, today, summary);
      } catch (error) {
        this.logger.error(`Reminder for student ${candidate.studentId} failed: ${errorMessage(error)}`);
        summary.failed++;
        summary.failures.push({ studentId: candidate.studentId, channel: null, error: errorMessage(error) });
      }
    }
    summary.total = summary.sent + summary.failed;

    await this.recordRun(actor, summary);
    return succeed(summary, `Sent ${summary.sent} reminders, ${summary.failed} failed`);
  }

  /** Best effort: failures are logged and never reach the caller. */
  async notifyPaymentReceived(actor: ActorContext, payment: Payment, feeStatus: StudentFeeStatus): Promise<void> {
    await this.notifyGuardian(actor, payment, 'payment_confirmation', {
      amount_paid: this.money(payment.amount),
      receipt_no: payment.receiptNumber,
      payment_date: displayDate(payment.paymentDate),
      remaining_amount: this.money(feeStatus.remainingAmount),
    });
  }

  async notifyRefund(actor: ActorContext, payment: Payment, feeStatus: StudentFeeStatus): Promise<void> {
    await this.notifyGuardian(actor, payment, 'refund_confirmation', {
      refund_amount: this.money(payment.refundedAmount),
      receipt_no: payment.receiptNumber,
      remaining_amount: this.money(feeStatus.remainingAmount),
    });
  }

  private async notifyGuardian(
    actor: ActorContext,
    payment: Payment,
    templateKey: TemplateKey,
    extra: TemplateVariables,
  ): Promise<void> {
    try {
      const student = await this.store.read((reader) => reader.findStudent(actor.schoolId, payment.studentId));
      if (!student) return;
      const school = await this.schoolRepository.findOne({ where: { id: actor.schoolId } });
      const variables: TemplateVariables = {
        student_name: studentFullName(student),
        class_name: await this.className(student),
        school_name: school?.name ?? '',
        ...extra,
      };
      const channels = student.whatsappOptIn ? [...this.confirmationChannels, 'whatsapp' as const] : this.confirmationChannels;
      for (const channel of channels) {
        const error = await this.deliver(guardianOf(student), channel, templateKey, variables);
        if (error) {
          this.logger.warn(`${templateKey} for ${payment.receiptNumber} via ${channel} failed: ${error}`);
        }
      }
    } catch (error) {
      this.logger.error(`${templateKey} for ${payment.receiptNumber} failed: ${errorMessage(error)}`);
    }
  }

  private async remindStudent(
    actor: ActorContext,
    candidate: StudentFeeStatus,
    channels: NotificationChannel[],
    school: School | null,
    today: Date,
    summary: ReminderSummary,
  ): Promise<void> {
    const status = await this.refreshStatus(actor.schoolId, candidate, today);
    if (!status || !status.isOverdue) return;

    const student = await this.store.read((reader) => reader.findStudent(actor.schoolId, status.studentId));
    if (!student) return;
    const variables = await this.reminderVariables(student, status, school, today);
    summary.students++;

    for (const channel of channels) {
      if (channel === 'whatsapp' && !student.whatsappOptIn) continue;
      const error = await this.deliver(guardianOf(student), channel, 'fee_reminder', variables);
      if (error) {
        summary.failed++;
        summary.failures.push({ studentId: student.id, channel, error });
      } else {
        summary.sent++;
      }
    }
  }

  private async refreshStatus(schoolId: string, candidate: StudentFeeStatus, today: Date): Promise<StudentFeeStatus | null> {
    return this.store.transaction(async (tx) => {
      const locked = await tx.lockFeeStatus(candidate.studentId, candidate.feeStructureId);
      if (!locked) return null;
      const structure = await tx.findFeeStructure(schoolId, locked.feeStructureId);
      return this.posting.persistDerived(tx, locked, structure, today);
    });
  }

  private async reminderVariables(
    student: Student,
    status: StudentFeeStatus,
    school: School | null,
    today: Date,
  ): Promise<TemplateVariables> {
    return {
      student_name: studentFullName(student),
      class_name: await this.className(student),
      pending_amount: this.money(status.remainingAmount),
      due_date: displayDate(status.nextDueDate),
      days_overdue: status.nextDueDate ? differenceInCalendarDays(today, parseISO(status.nextDueDate)) : 0,
      school_name: school?.name ?? '',
      school_phone: school?.phone ?? '',
    };
  }

  private async deliver(
    recipient: NotificationRecipient,
    channel: NotificationChannel,
    templateKey: TemplateKey,
    variables: TemplateVariables,
  ): Promise<string | null> {
    try {
      const result = await this.sender.send(recipient, channel, templateKey, variables);
      return result.ok ? null : result.error ?? 'Delivery failed';
    } catch (error) {
      return errorMessage(error);
    }
  }

  private async className(student: Student): Promise<string> {
    const cls = await this.classRepository.findOne({ where: { id: student.classId } });
    if (!cls) return 'N/A';
    return cls.section ? `${cls.name} ${cls.section}` : cls.name;
  }

  private money(amount: string): string {
    return `${this.currency} ${amount}`;
  }

  private async recordRun(actor: ActorContext, summary: ReminderSummary): Promise<void> {
    try {
      await this.notificationService.create({
        title: 'Fee reminders sent',
        message: `${summary.sent} of ${summary.total} reminder messages delivered to guardians of ${summary.students} students`,
        type: NotificationType.FEE_REMINDER,
        priority: summary.failed > 0 ? NotificationPriority.HIGH : NotificationPriority.LOW,
        schoolId: actor.schoolId,
        metadata: { sent: summary.sent, failed: summary.failed, total: summary.total },
      });
    } catch (error) {
      this.logger.error(`Could not store reminder summary: ${errorMessage(error)}`);
    }
    await this.systemLoggingService.logReminderRun(actor, summary);
  }
}
