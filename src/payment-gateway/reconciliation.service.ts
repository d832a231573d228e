import {
  BadRequestException,
  ConflictException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { createHash, randomUUID } from 'node:crypto';
import { format } from 'date-fns';
import { CLOCK, Clock, toDateString } from '../common/clock/clock';
import { DEFAULT_CURRENCY } from '../common/constants/constants';
import { ActorContext } from '../common/decorators/school.decorator';
import {
  Amount,
  clampToZero,
  compareAmounts,
  isPositiveAmount,
  normalizeAmount,
  subtractAmounts,
} from '../common/money/money';
import {
  GatewayError,
  OperationResult,
  VerificationFailedError,
  succeed,
  toFailure,
} from '../common/result/operation-result';
import { errorMessage, isUniqueViolation } from '../common/utils/errors';
import { ConfigService } from '../config/config.service';
import { Payment, PaymentMode, PaymentStatus } from '../finance/entities/payment.entity';
import { StudentFeeStatus } from '../finance/entities/student-fee-status.entity';
import { LEDGER_STORE, LedgerStore } from '../finance/ledger/ledger-store';
import { FeeNotificationService } from '../finance/services/fee-notification.service';
import { LedgerPostingService, PostedEntry } from '../finance/services/ledger-posting.service';
import { assertCanActForStudent } from '../finance/services/student-access';
import { SystemLoggingService } from '../logs/system-logging.service';
import { GatewayName, GatewayOrder, GatewayOrderStatus } from './entities/gateway-order.entity';
import { GATEWAY_REGISTRY, GatewayRegistry } from './gateways/gateway-registry';
import { ConfirmedPayment, PaymentCallback } from './gateways/payment-gateway.interface';

export interface CreateOrderInput {
  studentId: string;
  feeStructureId?: string | null;
  amount?: string | null;
}

export interface CreatedOrder {
  orderId: string;
  gateway: GatewayName;
  amount: Amount;
  currency: string;
  receipt: string;
  studentId: string;
  feeStructureId: string;
  checkout: Record<string, string>;
}

export interface SettledPayment {
  payment: Payment;
  feeStatus: StudentFeeStatus | null;
}

export interface RefundInput {
  amount?: string | null;
  reason?: string | null;
}

export const mockOrderId = (receipt: string): string =>
  `order_mock_${createHash('sha256').update(receipt).digest('hex').slice(0, 16)}`;

/**
 * Turns gateway activity into ledger entries. Gateway calls always happen
 * outside the ledger transaction; the ledger only moves after a confirmation.
 */
const settlesOrder = (payment: Payment, order: GatewayOrder, transactionId: string): boolean =>
  payment.transactionId === transactionId &&
  payment.studentId === order.studentId &&
  payment.feeStructureId === order.feeStructureId;

@Injectable()
export class ReconciliationService {
  private readonly logger = new Logger(ReconciliationService.name);
  private readonly currency: string;

  constructor(
    @Inject(LEDGER_STORE) private readonly store: LedgerStore,
    @Inject(GATEWAY_REGISTRY) private readonly registry: GatewayRegistry,
    @Inject(CLOCK) private readonly clock: Clock,
    private readonly posting: LedgerPostingService,
    private readonly feeNotifications: FeeNotificationService,
    private readonly systemLoggingService: SystemLoggingService,
    configService: ConfigService,
  ) {
    this.currency = configService.getOptional('PAYMENT_CURRENCY', DEFAULT_CURRENCY);
  }

  async createOrder(actor: ActorContext, input: CreateOrderInput): Promise<OperationResult<CreatedOrder>> {
    try {
      const { structureId, amount } = await this.store.read(async (reader) => {
        const student = await reader.findStudent(actor.schoolId, input.studentId);
        if (!student) {
          throw new NotFoundException('Student not found');
        }
        assertCanActForStudent(actor, student);

        const structure = input.feeStructureId
          ? await reader.findFeeStructure(actor.schoolId, input.feeStructureId)
          : await reader.findActiveFeeStructure(actor.schoolId, student.classId);
        if (!structure) {
          throw new NotFoundException(
            input.feeStructureId ? 'Fee structure not found' : "No active fee structure for the student's class",
          );
        }
        if (!structure.isActive) {
          throw new BadRequestException('Fee structure is not active');
        }
        if (structure.classId !== student.classId) {
          throw new BadRequestException("Fee structure does not apply to the student's class");
        }

        const status = await reader.findFeeStatus(student.id, structure.id);
        const remaining = clampToZero(subtractAmounts(structure.totalFee, status ? status.paidAmount : '0'));
        const requested = input.amount ? normalizeAmount(input.amount) : remaining;
        if (!isPositiveAmount(requested)) {
          throw new BadRequestException(
            input.amount ? 'Amount must be greater than zero' : 'No outstanding balance for this fee structure',
          );
        }
        if (compareAmounts(requested, remaining) > 0) {
          throw new BadRequestException(`Amount exceeds the outstanding balance of ${remaining}`);
        }
        return { structureId: structure.id, amount: requested };
      });

      const receipt = `FEE-${format(this.clock.now(), 'yyyyMMddHHmmss')}-${randomUUID().slice(0, 8)}`;
      let gatewayName: GatewayName = 'mock';
      let gatewayOrderId = mockOrderId(receipt);
      let checkout: Record<string, string> = {};

      const gateway = this.registry.active();
      if (gateway) {
        try {
          const order = await gateway.createOrder(amount, this.currency, receipt);
          gatewayName = gateway.name;
          gatewayOrderId = order.orderId;
          checkout = order.checkout;
        } catch (error) {
          if (!(error instanceof GatewayError)) throw error;
          this.logger.warn(`${gateway.name} order for ${receipt} failed, issuing mock order: ${error.message}`);
        }
      } else {
        this.logger.warn(`Payment gateway ${this.registry.activeGatewayName} is not configured, issuing mock order`);
      }

      const order = await this.store.transaction((tx) =>
        tx.insertOrder({
          schoolId: actor.schoolId,
          studentId: input.studentId,
          feeStructureId: structureId,
          gateway: gatewayName,
          gatewayOrderId,
          receipt,
          amount,
          currency: this.currency,
          createdById: actor.userId,
        }),
      );

      this.logger.log(`Created ${order.gateway} order ${order.gatewayOrderId} of ${order.amount} for student ${order.studentId}`);
      return succeed(
        {
          orderId: order.gatewayOrderId,
          gateway: order.gateway,
          amount: order.amount,
          currency: order.currency,
          receipt: order.receipt,
          studentId: order.studentId,
          feeStructureId: order.feeStructureId,
          checkout,
        },
        gatewayName === 'mock' ? 'Mock order created; it cannot be settled online' : 'Order created',
      );
    } catch (error) {
      const failure = toFailure(error);
      this.logger.warn(`Order for student ${input.studentId} not created: ${failure.message}`);
      return failure;
    }
  }

  async processFeePayment(actor: ActorContext, callback: PaymentCallback): Promise<OperationResult<SettledPayment>> {
    let entry: PostedEntry;
    let order: GatewayOrder | undefined;
    try {
      order = await this.loadOrder(actor, callback.orderId);

      const existing = await this.findSettled(actor.schoolId, callback.paymentId);
      if (existing || order.status === GatewayOrderStatus.PAID) {
        return await this.duplicate(actor, order, callback, existing);
      }

      const paidOrder = order;
      const confirmedId = await this.confirm(paidOrder, callback);
      entry = await this.store.transaction(async (tx) => {
        const structure = await tx.findFeeStructure(actor.schoolId, paidOrder.feeStructureId);
        if (!structure) {
          throw new NotFoundException('Fee structure not found');
        }
        const posted = await this.posting.postPayment(tx, {
          schoolId: actor.schoolId,
          studentId: paidOrder.studentId,
          structure,
          amount: paidOrder.amount,
          paymentDate: toDateString(this.clock.now()),
          paymentMode: PaymentMode.ONLINE,
          transactionId: confirmedId,
          remarks: `Online payment via ${paidOrder.gateway} (order ${paidOrder.gatewayOrderId})`,
          actorId: actor.userId,
        });
        if (!(await tx.markOrderPaid(paidOrder.id, confirmedId))) {
          throw new ConflictException(`Order ${paidOrder.gatewayOrderId} is already settled`);
        }
        return posted;
      });
    } catch (error) {
      if (isUniqueViolation(error)) {
        const existing = await this.findSettled(actor.schoolId, callback.paymentId);
        if (existing && order && settlesOrder(existing.payment, order, callback.paymentId)) {
          this.logger.warn(`Concurrent callback for ${callback.paymentId} resolved to ${existing.payment.receiptNumber}`);
          await this.systemLoggingService.logDuplicateCallback(actor, callback.orderId, callback.paymentId);
          return succeed(existing, 'Payment already processed', 'duplicate');
        }
      }
      const failure = toFailure(error);
      this.logger.warn(`Callback for order ${callback.orderId} not settled: ${failure.message}`);
      return failure;
    }

    this.logger.log(
      `Settled order ${order.gatewayOrderId} as ${entry.payment.receiptNumber} (${entry.payment.transactionId})`,
    );
    await this.systemLoggingService.logOnlinePaymentSettled(actor, entry.payment, order.gatewayOrderId);
    await this.feeNotifications.notifyPaymentReceived(actor, entry.payment, entry.feeStatus);

    return succeed(entry, `Payment verified and recorded. Receipt: ${entry.payment.receiptNumber}`);
  }

  async refundPayment(
    actor: ActorContext,
    paymentId: string,
    input: RefundInput = {},
  ): Promise<OperationResult<PostedEntry>> {
    let before: Payment;
    let entry: PostedEntry;
    try {
      const payment = await this.store.read((reader) => reader.findPayment(actor.schoolId, paymentId));
      if (!payment) {
        throw new NotFoundException('Payment not found');
      }
      if (payment.status !== PaymentStatus.COMPLETED) {
        throw new ConflictException(`Only completed payments can be refunded (payment is ${payment.status})`);
      }
      const amount = input.amount ? normalizeAmount(input.amount) : payment.amount;
      if (!isPositiveAmount(amount)) {
        throw new BadRequestException('Refund amount must be greater than zero');
      }
      if (compareAmounts(amount, payment.amount) > 0) {
        throw new BadRequestException(`Refund amount cannot exceed the payment amount of ${payment.amount}`);
      }

      let refundReference: string | null = null;
      if (payment.paymentMode === PaymentMode.ONLINE) {
        const transactionId = payment.transactionId ?? '';
        const gateway = this.registry.forTransaction(transactionId);
        if (!gateway || !gateway.isConfigured()) {
          throw new GatewayError('unknown', `No configured gateway can refund transaction ${transactionId || '(none)'}`);
        }
        const refund = await gateway.refund(transactionId, amount);
        refundReference = refund.refundId;
        this.logger.log(`${gateway.name} refund ${refund.refundId} (${refund.status}) for ${payment.receiptNumber}`);
      }

      before = payment;
      entry = await this.store.transaction((tx) =>
        this.posting.postRefund(tx, {
          payment,
          amount,
          refundReference,
          reason: input.reason ?? null,
          actorId: actor.userId,
        }),
      );
    } catch (error) {
      const failure = toFailure(error);
      this.logger.warn(`Refund of payment ${paymentId} failed: ${failure.message}`);
      return failure;
    }

    this.logger.log(`Refunded ${entry.payment.refundedAmount} of ${entry.payment.receiptNumber}`);
    await this.systemLoggingService.logPaymentRefunded(actor, before, entry.payment);
    await this.feeNotifications.notifyRefund(actor, entry.payment, entry.feeStatus);

    return succeed(entry, `Refund of ${entry.payment.refundedAmount} recorded for ${entry.payment.receiptNumber}`);
  }

  private async loadOrder(actor: ActorContext, gatewayOrderId: string): Promise<GatewayOrder> {
    return this.store.read(async (reader) => {
      const order = await reader.findOrder(actor.schoolId, gatewayOrderId);
      if (!order) {
        throw new NotFoundException('Payment order not found');
      }
      const student = await reader.findStudent(actor.schoolId, order.studentId);
      if (!student) {
        throw new NotFoundException('Student not found');
      }
      assertCanActForStudent(actor, student);
      return order;
    });
  }

  /** Returns the confirmed gateway payment id. */
  private async confirm(order: GatewayOrder, callback: PaymentCallback): Promise<string> {
    if (order.gateway === 'mock') {
      throw new VerificationFailedError('Order was issued without a payment gateway and cannot be confirmed');
    }
    const gateway = this.registry.get(order.gateway);
    if (!gateway || !gateway.isConfigured()) {
      throw new GatewayError(order.gateway, `Payment gateway ${order.gateway} is not configured`);
    }

    let confirmed: ConfirmedPayment;
    try {
      confirmed = await gateway.confirm({ ...callback, orderId: order.gatewayOrderId });
    } catch (error) {
      if (error instanceof VerificationFailedError || error instanceof GatewayError) throw error;
      throw new GatewayError(order.gateway, errorMessage(error));
    }
    if (compareAmounts(confirmed.amount, order.amount) !== 0) {
      throw new VerificationFailedError(
        `Paid amount ${normalizeAmount(confirmed.amount)} does not match the order amount ${order.amount}`,
      );
    }
    return confirmed.paymentId;
  }

  private async findSettled(schoolId: string, transactionId: string): Promise<SettledPayment | null> {
    return this.store.read(async (reader) => {
      const payment = await reader.findPaymentByTransactionId(schoolId, transactionId);
      if (!payment) return null;
      const feeStatus = await reader.findFeeStatus(payment.studentId, payment.feeStructureId);
      return { payment, feeStatus };
    });
  }

  /** A repeated callback is answered only for the payment that settled this very order. */
  private async duplicate(
    actor: ActorContext,
    order: GatewayOrder,
    callback: PaymentCallback,
    settled: SettledPayment | null,
  ): Promise<OperationResult<SettledPayment>> {
    const gateway = this.registry.get(order.gateway);
    if (!gateway || !gateway.authenticateCallback({ ...callback, orderId: order.gatewayOrderId })) {
      throw new VerificationFailedError('Payment signature verification failed');
    }
    if (
      !settled ||
      order.status !== GatewayOrderStatus.PAID ||
      order.paymentId !== callback.paymentId ||
      !settlesOrder(settled.payment, order, callback.paymentId)
    ) {
      throw new ConflictException(`Payment ${callback.paymentId} does not settle order ${order.gatewayOrderId}`);
    }
    this.logger.log(`Duplicate callback for order ${order.gatewayOrderId}; already ${settled.payment.receiptNumber}`);
    await this.systemLoggingService.logDuplicateCallback(
      actor,
      order.gatewayOrderId,
      settled.payment.transactionId ?? '',
    );
    return succeed(settled, 'Payment already processed', 'duplicate');
  }
}
