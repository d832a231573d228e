import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Post,
  Query,
  Res,
  UseGuards,
} from '@nestjs/common';
import { Response } from 'express';
import { ApiBearerAuth, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { format } from 'date-fns';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { RolesGuard } from '../auth/guards/roles.guard';
import { TenantGuard } from '../common/guards/tenant.guard';
import { Roles } from '../common/decorators/roles.decorator';
import { ActorContext, SchoolContext } from '../common/decorators/school.decorator';
import { unwrapResult } from '../common/result/operation-result';
import { Role } from '../user/enums/role.enum';
import { FinanceService } from './finance.service';
import { RecordPaymentDto } from './dtos/record-payment.dto';
import { DateRangeQueryDto, PaymentQueryDto } from './dtos/fee-query.dto';
import { SendRemindersDto } from './dtos/send-reminders.dto';
import { PaymentRecorderService } from './services/payment-recorder.service';
import { FeeAnalyticsService } from './services/fee-analytics.service';
import { FeeNotificationService } from './services/fee-notification.service';
import { EXPORT_KINDS, FeeExportService, isExportKind } from './services/fee-export.service';

@ApiTags('Fees')
@ApiBearerAuth()
@Controller('fees')
@UseGuards(JwtAuthGuard, TenantGuard, RolesGuard)
export class FinanceController {
  constructor(
    private readonly financeService: FinanceService,
    private readonly paymentRecorderService: PaymentRecorderService,
    private readonly feeAnalyticsService: FeeAnalyticsService,
    private readonly feeNotificationService: FeeNotificationService,
    private readonly feeExportService: FeeExportService,
  ) {}

  @Post('record_payment')
  @Roles(Role.ADMIN, Role.FINANCE)
  @ApiOperation({ summary: 'Record a cash, cheque or bank transfer payment' })
  @ApiResponse({ status: 201, description: 'Payment recorded and balance updated' })
  @ApiResponse({ status: 400, description: 'Validation failed; nothing was written' })
  async recordPayment(@SchoolContext() actor: ActorContext, @Body() dto: RecordPaymentDto) {
    return unwrapResult(await this.paymentRecorderService.recordPayment(actor, dto));
  }

  @Get('payments')
  @Roles(Role.ADMIN, Role.FINANCE)
  @ApiOperation({ summary: 'List payments of the school' })
  async listPayments(@SchoolContext() actor: ActorContext, @Query() query: PaymentQueryDto) {
    return { success: true, ...(await this.financeService.listPayments(actor, query)) };
  }

  @Get('payments/:id')
  @Roles(Role.ADMIN, Role.FINANCE, Role.STUDENT, Role.PARENT)
  async getPayment(@SchoolContext() actor: ActorContext, @Param('id', ParseUUIDPipe) id: string) {
    return { success: true, payment: await this.financeService.getPayment(actor, id) };
  }

  @Get('student/:studentId/status')
  @Roles(Role.ADMIN, Role.FINANCE, Role.TEACHER, Role.STUDENT, Role.PARENT)
  @ApiOperation({ summary: 'Fee balances and recent payments of a student' })
  async getStudentFeeStatus(
    @SchoolContext() actor: ActorContext,
    @Param('studentId', ParseUUIDPipe) studentId: string,
  ) {
    return { success: true, ...(await this.financeService.getStudentFeeStatus(actor, studentId)) };
  }

  @Get('analytics')
  @Roles(Role.ADMIN, Role.FINANCE)
  @ApiOperation({ summary: 'Collection analytics for a date range' })
  async getAnalytics(@SchoolContext() actor: ActorContext, @Query() range: DateRangeQueryDto) {
    return { success: true, analytics: await this.feeAnalyticsService.getFeeAnalytics(actor, range) };
  }

  @Get('defaulters')
  @Roles(Role.ADMIN, Role.FINANCE)
  @ApiOperation({ summary: 'Students with overdue balances' })
  async getDefaulters(@SchoolContext() actor: ActorContext) {
    const defaulters = await this.feeAnalyticsService.getDefaulters(actor);
    return { success: true, total: defaulters.length, defaulters };
  }

  @Post('send_reminders')
  @HttpCode(HttpStatus.OK)
  @Roles(Role.ADMIN, Role.FINANCE)
  @ApiOperation({ summary: 'Send overdue reminders to guardians' })
  async sendReminders(@SchoolContext() actor: ActorContext, @Body() dto: SendRemindersDto) {
    return unwrapResult(await this.feeNotificationService.sendFeeReminders(actor, dto));
  }

  @Get('export/:kind')
  @Roles(Role.ADMIN, Role.FINANCE)
  @ApiOperation({ summary: `CSV export (${EXPORT_KINDS.join(', ')})` })
  async export(
    @SchoolContext() actor: ActorContext,
    @Param('kind') kind: string,
    @Query() range: DateRangeQueryDto,
    @Res({ passthrough: true }) res: Response,
  ) {
    if (!isExportKind(kind)) {
      throw new BadRequestException(`Unknown export "${kind}", expected one of ${EXPORT_KINDS.join(', ')}`);
    }
    const csv = await this.feeExportService.export(actor, kind, range);
    res.setHeader('Content-Type', 'text/csv; charset=utf-8');
    res.setHeader('Content-Disposition', `attachment; filename="${kind}-${format(new Date(), 'yyyyMMdd')}.csv"`);
    return csv;
  }
}
