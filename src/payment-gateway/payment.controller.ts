import { Body, Controller, HttpCode, HttpStatus, Param, ParseUUIDPipe, Post, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { RolesGuard } from '../auth/guards/roles.guard';
import { TenantGuard } from '../common/guards/tenant.guard';
import { Roles } from '../common/decorators/roles.decorator';
import { ActorContext, SchoolContext } from '../common/decorators/school.decorator';
import { unwrapResult } from '../common/result/operation-result';
import { Role } from '../user/enums/role.enum';
import { CreateOrderDto } from './dtos/create-order.dto';
import { RefundPaymentDto } from './dtos/refund-payment.dto';
import { VerifyPaymentDto } from './dtos/verify-payment.dto';
import { ReconciliationService } from './reconciliation.service';

@ApiTags('Payments')
@ApiBearerAuth()
@Controller('payment')
@UseGuards(JwtAuthGuard, TenantGuard, RolesGuard)
export class PaymentController {
  constructor(private readonly reconciliationService: ReconciliationService) {}

  @Post('create-order')
  @Roles(Role.ADMIN, Role.FINANCE, Role.STUDENT, Role.PARENT)
  @ApiOperation({ summary: 'Open a gateway order for a student fee' })
  async createOrder(@SchoolContext() actor: ActorContext, @Body() dto: CreateOrderDto) {
    return unwrapResult(await this.reconciliationService.createOrder(actor, dto));
  }

  @Post('verify')
  @HttpCode(HttpStatus.OK)
  @Roles(Role.ADMIN, Role.FINANCE, Role.STUDENT, Role.PARENT)
  @ApiOperation({ summary: 'Verify a checkout callback and record the payment' })
  @ApiResponse({ status: 200, description: 'Recorded, or already recorded (status "duplicate")' })
  @ApiResponse({ status: 402, description: 'The gateway did not confirm the payment' })
  async verify(@SchoolContext() actor: ActorContext, @Body() dto: VerifyPaymentDto) {
    return unwrapResult(await this.reconciliationService.processFeePayment(actor, dto));
  }

  @Post(':paymentId/refund')
  @HttpCode(HttpStatus.OK)
  @Roles(Role.ADMIN, Role.FINANCE)
  @ApiOperation({ summary: 'Refund a completed payment' })
  async refund(
    @SchoolContext() actor: ActorContext,
    @Param('paymentId', ParseUUIDPipe) paymentId: string,
    @Body() dto: RefundPaymentDto,
  ) {
    return unwrapResult(await this.reconciliationService.refundPayment(actor, paymentId, dto));
  }
}
