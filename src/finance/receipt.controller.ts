import { Controller, Get, Param, ParseUUIDPipe, Res, UseGuards } from '@nestjs/common';
import { Response } from 'express';
import { ApiBearerAuth, ApiOperation, ApiProduces, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { RolesGuard } from '../auth/guards/roles.guard';
import { TenantGuard } from '../common/guards/tenant.guard';
import { Roles } from '../common/decorators/roles.decorator';
import { ActorContext, SchoolContext } from '../common/decorators/school.decorator';
import { Role } from '../user/enums/role.enum';
import { ReceiptService } from './services/receipt.service';

@ApiTags('Fees')
@ApiBearerAuth()
@Controller('fees/receipt')
@UseGuards(JwtAuthGuard, TenantGuard, RolesGuard)
@Roles(Role.FINANCE, Role.ADMIN, Role.STUDENT, Role.PARENT)
export class ReceiptController {
  constructor(private readonly receiptService: ReceiptService) {}

  @Get(':paymentId')
  @ApiProduces('application/pdf')
  @ApiOperation({ summary: 'PDF receipt of a payment' })
  async getReceipt(
    @SchoolContext() actor: ActorContext,
    @Param('paymentId', ParseUUIDPipe) paymentId: string,
    @Res() res: Response,
  ) {
    const receipt = await this.receiptService.renderReceipt(actor, paymentId);
    res.setHeader('Content-Type', 'application/pdf');
    res.setHeader('Content-Disposition', `inline; filename="${receipt.filename}"`);
    res.setHeader('Content-Length', receipt.content.length);
    res.end(receipt.content);
  }
}
