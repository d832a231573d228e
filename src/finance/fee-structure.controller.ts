import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Post,
  Put,
  Query,
  UseGuards,
} from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiQuery, ApiResponse, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { RolesGuard } from '../auth/guards/roles.guard';
import { TenantGuard } from '../common/guards/tenant.guard';
import { Roles } from '../common/decorators/roles.decorator';
import { ActorContext, SchoolContext } from '../common/decorators/school.decorator';
import { Role } from '../user/enums/role.enum';
import { CreateFeeStructureDto, UpdateFeeStructureDto } from './dtos/fees-structure.dto';
import { FeeStructureService } from './services/fee-structure.service';

@ApiTags('Fee Structures')
@ApiBearerAuth()
@Controller('fees/structures')
@UseGuards(JwtAuthGuard, TenantGuard, RolesGuard)
@Roles(Role.ADMIN, Role.FINANCE)
export class FeeStructureController {
  constructor(private readonly feeStructureService: FeeStructureService) {}

  @Get()
  @ApiQuery({ name: 'classId', required: false })
  @ApiQuery({ name: 'academicYear', required: false })
  @ApiQuery({ name: 'active', required: false })
  async list(
    @SchoolContext() actor: ActorContext,
    @Query('classId') classId?: string,
    @Query('academicYear') academicYear?: string,
    @Query('active') active?: string,
  ) {
    const structures = await this.feeStructureService.listFeeStructures(actor, {
      classId,
      academicYear,
      activeOnly: active === 'true',
    });
    return { success: true, structures };
  }

  @Post()
  @ApiOperation({ summary: 'Create a fee structure; an active one replaces the class\'s current structure' })
  @ApiResponse({ status: 409, description: 'A structure for the academic year already exists' })
  async create(@SchoolContext() actor: ActorContext, @Body() dto: CreateFeeStructureDto) {
    return { success: true, ...(await this.feeStructureService.createFeeStructure(actor, dto)) };
  }

  @Put(':id')
  @ApiOperation({ summary: 'Update amounts or schedule; student balances are re-derived' })
  async update(
    @SchoolContext() actor: ActorContext,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateFeeStructureDto,
  ) {
    return { success: true, ...(await this.feeStructureService.updateFeeStructure(actor, id, dto)) };
  }

  @Post(':id/activate')
  @HttpCode(HttpStatus.OK)
  async activate(@SchoolContext() actor: ActorContext, @Param('id', ParseUUIDPipe) id: string) {
    return { success: true, ...(await this.feeStructureService.activateFeeStructure(actor, id)) };
  }

  @Delete(':id')
  @ApiResponse({ status: 409, description: 'The structure has recorded payments' })
  async remove(@SchoolContext() actor: ActorContext, @Param('id', ParseUUIDPipe) id: string) {
    await this.feeStructureService.deleteFeeStructure(actor, id);
    return { success: true, message: 'Fee structure deleted' };
  }
}
