import { Controller, Get, Patch, Param, Query, UseGuards, ParseUUIDPipe } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiQuery, ApiTags } from '@nestjs/swagger';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { RolesGuard } from '../auth/guards/roles.guard';
import { TenantGuard } from '../common/guards/tenant.guard';
import { Roles } from '../common/decorators/roles.decorator';
import { ActorContext, SchoolContext } from '../common/decorators/school.decorator';
import { Role } from '../user/enums/role.enum';
import { NotificationService } from './notification.service';

@ApiTags('Notifications')
@ApiBearerAuth()
@Controller('notifications')
@UseGuards(JwtAuthGuard, TenantGuard, RolesGuard)
@Roles(Role.ADMIN, Role.FINANCE)
export class NotificationController {
  constructor(private readonly notificationService: NotificationService) {}

  @Get()
  @ApiOperation({ summary: 'School notification feed' })
  @ApiQuery({ name: 'page', required: false })
  @ApiQuery({ name: 'limit', required: false })
  @ApiQuery({ name: 'unread', required: false })
  async getAllNotifications(
    @SchoolContext() actor: ActorContext,
    @Query('page') page: string = '1',
    @Query('limit') limit: string = '10',
    @Query('unread') unread?: string,
  ) {
    const pageNum = parseInt(page, 10) || 1;
    const limitNum = Math.min(parseInt(limit, 10) || 10, 100);

    const { notifications, total } = await this.notificationService.findAll(
      actor.schoolId,
      pageNum,
      limitNum,
      unread === 'true',
    );

    return {
      success: true,
      notifications,
      pagination: {
        currentPage: pageNum,
        totalPages: Math.ceil(total / limitNum),
        totalItems: total,
        itemsPerPage: limitNum,
      },
    };
  }

  @Get('unread-count')
  async getUnreadCount(@SchoolContext() actor: ActorContext) {
    return { success: true, unread: await this.notificationService.getUnreadCount(actor.schoolId) };
  }

  @Patch(':id/read')
  async markAsRead(@SchoolContext() actor: ActorContext, @Param('id', ParseUUIDPipe) id: string) {
    return { success: true, notification: await this.notificationService.markAsRead(actor.schoolId, id) };
  }
}
