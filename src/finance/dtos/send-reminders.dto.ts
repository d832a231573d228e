import { ArrayUnique, IsArray, IsIn, IsOptional, IsUUID } from 'class-validator';
import { ApiPropertyOptional } from '@nestjs/swagger';
import { NOTIFICATION_CHANNELS, NotificationChannel } from '../../notifications/delivery/notification-sender';

export class SendRemindersDto {
  @ApiPropertyOptional({ type: [String], description: 'Limit the run to these students' })
  @IsOptional()
  @IsArray()
  @IsUUID('all', { each: true })
  studentIds?: string[];

  @ApiPropertyOptional({ enum: NOTIFICATION_CHANNELS, isArray: true })
  @IsOptional()
  @IsArray()
  @ArrayUnique()
  @IsIn(NOTIFICATION_CHANNELS, { each: true })
  channels?: NotificationChannel[];
}
