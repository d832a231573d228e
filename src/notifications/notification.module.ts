import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Notification } from './entities/notification.entity';
import { NotificationService } from './notification.service';
import { NotificationController } from './notification.controller';
import { ConfigService } from '../config/config.service';
import { AuthModule } from '../auth/auth.module';
import { NOTIFICATION_SENDER } from './delivery/notification-sender';
import { TemplatedNotificationSender } from './delivery/templated-notification.sender';
import { EmailTransport } from './delivery/email.transport';
import { SmsTransport } from './delivery/sms.transport';
import { WhatsAppTransport } from './delivery/whatsapp.transport';

@Module({
  imports: [TypeOrmModule.forFeature([Notification]), AuthModule],
  controllers: [NotificationController],
  providers: [
    NotificationService,
    {
      provide: NOTIFICATION_SENDER,
      useFactory: (config: ConfigService) =>
        new TemplatedNotificationSender([
          EmailTransport.fromConfig(config),
          SmsTransport.fromConfig(config),
          WhatsAppTransport.fromConfig(config),
        ]),
      inject: [ConfigService],
    },
  ],
  exports: [NotificationService, NOTIFICATION_SENDER],
})
export class NotificationModule {}
