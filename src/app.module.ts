import { Module } from '@nestjs/common';
import { ConfigModule } from './config/config.module';
import { DatabaseModule } from './database/database.module';
import { AuthModule } from './auth/auth.module';
import { LogsModule } from './logs/logs.module';
import { NotificationModule } from './notifications/notification.module';
import { FinanceModule } from './finance/finance.module';
import { PaymentGatewayModule } from './payment-gateway/payment-gateway.module';

@Module({
  imports: [
    ConfigModule,
    DatabaseModule,
    AuthModule,
    LogsModule,
    NotificationModule,
    FinanceModule,
    PaymentGatewayModule,
  ],
})
export class AppModule {}
