import { Module } from '@nestjs/common';
import { ConfigService } from '../config/config.service';
import { AuthModule } from '../auth/auth.module';
import { FinanceModule } from '../finance/finance.module';
import { LogsModule } from '../logs/logs.module';
import { GATEWAY_REGISTRY } from './gateways/gateway-registry';
import { createGatewayRegistry } from './gateways/gateway.factory';
import { PaymentController } from './payment.controller';
import { ReconciliationService } from './reconciliation.service';

@Module({
  imports: [AuthModule, FinanceModule, LogsModule],
  controllers: [PaymentController],
  providers: [
    ReconciliationService,
    {
      provide: GATEWAY_REGISTRY,
      useFactory: createGatewayRegistry,
      inject: [ConfigService],
    },
  ],
  exports: [ReconciliationService],
})
export class PaymentGatewayModule {}
