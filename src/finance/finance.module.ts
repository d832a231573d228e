import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AuthModule } from '../auth/auth.module';
import { LogsModule } from '../logs/logs.module';
import { NotificationModule } from '../notifications/notification.module';
import { CLOCK, systemClock } from '../common/clock/clock';
import { Student } from '../student/entities/student.entity';
import { School } from '../school/entities/school.entity';
import { Class } from '../classes/entity/class.entity';
import { GatewayOrder } from '../payment-gateway/entities/gateway-order.entity';
import { FeeStructure } from './entities/fee-structure.entity';
import { Payment } from './entities/payment.entity';
import { PaymentHistory } from './entities/payment-history.entity';
import { StudentFeeStatus } from './entities/student-fee-status.entity';
import { ReceiptSequence } from './entities/receipt-sequence.entity';
import { LEDGER_STORE } from './ledger/ledger-store';
import { TypeOrmLedgerStore } from './ledger/typeorm-ledger-store';
import { FinanceController } from './finance.controller';
import { FeeStructureController } from './fee-structure.controller';
import { ReceiptController } from './receipt.controller';
import { FinanceService } from './finance.service';
import { LedgerPostingService } from './services/ledger-posting.service';
import { PaymentRecorderService } from './services/payment-recorder.service';
import { FeeNotificationService } from './services/fee-notification.service';
import { FeeStructureService } from './services/fee-structure.service';
import { FeeAnalyticsService } from './services/fee-analytics.service';
import { FeeExportService } from './services/fee-export.service';
import { ReceiptService } from './services/receipt.service';

@Module({
  imports: [
    TypeOrmModule.forFeature([
      FeeStructure,
      Payment,
      PaymentHistory,
      StudentFeeStatus,
      ReceiptSequence,
      GatewayOrder,
      Student,
      School,
      Class,
    ]),
    AuthModule,
    LogsModule,
    NotificationModule,
  ],
  controllers: [FinanceController, FeeStructureController, ReceiptController],
  providers: [
    { provide: CLOCK, useValue: systemClock },
    { provide: LEDGER_STORE, useClass: TypeOrmLedgerStore },
    FinanceService,
    LedgerPostingService,
    PaymentRecorderService,
    FeeNotificationService,
    FeeStructureService,
    FeeAnalyticsService,
    FeeExportService,
    ReceiptService,
  ],
  exports: [CLOCK, LEDGER_STORE, LedgerPostingService, FeeNotificationService, FinanceService],
})
export class FinanceModule {}
