import { School } from '../school/entities/school.entity';
import { User } from '../user/entities/user.entity';
import { Class } from '../classes/entity/class.entity';
import { Student } from '../student/entities/student.entity';
import { FeeStructure } from '../finance/entities/fee-structure.entity';
import { Payment } from '../finance/entities/payment.entity';
import { PaymentHistory } from '../finance/entities/payment-history.entity';
import { StudentFeeStatus } from '../finance/entities/student-fee-status.entity';
import { ReceiptSequence } from '../finance/entities/receipt-sequence.entity';
import { GatewayOrder } from '../payment-gateway/entities/gateway-order.entity';
import { Notification } from '../notifications/entities/notification.entity';
import { Log } from '../logs/logs.entity';

export const ENTITIES = [
  School,
  User,
  Class,
  Student,
  FeeStructure,
  Payment,
  PaymentHistory,
  StudentFeeStatus,
  ReceiptSequence,
  GatewayOrder,
  Notification,
  Log,
];
