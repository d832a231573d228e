import { IsDateString, IsEnum, IsOptional, IsString, IsUUID, MaxLength, ValidateIf, IsNotEmpty } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsAmount } from '../../common/validation/amount';
import { PaymentMode } from '../entities/payment.entity';

export class RecordPaymentDto {
  @ApiProperty()
  @IsUUID()
  studentId!: string;

  @ApiProperty()
  @IsUUID()
  feeStructureId!: string;

  @ApiProperty({ example: '4000.00', type: String })
  @IsAmount()
  amount!: string;

  @ApiProperty({ example: '2024-05-10' })
  @IsDateString({ strict: true })
  paymentDate!: string;

  @ApiProperty({ enum: PaymentMode })
  @IsEnum(PaymentMode)
  paymentMode!: PaymentMode;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @MaxLength(100)
  transactionId?: string;

  @ApiPropertyOptional({ description: 'Required for cheque payments' })
  @ValidateIf((dto: RecordPaymentDto) => dto.paymentMode === PaymentMode.CHEQUE || dto.chequeNo !== undefined)
  @IsString()
  @IsNotEmpty()
  @MaxLength(50)
  chequeNo?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @MaxLength(100)
  bankName?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  remarks?: string;
}
