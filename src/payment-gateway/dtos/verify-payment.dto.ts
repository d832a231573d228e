import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class VerifyPaymentDto {
  @ApiProperty({ example: 'order_Nf3kL1' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  orderId!: string;

  @ApiProperty({ example: 'pay_Nf3kQ9' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  paymentId!: string;

  @ApiPropertyOptional({ description: 'Checkout signature (Razorpay)' })
  @IsOptional()
  @IsString()
  @MaxLength(256)
  signature?: string;
}
