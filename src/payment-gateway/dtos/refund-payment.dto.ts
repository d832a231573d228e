import { IsOptional, IsString, MaxLength } from 'class-validator';
import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsAmount } from '../../common/validation/amount';

export class RefundPaymentDto {
  @ApiPropertyOptional({ type: String, description: 'Defaults to the full payment amount' })
  @IsOptional()
  @IsAmount()
  amount?: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  @MaxLength(500)
  reason?: string;
}
