import { IsOptional, IsUUID } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsAmount } from '../../common/validation/amount';

export class CreateOrderDto {
  @ApiProperty()
  @IsUUID()
  studentId!: string;

  @ApiPropertyOptional({ description: "Defaults to the student's active fee structure" })
  @IsOptional()
  @IsUUID()
  feeStructureId?: string;

  @ApiPropertyOptional({ type: String, description: 'Defaults to the remaining balance' })
  @IsOptional()
  @IsAmount()
  amount?: string;
}
