import {
  ArrayMaxSize,
  IsArray,
  IsBoolean,
  IsDateString,
  IsInt,
  IsOptional,
  IsUUID,
  Matches,
  Max,
  Min,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsAmount } from '../../common/validation/amount';

export class FeeComponentsDto {
  @ApiPropertyOptional({ type: String, example: '8000.00' })
  @IsOptional()
  @IsAmount()
  tuitionFee?: string;

  @ApiPropertyOptional({ type: String })
  @IsOptional()
  @IsAmount()
  admissionFee?: string;

  @ApiPropertyOptional({ type: String })
  @IsOptional()
  @IsAmount()
  developmentFee?: string;

  @ApiPropertyOptional({ type: String })
  @IsOptional()
  @IsAmount()
  transportFee?: string;

  @ApiPropertyOptional({ type: String })
  @IsOptional()
  @IsAmount()
  libraryFee?: string;

  @ApiPropertyOptional({ type: String })
  @IsOptional()
  @IsAmount()
  labFee?: string;

  @ApiPropertyOptional({ type: String })
  @IsOptional()
  @IsAmount()
  sportsFee?: string;

  @ApiPropertyOptional({ type: String })
  @IsOptional()
  @IsAmount()
  otherFee?: string;
}

export class CreateFeeStructureDto extends FeeComponentsDto {
  @ApiProperty()
  @IsUUID()
  classId!: string;

  @ApiProperty({ example: '2024-25' })
  @Matches(/^\d{4}(-\d{2,4})?$/, { message: 'academicYear must look like 2024 or 2024-25' })
  academicYear!: string;

  @ApiPropertyOptional({ type: String, description: 'Used as "other" when no components are given' })
  @IsOptional()
  @IsAmount()
  totalFee?: string;

  @ApiPropertyOptional({ default: 1 })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(12)
  installments?: number;

  @ApiPropertyOptional({ type: [String], example: ['2024-04-30', '2024-10-31'] })
  @IsOptional()
  @IsArray()
  @ArrayMaxSize(12)
  @IsDateString({ strict: true }, { each: true })
  dueDates?: string[];

  @ApiPropertyOptional({ default: true })
  @IsOptional()
  @IsBoolean()
  isActive?: boolean;
}

export class UpdateFeeStructureDto extends FeeComponentsDto {
  @ApiPropertyOptional()
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(12)
  installments?: number;

  @ApiPropertyOptional({ type: [String] })
  @IsOptional()
  @IsArray()
  @ArrayMaxSize(12)
  @IsDateString({ strict: true }, { each: true })
  dueDates?: string[];
}
