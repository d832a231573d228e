import { Transform } from 'class-transformer';
import { Matches } from 'class-validator';
import { applyDecorators } from '@nestjs/common';

export const AMOUNT_PATTERN = /^\d+(\.\d{1,2})?$/;

/** Accepts a JSON number or string, keeps it as text, and allows at most two decimals. */
export const IsAmount = () =>
  applyDecorators(
    Transform(({ value }: { value: unknown }) =>
      typeof value === 'number' || typeof value === 'string' ? String(value).trim() : value,
    ),
    Matches(AMOUNT_PATTERN, { message: '$property must be a non-negative amount with at most two decimal places' }),
  );
