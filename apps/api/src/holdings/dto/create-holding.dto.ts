import {
  IsISO8601,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  MaxLength,
} from 'class-validator';
import { Transform } from 'class-transformer';
import {
  HasMaxDigits,
  IsPositiveDecimal,
} from '../../validation/is-positive-decimal';
import {
  blankToUndefined,
  normalizeDecimal,
  normalizeSymbol,
  trimText,
} from '../../validation/transforms';
import { ISO_DATE } from '../../utils/date';

export class CreateHoldingDto {
  @Transform(trimText)
  @IsString()
  @IsNotEmpty({ message: 'account is required' })
  @MaxLength(60)
  account!: string;

  @Transform(normalizeSymbol)
  @IsString()
  @IsNotEmpty({ message: 'symbol is required' })
  @MaxLength(12)
  symbol!: string;

  @Transform(trimText)
  @IsString()
  @IsNotEmpty({ message: 'stockName is required' })
  @MaxLength(120)
  stockName!: string;

  @Transform(normalizeDecimal)
  @IsString()
  @IsPositiveDecimal({ message: 'quantity must be > 0' })
  @HasMaxDigits()
  quantity!: string;

  // total paid for the position, commissions included
  @Transform(normalizeDecimal)
  @IsString()
  @IsPositiveDecimal({ message: 'bookCost must be > 0' })
  @HasMaxDigits()
  bookCost!: string;

  @IsOptional()
  @Transform(blankToUndefined)
  @Matches(ISO_DATE, { message: 'acquiredOn must be YYYY-MM-DD' })
  @IsISO8601({ strict: true }, { message: 'acquiredOn must be a valid date' })
  acquiredOn?: string;
}
