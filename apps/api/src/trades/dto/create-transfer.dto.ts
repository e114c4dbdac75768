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

export class CreateTransferDto {
  @Transform(trimText)
  @IsString()
  @IsNotEmpty({ message: 'fromAccount is required' })
  @MaxLength(60)
  fromAccount!: string;

  @Transform(trimText)
  @IsString()
  @IsNotEmpty({ message: 'toAccount is required' })
  @MaxLength(60)
  toAccount!: string;

  @Transform(normalizeSymbol)
  @IsString()
  @IsNotEmpty({ message: 'symbol is required' })
  @MaxLength(12)
  symbol!: string;

  @Transform(normalizeDecimal)
  @IsString()
  @IsPositiveDecimal({ message: 'quantity must be > 0' })
  @HasMaxDigits()
  quantity!: string;

  @IsOptional()
  @Transform(blankToUndefined)
  @Matches(ISO_DATE, { message: 'date must be YYYY-MM-DD' })
  @IsISO8601({ strict: true }, { message: 'date must be a valid date' })
  date?: string;
}
