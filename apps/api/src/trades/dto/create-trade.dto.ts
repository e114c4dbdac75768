import {
  IsIn,
  IsISO8601,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  MaxLength,
} from 'class-validator';
import { Transform } from 'class-transformer';
import { TRADE_ACTIONS, type TradeAction } from '@stock-tracker/ledger';
import {
  HasMaxDigits,
  IsNonNegativeDecimal,
  IsPositiveDecimal,
} from '../../validation/is-positive-decimal';
import {
  blankToUndefined,
  normalizeDecimal,
  normalizeOptionalDecimal,
  normalizeSymbol,
  trimText,
} from '../../validation/transforms';
import { ISO_DATE } from '../../utils/date';

export class CreateTradeDto {
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

  @IsOptional()
  @Transform(trimText)
  @IsString()
  @MaxLength(120)
  stockName?: string;

  @Transform(normalizeSymbol)
  @IsIn([...TRADE_ACTIONS], {
    message: `action must be one of ${TRADE_ACTIONS.join(', ')}`,
  })
  action!: TradeAction;

  @Transform(normalizeDecimal)
  @IsString()
  @IsPositiveDecimal({ message: 'quantity must be > 0' })
  @HasMaxDigits()
  quantity!: string;

  // not needed for TRANSFER_OUT, which moves shares at their average cost
  @IsOptional()
  @Transform(normalizeOptionalDecimal)
  @IsString()
  @IsNonNegativeDecimal({ message: 'price must be >= 0' })
  @HasMaxDigits()
  price?: string;

  @IsOptional()
  @Transform(normalizeOptionalDecimal)
  @IsString()
  @IsNonNegativeDecimal({ message: 'commission must be >= 0' })
  @HasMaxDigits()
  commission?: string;

  @IsOptional()
  @Transform(blankToUndefined)
  @Matches(ISO_DATE, { message: 'date must be YYYY-MM-DD' })
  @IsISO8601({ strict: true }, { message: 'date must be a valid date' })
  date?: string;
}
