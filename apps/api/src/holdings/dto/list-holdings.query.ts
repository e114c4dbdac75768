import { IsOptional, IsString } from 'class-validator';
import { Transform } from 'class-transformer';
import type { HoldingsFilter } from '@stock-tracker/ledger';
import { blankToUndefined, optionalSymbol } from '../../validation/transforms';

export class ListHoldingsQuery implements HoldingsFilter {
  @IsOptional()
  @Transform(blankToUndefined)
  @IsString()
  account?: string;

  @IsOptional()
  @Transform(optionalSymbol)
  @IsString()
  symbol?: string;
}
