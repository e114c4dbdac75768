import { IsIn, IsOptional, IsString } from 'class-validator';
import { Transform } from 'class-transformer';
import {
  TRADE_ACTIONS,
  type TradeActionFilter,
  type TradesFilter,
} from '@stock-tracker/ledger';
import { blankToUndefined, optionalSymbol } from '../../validation/transforms';

export const TRADE_ACTION_FILTERS: readonly TradeActionFilter[] = [
  ...TRADE_ACTIONS,
  'TRANSFER',
];

export class ListTradesQuery implements TradesFilter {
  @IsOptional()
  @Transform(blankToUndefined)
  @IsString()
  account?: string;

  @IsOptional()
  @Transform(optionalSymbol)
  @IsString()
  symbol?: string;

  @IsOptional()
  @Transform(optionalSymbol)
  @IsIn([...TRADE_ACTION_FILTERS])
  action?: TradeActionFilter;
}
