import type { Decimal } from "./decimal";

export const TRADE_ACTIONS = [
  "BUY",
  "SELL",
  "TRANSFER_IN",
  "TRANSFER_OUT",
] as const;

export type TradeAction = (typeof TRADE_ACTIONS)[number];

export function isTradeAction(value: unknown): value is TradeAction {
  return TRADE_ACTIONS.some((a) => a === value);
}

export type TradeRecord = {
  date: string; // YYYY-MM-DD
  account: string;
  symbol: string;
  stockName: string;
  action: TradeAction;
  quantity: Decimal;
  price: Decimal;
  commission: Decimal;
};

export type HoldingRecord = {
  account: string;
  symbol: string;
  stockName: string;
  shares: Decimal;
  averageCost: Decimal;
  // total cost of the shares held; averageCost is derived from it
  bookCost: Decimal;
  realizedGain: Decimal;
  acquiredOn: string; // YYYY-MM-DD
};

// Keyed by holdingKey(account, symbol), insertion-ordered.
export type Holdings = ReadonlyMap<string, HoldingRecord>;

export function holdingKey(account: string, symbol: string): string {
  return `${account}\u0000${symbol}`;
}
