import { sortHoldings } from "../csv/ledger-csv";
import { Decimal } from "../decimal";
import type {
  HoldingRecord,
  Holdings,
  TradeAction,
  TradeRecord,
} from "../types";

// TRANSFER matches both legs of a transfer.
export type TradeActionFilter = TradeAction | "TRANSFER";

export type HoldingsFilter = {
  account?: string;
  symbol?: string;
};

export type TradesFilter = HoldingsFilter & {
  action?: TradeActionFilter;
};

export type HoldingsSummary = {
  positions: number;
  totalShares: Decimal;
  totalBookValue: Decimal;
  totalRealizedGain: Decimal;
};

export type TradesSummary = {
  trades: number;
  totalShares: Decimal;
  totalCommission: Decimal;
};

function matches(value: string, wanted: string | undefined): boolean {
  return !wanted || value === wanted;
}

function matchesAction(
  action: TradeAction,
  wanted: TradeActionFilter | undefined,
): boolean {
  if (!wanted) return true;
  if (wanted === "TRANSFER") {
    return action === "TRANSFER_IN" || action === "TRANSFER_OUT";
  }
  return action === wanted;
}

export function filterHoldings(
  holdings: Holdings,
  filter: HoldingsFilter = {},
): HoldingRecord[] {
  return sortHoldings(holdings).filter(
    (h) => matches(h.account, filter.account) && matches(h.symbol, filter.symbol),
  );
}

export function filterTrades(
  trades: readonly TradeRecord[],
  filter: TradesFilter = {},
): TradeRecord[] {
  return trades.filter(
    (t) =>
      matches(t.account, filter.account) &&
      matches(t.symbol, filter.symbol) &&
      matchesAction(t.action, filter.action),
  );
}

export function summarizeHoldings(
  holdings: readonly HoldingRecord[],
): HoldingsSummary {
  const D = Decimal;
  return holdings.reduce<HoldingsSummary>(
    (acc, h) => ({
      positions: acc.positions + 1,
      totalShares: acc.totalShares.add(h.shares),
      totalBookValue: acc.totalBookValue.add(h.bookCost),
      totalRealizedGain: acc.totalRealizedGain.add(h.realizedGain),
    }),
    {
      positions: 0,
      totalShares: new D(0),
      totalBookValue: new D(0),
      totalRealizedGain: new D(0),
    },
  );
}

export function summarizeTrades(trades: readonly TradeRecord[]): TradesSummary {
  const D = Decimal;
  return trades.reduce<TradesSummary>(
    (acc, t) => ({
      trades: acc.trades + 1,
      totalShares: acc.totalShares.add(t.quantity),
      totalCommission: acc.totalCommission.add(t.commission),
    }),
    { trades: 0, totalShares: new D(0), totalCommission: new D(0) },
  );
}

function distinctSorted(values: Iterable<string>): string[] {
  return [...new Set(values)].sort();
}

export function listAccounts(
  holdings: Holdings,
  trades: readonly TradeRecord[] = [],
): string[] {
  return distinctSorted([
    ...[...holdings.values()].map((h) => h.account),
    ...trades.map((t) => t.account),
  ]);
}

export function listSymbols(
  holdings: Holdings,
  trades: readonly TradeRecord[] = [],
): string[] {
  return distinctSorted([
    ...[...holdings.values()].map((h) => h.symbol),
    ...trades.map((t) => t.symbol),
  ]);
}
