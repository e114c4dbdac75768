import type { HoldingRecord, HoldingsSummary } from '@stock-tracker/ledger';

export type HoldingView = {
  account: string;
  symbol: string;
  stockName: string;
  shares: string; // Decimal string
  averageCost: string; // Decimal string
  bookValue: string; // total cost of the shares held
  realizedGain: string; // Decimal string
  acquiredOn: string;
};

export type HoldingsSummaryView = {
  positions: number;
  totalShares: string;
  totalBookValue: string;
  totalRealizedGain: string;
};

export type HoldingsReportView = {
  holdings: HoldingView[];
  summary: HoldingsSummaryView;
  accounts: string[];
  symbols: string[];
};

export function toHoldingView(h: HoldingRecord): HoldingView {
  return {
    account: h.account,
    symbol: h.symbol,
    stockName: h.stockName,
    shares: h.shares.toFixed(),
    averageCost: h.averageCost.toFixed(),
    bookValue: h.bookCost.toFixed(),
    realizedGain: h.realizedGain.toFixed(),
    acquiredOn: h.acquiredOn,
  };
}

export function toHoldingsSummaryView(s: HoldingsSummary): HoldingsSummaryView {
  return {
    positions: s.positions,
    totalShares: s.totalShares.toFixed(),
    totalBookValue: s.totalBookValue.toFixed(),
    totalRealizedGain: s.totalRealizedGain.toFixed(),
  };
}
