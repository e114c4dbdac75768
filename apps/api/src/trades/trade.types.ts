import type { TradeRecord, TradesSummary } from '@stock-tracker/ledger';
import type { HoldingView } from '../holdings/holding.types';

export type TradeView = {
  date: string;
  account: string;
  symbol: string;
  stockName: string;
  action: TradeRecord['action'];
  quantity: string; // Decimal string
  price: string; // Decimal string
  commission: string; // Decimal string
};

export type TradesReportView = {
  trades: TradeView[];
  summary: {
    trades: number;
    totalShares: string;
    totalCommission: string;
  };
  accounts: string[];
  symbols: string[];
};

export type TradeOutcomeView = {
  trade: TradeView;
  holding: HoldingView;
  realizedGain: string;
};

export type TransferOutcomeView = {
  trades: [TradeView, TradeView];
  source: HoldingView;
  destination: HoldingView;
};

export function toTradeView(t: TradeRecord): TradeView {
  return {
    date: t.date,
    account: t.account,
    symbol: t.symbol,
    stockName: t.stockName,
    action: t.action,
    quantity: t.quantity.toFixed(),
    price: t.price.toFixed(),
    commission: t.commission.toFixed(),
  };
}

export function toTradesSummaryView(s: TradesSummary): TradesReportView['summary'] {
  return {
    trades: s.trades,
    totalShares: s.totalShares.toFixed(),
    totalCommission: s.totalCommission.toFixed(),
  };
}
