import { Decimal } from "../decimal";
import { ValidationError } from "../errors";
import {
  holdingKey,
  type HoldingRecord,
  type Holdings,
  type TradeRecord,
} from "../types";

export type ApplyResult = {
  holdings: Holdings;
  // Position after the trade; shares may be 0 even when the record was dropped.
  holding: HoldingRecord;
  // Non-zero only for SELL.
  realizedGain: Decimal;
};

export type HoldingMismatch = {
  account: string;
  symbol: string;
  expected: HoldingRecord | null;
  actual: HoldingRecord | null;
};

const D = Decimal;

function assertTradeAmounts(t: TradeRecord) {
  if (t.quantity.lte(0)) {
    throw new ValidationError("Quantity must be greater than 0");
  }
  if (t.price.lt(0)) {
    throw new ValidationError("Price per share cannot be negative");
  }
  if (t.commission.lt(0)) {
    throw new ValidationError("Commission cannot be negative");
  }
}

function emptyHolding(t: TradeRecord): HoldingRecord {
  return {
    account: t.account,
    symbol: t.symbol,
    stockName: t.stockName,
    shares: new D(0),
    averageCost: new D(0),
    bookCost: new D(0),
    realizedGain: new D(0),
    acquiredOn: t.date,
  };
}

function acquire(
  current: HoldingRecord | undefined,
  t: TradeRecord,
): HoldingRecord {
  const base = current ?? emptyHolding(t);
  const opening = base.shares.lte(0);

  const shares = base.shares.add(t.quantity);
  const bookCost = base.bookCost.add(t.quantity.mul(t.price)).add(t.commission);

  return {
    ...base,
    stockName: t.stockName || base.stockName,
    shares,
    averageCost: bookCost.div(shares),
    bookCost,
    acquiredOn: opening ? t.date : base.acquiredOn,
  };
}

function insufficient(t: TradeRecord, held: Decimal): ValidationError {
  const verb = t.action === "SELL" ? "sell" : "transfer out";
  return new ValidationError(
    `Insufficient shares of ${t.symbol} in ${t.account}: ` +
      `holding ${held.toFixed()}, trying to ${verb} ${t.quantity.toFixed()}`,
  );
}

// Cost leaving the position; a full disposal takes the whole book cost.
function costRemoved(current: HoldingRecord, quantity: Decimal): Decimal {
  if (quantity.equals(current.shares)) return current.bookCost;
  return quantity.mul(current.averageCost);
}

function dispose(
  current: HoldingRecord,
  t: TradeRecord,
  removed: Decimal,
  realizedGain: Decimal,
): HoldingRecord {
  const shares = current.shares.sub(t.quantity);
  const open = shares.gt(0);
  return {
    ...current,
    stockName: t.stockName || current.stockName,
    shares,
    averageCost: open ? current.averageCost : new D(0),
    bookCost: open ? current.bookCost.sub(removed) : new D(0),
    realizedGain: current.realizedGain.add(realizedGain),
  };
}

/**
 * Applies one trade to the holdings using the weighted-average cost method.
 *
 * Returns a new holdings map; the one passed in is left untouched, also when
 * the trade is rejected with a ValidationError.
 */
export function applyTrade(trade: TradeRecord, holdings: Holdings): ApplyResult {
  assertTradeAmounts(trade);

  const key = holdingKey(trade.account, trade.symbol);
  const current = holdings.get(key);

  let next: HoldingRecord;
  let realizedGain = new D(0);

  switch (trade.action) {
    case "BUY":
    case "TRANSFER_IN":
      next = acquire(current, trade);
      break;
    case "SELL":
    case "TRANSFER_OUT": {
      if (!current || trade.quantity.gt(current.shares)) {
        throw insufficient(trade, current?.shares ?? new D(0));
      }
      const removed = costRemoved(current, trade.quantity);
      if (trade.action === "SELL") {
        realizedGain = trade.quantity
          .mul(trade.price)
          .sub(trade.commission)
          .sub(removed);
      }
      next = dispose(current, trade, removed, realizedGain);
      break;
    }
    default:
      throw new ValidationError(`Unknown trade action: ${String(trade.action)}`);
  }

  const out = new Map(holdings);
  if (next.shares.gt(0) || !next.realizedGain.isZero()) {
    out.set(key, next);
  } else {
    out.delete(key);
  }

  return { holdings: out, holding: next, realizedGain };
}

export function replayTrades(trades: readonly TradeRecord[]): Holdings {
  let holdings: Holdings = new Map();
  trades.forEach((t, i) => {
    try {
      holdings = applyTrade(t, holdings).holdings;
    } catch (e) {
      if (e instanceof ValidationError) {
        throw new ValidationError(`Trade #${i + 1} (${t.date}): ${e.message}`);
      }
      throw e;
    }
  });
  return holdings;
}

function sameHolding(a: HoldingRecord, b: HoldingRecord): boolean {
  return (
    a.stockName === b.stockName &&
    a.acquiredOn === b.acquiredOn &&
    a.shares.equals(b.shares) &&
    a.averageCost.equals(b.averageCost) &&
    a.bookCost.equals(b.bookCost) &&
    a.realizedGain.equals(b.realizedGain)
  );
}

export function diffHoldings(
  expected: Holdings,
  actual: Holdings,
): HoldingMismatch[] {
  const mismatches: HoldingMismatch[] = [];

  for (const [key, e] of expected) {
    const a = actual.get(key);
    if (!a || !sameHolding(e, a)) {
      mismatches.push({
        account: e.account,
        symbol: e.symbol,
        expected: e,
        actual: a ?? null,
      });
    }
  }

  for (const [key, a] of actual) {
    if (expected.has(key)) continue;
    mismatches.push({
      account: a.account,
      symbol: a.symbol,
      expected: null,
      actual: a,
    });
  }

  return mismatches;
}
