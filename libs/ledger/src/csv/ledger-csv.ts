import Papa from "papaparse";
import { Decimal } from "../decimal";
import { CsvFormatError } from "../errors";
import {
  holdingKey,
  isTradeAction,
  type HoldingRecord,
  type Holdings,
  type TradeRecord,
} from "../types";

export const HOLDINGS_COLUMNS = [
  "account",
  "symbol",
  "stock_name",
  "shares",
  "average_cost",
  "book_cost",
  "realized_gain",
  "date_acquired",
] as const;

export const TRADES_COLUMNS = [
  "date",
  "account",
  "symbol",
  "stock_name",
  "action",
  "quantity",
  "price",
  "commission",
] as const;

type HoldingsRow = Record<(typeof HOLDINGS_COLUMNS)[number], string>;
type TradesRow = Record<(typeof TRADES_COLUMNS)[number], string>;

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const NEWLINE = "\n";

function parseTable(
  text: string,
  file: string,
  columns: readonly string[],
): Record<string, string>[] {
  const parsed = Papa.parse<Record<string, string>>(text, {
    header: true,
    skipEmptyLines: "greedy",
  });

  const err = parsed.errors[0];
  if (err) {
    const line = err.row == null ? null : err.row + 2;
    throw new CsvFormatError(file, line, err.message);
  }

  const fields = parsed.meta.fields ?? [];
  const missing = columns.filter((c) => !fields.includes(c));
  if (missing.length) {
    throw new CsvFormatError(
      file,
      1,
      `missing column(s): ${missing.join(", ")}`,
    );
  }

  return parsed.data;
}

function readDecimal(
  value: string | undefined,
  column: string,
  file: string,
  line: number,
): Decimal {
  const raw = (value ?? "").trim();
  if (!raw) throw new CsvFormatError(file, line, `${column} is empty`);
  let d: Decimal;
  try {
    d = new Decimal(raw);
  } catch {
    throw new CsvFormatError(file, line, `${column} is not a number: ${raw}`);
  }
  if (!d.isFinite()) {
    throw new CsvFormatError(file, line, `${column} is not a number: ${raw}`);
  }
  return d;
}

function readDate(
  value: string | undefined,
  column: string,
  file: string,
  line: number,
): string {
  const raw = (value ?? "").trim();
  if (!ISO_DATE.test(raw)) {
    throw new CsvFormatError(file, line, `${column} is not a YYYY-MM-DD date`);
  }
  return raw;
}

function readText(
  value: string | undefined,
  column: string,
  file: string,
  line: number,
  required = true,
): string {
  const raw = (value ?? "").trim();
  if (required && !raw) throw new CsvFormatError(file, line, `${column} is empty`);
  return raw;
}

function writeTable<T extends Record<string, string>>(
  columns: readonly string[],
  rows: T[],
  header: boolean,
): string {
  if (!rows.length) return header ? emptyTableCsv(columns) : "";
  const body = Papa.unparse(rows, {
    columns: [...columns],
    header,
    newline: NEWLINE,
  });
  return body + NEWLINE;
}

export function parseHoldingsCsv(
  text: string,
  file = "consolidated.csv",
): Holdings {
  const rows = parseTable(text, file, HOLDINGS_COLUMNS);
  const holdings = new Map<string, HoldingRecord>();

  rows.forEach((row, i) => {
    const line = i + 2;
    const h: HoldingRecord = {
      account: readText(row.account, "account", file, line),
      symbol: readText(row.symbol, "symbol", file, line).toUpperCase(),
      stockName: readText(row.stock_name, "stock_name", file, line, false),
      shares: readDecimal(row.shares, "shares", file, line),
      averageCost: readDecimal(row.average_cost, "average_cost", file, line),
      bookCost: readDecimal(row.book_cost, "book_cost", file, line),
      realizedGain: readDecimal(row.realized_gain, "realized_gain", file, line),
      acquiredOn: readDate(row.date_acquired, "date_acquired", file, line),
    };

    if (h.shares.lt(0) || h.averageCost.lt(0) || h.bookCost.lt(0)) {
      throw new CsvFormatError(
        file,
        line,
        "shares, average_cost and book_cost must be >= 0",
      );
    }

    const key = holdingKey(h.account, h.symbol);
    if (holdings.has(key)) {
      throw new CsvFormatError(
        file,
        line,
        `duplicate holding ${h.symbol} in ${h.account}`,
      );
    }
    holdings.set(key, h);
  });

  return holdings;
}

export function parseTradesCsv(
  text: string,
  file = "trades.csv",
): TradeRecord[] {
  const rows = parseTable(text, file, TRADES_COLUMNS);

  return rows.map((row, i) => {
    const line = i + 2;
    const action = readText(row.action, "action", file, line).toUpperCase();
    if (!isTradeAction(action)) {
      throw new CsvFormatError(file, line, `unknown action ${action}`);
    }
    return {
      date: readDate(row.date, "date", file, line),
      account: readText(row.account, "account", file, line),
      symbol: readText(row.symbol, "symbol", file, line).toUpperCase(),
      stockName: readText(row.stock_name, "stock_name", file, line, false),
      action,
      quantity: readDecimal(row.quantity, "quantity", file, line),
      price: readDecimal(row.price, "price", file, line),
      commission: readDecimal(row.commission, "commission", file, line),
    };
  });
}

function compareHoldings(a: HoldingRecord, b: HoldingRecord): number {
  if (a.account !== b.account) return a.account < b.account ? -1 : 1;
  if (a.symbol !== b.symbol) return a.symbol < b.symbol ? -1 : 1;
  return 0;
}

export function sortHoldings(holdings: Holdings): HoldingRecord[] {
  return [...holdings.values()].sort(compareHoldings);
}

/** Whole table with header, rows sorted by account then symbol. */
export function serializeHoldingsCsv(holdings: Holdings): string {
  const rows: HoldingsRow[] = sortHoldings(holdings).map((h) => ({
    account: h.account,
    symbol: h.symbol,
    stock_name: h.stockName,
    shares: h.shares.toFixed(),
    average_cost: h.averageCost.toFixed(),
    book_cost: h.bookCost.toFixed(),
    realized_gain: h.realizedGain.toFixed(),
    date_acquired: h.acquiredOn,
  }));
  return writeTable(HOLDINGS_COLUMNS, rows, true);
}

function tradeRow(t: TradeRecord): TradesRow {
  return {
    date: t.date,
    account: t.account,
    symbol: t.symbol,
    stock_name: t.stockName,
    action: t.action,
    quantity: t.quantity.toFixed(),
    price: t.price.toFixed(),
    commission: t.commission.toFixed(),
  };
}

export function serializeTradesCsv(trades: readonly TradeRecord[]): string {
  return writeTable(TRADES_COLUMNS, trades.map(tradeRow), true);
}

/** Rows only, for appending to an existing trades.csv. */
export function serializeTradeRows(trades: readonly TradeRecord[]): string {
  return writeTable(TRADES_COLUMNS, trades.map(tradeRow), false);
}

export function emptyTableCsv(columns: readonly string[]): string {
  return columns.join(",") + NEWLINE;
}
