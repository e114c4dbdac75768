import { Injectable, Logger } from '@nestjs/common';
import {
  Decimal,
  ValidationError,
  diffHoldings,
  filterHoldings,
  holdingKey,
  listAccounts,
  listSymbols,
  replayTrades,
  summarizeHoldings,
  type HoldingMismatch,
  type HoldingRecord,
  type Holdings,
  type HoldingsFilter,
  type HoldingsSummary,
} from '@stock-tracker/ledger';
import { LedgerStoreService } from '../storage/ledger-store.service';
import { TradesService } from '../trades/trades.service';
import { todayIso } from '../utils/date';
import { CreateHoldingDto } from './dto/create-holding.dto';

export type HoldingsReport = {
  // positions before filtering
  total: number;
  holdings: HoldingRecord[];
  summary: HoldingsSummary;
  accounts: string[];
  symbols: string[];
};

export type ReconcileResult = {
  consistent: boolean;
  trades: number;
  holdings: number;
  mismatches: HoldingMismatch[];
  replayError?: string;
};

@Injectable()
export class HoldingsService {
  private readonly logger = new Logger(HoldingsService.name);

  constructor(
    private readonly store: LedgerStoreService,
    private readonly trades: TradesService,
  ) {}

  async list(filter: HoldingsFilter = {}): Promise<HoldingsReport> {
    const [holdings, trades] = await Promise.all([
      this.store.readHoldings(),
      this.store.readTrades(),
    ]);
    const rows = filterHoldings(holdings, filter);
    return {
      total: holdings.size,
      holdings: rows,
      summary: summarizeHoldings(rows),
      accounts: listAccounts(holdings, trades),
      symbols: listSymbols(holdings, trades),
    };
  }

  /**
   * Seeds a position held before tracking started. It is logged as a
   * TRANSFER_IN at book cost per share so replaying the log still
   * reproduces it.
   */
  async addExisting(dto: CreateHoldingDto): Promise<HoldingRecord> {
    const { results } = await this.trades.commit((holdings) => {
      const existing = holdings.get(holdingKey(dto.account, dto.symbol));
      if (existing && existing.shares.gt(0)) {
        throw new ValidationError(
          `Holding for ${dto.symbol} in ${dto.account} already exists. Use trade entry to add more shares.`,
        );
      }

      const quantity = new Decimal(dto.quantity);
      return [
        {
          date: dto.acquiredOn ?? todayIso(),
          account: dto.account,
          symbol: dto.symbol,
          stockName: dto.stockName,
          action: 'TRANSFER_IN',
          quantity,
          price: new Decimal(dto.bookCost).div(quantity),
          commission: new Decimal(0),
        },
      ];
    });

    return results[0].holding;
  }

  async reconcile(): Promise<ReconcileResult> {
    const [persisted, trades] = await Promise.all([
      this.store.readHoldings(),
      this.store.readTrades(),
    ]);

    const base = { trades: trades.length, holdings: persisted.size };

    let replayed: Holdings;
    try {
      replayed = replayTrades(trades);
    } catch (e) {
      if (!(e instanceof ValidationError)) throw e;
      this.logger.warn(`trade log cannot be replayed: ${e.message}`);
      return { ...base, consistent: false, mismatches: [], replayError: e.message };
    }

    const mismatches = diffHoldings(replayed, persisted);
    if (mismatches.length) {
      this.logger.warn(
        `holdings differ from the trade log for ${mismatches
          .map((m) => `${m.symbol}@${m.account}`)
          .join(', ')}`,
      );
    }
    return { ...base, consistent: mismatches.length === 0, mismatches };
  }

  /** Rewrites consolidated.csv from the trade log. */
  rebuild(): Promise<{ trades: number; holdings: number }> {
    return this.store.exclusive(async () => {
      const trades = await this.store.readTrades();
      const holdings = replayTrades(trades);
      await this.store.writeHoldings(holdings);
      this.logger.log(
        `rebuilt ${holdings.size} holding(s) from ${trades.length} trade(s)`,
      );
      return { trades: trades.length, holdings: holdings.size };
    });
  }
}
