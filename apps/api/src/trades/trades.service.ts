import { Injectable, Logger } from '@nestjs/common';
import {
  Decimal,
  ValidationError,
  applyTrade,
  filterTrades,
  holdingKey,
  listAccounts,
  listSymbols,
  summarizeTrades,
  type ApplyResult,
  type HoldingRecord,
  type Holdings,
  type TradeRecord,
  type TradesFilter,
  type TradesSummary,
} from '@stock-tracker/ledger';
import { LedgerStoreService } from '../storage/ledger-store.service';
import { todayIso } from '../utils/date';
import { CreateTradeDto } from './dto/create-trade.dto';
import { CreateTransferDto } from './dto/create-transfer.dto';

export type CommitResult = {
  trades: TradeRecord[];
  results: ApplyResult[];
};

export type TradeOutcome = {
  trade: TradeRecord;
  holding: HoldingRecord;
  realizedGain: Decimal;
};

export type TransferOutcome = {
  trades: [TradeRecord, TradeRecord];
  source: HoldingRecord;
  destination: HoldingRecord;
};

export type TradesReport = {
  // trades before filtering
  total: number;
  trades: TradeRecord[];
  summary: TradesSummary;
  accounts: string[];
  symbols: string[];
};

@Injectable()
export class TradesService {
  private readonly logger = new Logger(TradesService.name);

  constructor(private readonly store: LedgerStoreService) {}

  /**
   * Builds trades against the current holdings and applies them in order.
   * Nothing is written unless every trade is accepted.
   */
  commit(build: (holdings: Holdings) => TradeRecord[]): Promise<CommitResult> {
    return this.store.exclusive(async () => {
      const holdings = await this.store.readHoldings();

      let trades: TradeRecord[];
      let next = holdings;
      const results: ApplyResult[] = [];
      try {
        trades = build(holdings);
        for (const t of trades) {
          const res = applyTrade(t, next);
          results.push(res);
          next = res.holdings;
        }
      } catch (e) {
        if (e instanceof ValidationError) {
          this.logger.warn(`trade rejected: ${e.message}`);
        }
        throw e;
      }

      await this.store.commit(trades, next);
      for (const t of trades) {
        this.logger.log(
          `recorded ${t.action} ${t.quantity.toFixed()} ${t.symbol} @ ${t.price.toFixed()} in ${t.account}`,
        );
      }
      return { trades, results };
    });
  }

  async record(dto: CreateTradeDto): Promise<TradeOutcome> {
    const { trades, results } = await this.commit((holdings) => [
      this.toTrade(dto, holdings),
    ]);
    const [trade] = trades;
    const [res] = results;
    return { trade, holding: res.holding, realizedGain: res.realizedGain };
  }

  async transfer(dto: CreateTransferDto): Promise<TransferOutcome> {
    const { trades, results } = await this.commit((holdings) => {
      if (dto.fromAccount === dto.toAccount) {
        throw new ValidationError(
          'Source and destination accounts must be different',
        );
      }

      const source = holdings.get(holdingKey(dto.fromAccount, dto.symbol));
      // both legs carry the source's average cost so the basis moves with the shares
      const leg = {
        date: dto.date ?? todayIso(),
        symbol: dto.symbol,
        stockName: source?.stockName ?? '',
        quantity: new Decimal(dto.quantity),
        price: source?.averageCost ?? new Decimal(0),
        commission: new Decimal(0),
      };

      return [
        { ...leg, account: dto.fromAccount, action: 'TRANSFER_OUT' },
        { ...leg, account: dto.toAccount, action: 'TRANSFER_IN' },
      ];
    });

    const [out, into] = trades;
    const [outRes, inRes] = results;
    return {
      trades: [out, into],
      source: outRes.holding,
      destination: inRes.holding,
    };
  }

  async list(filter: TradesFilter = {}): Promise<TradesReport> {
    const [holdings, all] = await Promise.all([
      this.store.readHoldings(),
      this.store.readTrades(),
    ]);
    const trades = filterTrades(all, filter);
    return {
      total: all.length,
      trades,
      summary: summarizeTrades(trades),
      accounts: listAccounts(holdings, all),
      symbols: listSymbols(holdings, all),
    };
  }

  private toTrade(dto: CreateTradeDto, holdings: Holdings): TradeRecord {
    const current = holdings.get(holdingKey(dto.account, dto.symbol));

    let price: Decimal;
    if (dto.action === 'TRANSFER_OUT') {
      price = current?.averageCost ?? new Decimal(0);
    } else if (dto.price === undefined) {
      throw new ValidationError(`price is required for ${dto.action}`);
    } else {
      price = new Decimal(dto.price);
    }

    return {
      date: dto.date ?? todayIso(),
      account: dto.account,
      symbol: dto.symbol,
      stockName: dto.stockName || current?.stockName || '',
      action: dto.action,
      quantity: new Decimal(dto.quantity),
      price,
      commission: new Decimal(dto.commission ?? 0),
    };
  }
}
