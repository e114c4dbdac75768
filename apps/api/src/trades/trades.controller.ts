import { Body, Controller, Get, Post, Query } from '@nestjs/common';
import { toHoldingView } from '../holdings/holding.types';
import { CreateTradeDto } from './dto/create-trade.dto';
import { CreateTransferDto } from './dto/create-transfer.dto';
import { ListTradesQuery } from './dto/list-trades.query';
import {
  toTradeView,
  toTradesSummaryView,
  type TradeOutcomeView,
  type TradesReportView,
  type TransferOutcomeView,
} from './trade.types';
import { TradesService } from './trades.service';

@Controller('trades')
export class TradesController {
  constructor(private readonly tradesService: TradesService) {}

  @Post()
  async create(@Body() dto: CreateTradeDto): Promise<TradeOutcomeView> {
    const res = await this.tradesService.record(dto);
    return {
      trade: toTradeView(res.trade),
      holding: toHoldingView(res.holding),
      realizedGain: res.realizedGain.toFixed(),
    };
  }

  @Post('transfer')
  async transfer(@Body() dto: CreateTransferDto): Promise<TransferOutcomeView> {
    const res = await this.tradesService.transfer(dto);
    return {
      trades: [toTradeView(res.trades[0]), toTradeView(res.trades[1])],
      source: toHoldingView(res.source),
      destination: toHoldingView(res.destination),
    };
  }

  @Get()
  async list(@Query() query: ListTradesQuery): Promise<TradesReportView> {
    const report = await this.tradesService.list(query);
    return {
      trades: report.trades.map(toTradeView),
      summary: toTradesSummaryView(report.summary),
      accounts: report.accounts,
      symbols: report.symbols,
    };
  }
}
