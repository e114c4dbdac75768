import { Body, Controller, Get, Post, Query } from '@nestjs/common';
import { CreateHoldingDto } from './dto/create-holding.dto';
import { ListHoldingsQuery } from './dto/list-holdings.query';
import {
  toHoldingView,
  toHoldingsSummaryView,
  type HoldingView,
  type HoldingsReportView,
} from './holding.types';
import { HoldingsService } from './holdings.service';

@Controller('holdings')
export class HoldingsController {
  constructor(private readonly holdingsService: HoldingsService) {}

  @Get()
  async list(@Query() query: ListHoldingsQuery): Promise<HoldingsReportView> {
    const report = await this.holdingsService.list(query);
    return {
      holdings: report.holdings.map(toHoldingView),
      summary: toHoldingsSummaryView(report.summary),
      accounts: report.accounts,
      symbols: report.symbols,
    };
  }

  @Post()
  async create(@Body() dto: CreateHoldingDto): Promise<HoldingView> {
    return toHoldingView(await this.holdingsService.addExisting(dto));
  }

  @Get('reconcile')
  async reconcile() {
    const res = await this.holdingsService.reconcile();
    return {
      ...res,
      mismatches: res.mismatches.map((m) => ({
        account: m.account,
        symbol: m.symbol,
        expected: m.expected && toHoldingView(m.expected),
        actual: m.actual && toHoldingView(m.actual),
      })),
    };
  }

  @Post('rebuild')
  rebuild() {
    return this.holdingsService.rebuild();
  }
}
