import { Controller, Get } from '@nestjs/common';
import { LedgerStoreService } from '../storage/ledger-store.service';

@Controller()
export class HealthController {
  constructor(private readonly store: LedgerStoreService) {}

  @Get('/healthz')
  healthz() {
    return { status: 'ok' };
  }

  @Get('/readyz')
  async readyz() {
    const [holdings, trades] = await Promise.all([
      this.store.readHoldings(),
      this.store.readTrades(),
    ]);
    return { status: 'ready', holdings: holdings.size, trades: trades.length };
  }
}
