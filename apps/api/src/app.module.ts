import { Module } from '@nestjs/common';
import { HealthModule } from './health/health.module';
import { HoldingsModule } from './holdings/holdings.module';
import { PagesModule } from './pages/pages.module';
import { StorageModule } from './storage/storage.module';
import { TradesModule } from './trades/trades.module';

@Module({
  imports: [
    StorageModule,
    TradesModule,
    HoldingsModule,
    PagesModule,
    HealthModule,
  ],
})
export class AppModule {}
