import { Module } from '@nestjs/common';
import { HoldingsModule } from '../holdings/holdings.module';
import { TradesModule } from '../trades/trades.module';
import { PagesController } from './pages.controller';

@Module({
  imports: [HoldingsModule, TradesModule],
  controllers: [PagesController],
})
export class PagesModule {}
