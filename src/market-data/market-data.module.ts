import { Module } from '@nestjs/common';
import { MarketDataController } from './market-data.controller';
import { MarketDataService } from './market-data.service';
import { PRICE_FX_FEED } from './price-fx-feed.interface';

@Module({
  controllers: [MarketDataController],
  providers: [
    MarketDataService,
    { provide: PRICE_FX_FEED, useExisting: MarketDataService },
  ],
  exports: [MarketDataService, PRICE_FX_FEED],
})
export class MarketDataModule {}
