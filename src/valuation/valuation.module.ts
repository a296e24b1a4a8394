import { Module } from '@nestjs/common';
import { MarketDataModule } from '../market-data/market-data.module';
import { FxNormalizerService } from './fx-normalizer.service';
import { HistoryBuilderService } from './history-builder.service';
import { PositionAggregatorService } from './position-aggregator.service';
import { ValuationService } from './valuation.service';

// Pure valuation engine over the feed; no storage of its own.
@Module({
  imports: [MarketDataModule],
  providers: [FxNormalizerService, PositionAggregatorService, ValuationService, HistoryBuilderService],
  exports: [FxNormalizerService, PositionAggregatorService, ValuationService, HistoryBuilderService],
})
export class ValuationModule {}
