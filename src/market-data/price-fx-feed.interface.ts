import { CalendarDate } from '../common/utils/calendar-date.util';
import { FxRate } from './entities/fx-rate.entity';
import { PriceObservation } from './entities/price-observation.entity';

export const PRICE_FX_FEED = Symbol('PRICE_FX_FEED');

// Read side of the market-data feed used by the engine.
// Both lookups carry the last observation forward.
export interface PriceFxFeed {
  priceOnOrBefore(ticker: string, date: CalendarDate): PriceObservation | undefined;
  fxRateOnOrBefore(baseCurrency: string, quoteCurrency: string, date: CalendarDate): FxRate | undefined;
}
