import { Inject, Injectable } from '@nestjs/common';
import Decimal from 'decimal.js';
import { PriceUnavailableError } from '../common/errors/portfolio-engine.errors';
import { CalendarDate } from '../common/utils/calendar-date.util';
import { PriceObservation } from '../market-data/entities/price-observation.entity';
import { PRICE_FX_FEED, PriceFxFeed } from '../market-data/price-fx-feed.interface';
import { Position, ValuedPosition } from './entities/position.entity';
import { FxNormalizerService } from './fx-normalizer.service';

// Marks aggregated positions to market in the position's reporting currency.
@Injectable()
export class ValuationService {
  constructor(
    @Inject(PRICE_FX_FEED) private readonly feed: PriceFxFeed,
    private readonly fxNormalizer: FxNormalizerService,
  ) {}

  /**
   * Values a position with a known observation.
   * Flat positions are worth 0 whether or not a price exists.
   *
   * @throws PriceUnavailableError if quantity > 0 and `price` is missing
   * @throws RateUnavailableError if the quote currency cannot be converted
   */
  value(position: Position, price: PriceObservation | undefined, date: CalendarDate): ValuedPosition {
    if (position.quantity.isZero()) {
      return {
        ...position,
        valuationDate: date,
        marketValue: new Decimal(0),
        unrealizedPnl: new Decimal(0),
      };
    }
    if (!price) {
      throw new PriceUnavailableError(position.ticker, date);
    }

    const marketPrice = this.fxNormalizer.convert(price.close, price.currency, position.currency, date);
    const marketValue = position.quantity.times(marketPrice);

    return {
      ...position,
      valuationDate: date,
      marketPrice,
      priceDate: price.date,
      marketValue,
      unrealizedPnl: marketValue.minus(position.quantity.times(position.averageCost)),
    };
  }

  /** Values at the latest observation on or before `date` */
  valueAt(position: Position, date: CalendarDate): ValuedPosition {
    if (position.quantity.isZero()) {
      return this.value(position, undefined, date);
    }
    return this.value(position, this.feed.priceOnOrBefore(position.ticker, date), date);
  }
}
