import { Inject, Injectable } from '@nestjs/common';
import Decimal from 'decimal.js';
import { RateUnavailableError } from '../common/errors/portfolio-engine.errors';
import { CalendarDate } from '../common/utils/calendar-date.util';
import { divide } from '../common/utils/decimal.util';
import { PRICE_FX_FEED, PriceFxFeed } from '../market-data/price-fx-feed.interface';

/**
 * Currency conversion over the FX feed.
 *
 * Uses the latest rate on or before the date. A stored FROM/TO pair is
 * multiplied; when only TO/FROM exists its reciprocal is used. If both
 * directions are stored the more recent observation wins, the direct pair on
 * a tie.
 */
@Injectable()
export class FxNormalizerService {
  constructor(@Inject(PRICE_FX_FEED) private readonly feed: PriceFxFeed) {}

  convert(amount: Decimal, fromCurrency: string, toCurrency: string, date: CalendarDate): Decimal {
    if (fromCurrency === toCurrency) {
      return amount;
    }
    return amount.times(this.rate(fromCurrency, toCurrency, date));
  }

  /**
   * Multiplier turning one unit of `fromCurrency` into `toCurrency`.
   * @throws RateUnavailableError if neither direction has a rate on or before `date`
   */
  rate(fromCurrency: string, toCurrency: string, date: CalendarDate): Decimal {
    if (fromCurrency === toCurrency) {
      return new Decimal(1);
    }

    const direct = this.feed.fxRateOnOrBefore(fromCurrency, toCurrency, date);
    const inverse = this.feed.fxRateOnOrBefore(toCurrency, fromCurrency, date);

    if (direct && (!inverse || direct.date >= inverse.date)) {
      return direct.rate;
    }
    if (inverse) {
      return divide(new Decimal(1), inverse.rate);
    }
    throw new RateUnavailableError(fromCurrency, toCurrency, date);
  }
}
