import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { CalendarDate } from '../common/utils/calendar-date.util';
import { DecimalInput, toDecimal } from '../common/utils/decimal.util';
import { FxRate, fxPairKey } from './entities/fx-rate.entity';
import { PriceObservation } from './entities/price-observation.entity';
import { PriceFxFeed } from './price-fx-feed.interface';

export interface PriceInput {
  ticker: string;
  date: CalendarDate;
  open?: DecimalInput;
  high?: DecimalInput;
  low?: DecimalInput;
  close: DecimalInput;
  currency: string;
  volume?: number;
}

export interface FxRateInput {
  baseCurrency: string;
  quoteCurrency: string;
  date: CalendarDate;
  rate: DecimalInput;
}

interface Dated {
  readonly date: CalendarDate;
}

// first index whose date is after `date`
function upperBound<T extends Dated>(series: T[], date: CalendarDate): number {
  let low = 0;
  let high = series.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    if (series[mid].date <= date) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  return low;
}

function lastOnOrBefore<T extends Dated>(series: T[] | undefined, date: CalendarDate): T | undefined {
  if (!series) {
    return undefined;
  }
  const index = upperBound(series, date);
  return index > 0 ? series[index - 1] : undefined;
}

// Keeps the series date-sorted; same date overwrites.
function upsertByDate<T extends Dated>(series: T[], entry: T): void {
  const index = upperBound(series, entry.date);
  if (index > 0 && series[index - 1].date === entry.date) {
    series[index - 1] = entry;
  } else {
    series.splice(index, 0, entry);
  }
}

function requirePositive(value: DecimalInput, label: string): Decimal {
  const decimal = toDecimal(value);
  if (!decimal.isFinite() || decimal.lessThanOrEqualTo(0)) {
    throw new BadRequestException(`${label} must be positive, got ${decimal.toString()}`);
  }
  return decimal;
}

/**
 * In-memory price and FX feed.
 * Populated by an external refresh job or the REST API - never by the engine.
 * Lookups are binary searches over per-key date-sorted series.
 */
@Injectable()
export class MarketDataService implements PriceFxFeed {
  private readonly logger = new Logger(MarketDataService.name);
  private prices: Map<string, PriceObservation[]> = new Map();
  private fxRates: Map<string, FxRate[]> = new Map();
  private lastUpdate: Date = new Date();

  /**
   * Stores one daily bar. Missing open/high/low default to close.
   * @throws BadRequestException if any price <= 0
   */
  upsertPrice(input: PriceInput): PriceObservation {
    const observation = this.toObservation(input);
    this.storePrice(observation);
    this.lastUpdate = new Date();
    return observation;
  }

  /**
   * Batch upsert - validates all before applying.
   * @throws BadRequestException on first invalid price
   */
  upsertPrices(inputs: PriceInput[]): PriceObservation[] {
    const observations = inputs.map((input) => this.toObservation(input));
    observations.forEach((observation) => this.storePrice(observation));
    this.lastUpdate = new Date();
    this.logger.log(`Upserted ${observations.length} price observations`);
    return observations;
  }

  /** @throws BadRequestException if rate <= 0 or the pair is degenerate */
  upsertFxRate(input: FxRateInput): FxRate {
    const baseCurrency = input.baseCurrency.toUpperCase();
    const quoteCurrency = input.quoteCurrency.toUpperCase();
    if (baseCurrency === quoteCurrency) {
      throw new BadRequestException(`FX pair needs two currencies, got ${baseCurrency}/${quoteCurrency}`);
    }

    const fxRate: FxRate = {
      baseCurrency,
      quoteCurrency,
      date: input.date,
      rate: requirePositive(input.rate, `Rate for ${baseCurrency}/${quoteCurrency}`),
    };

    const key = fxPairKey(baseCurrency, quoteCurrency);
    const series = this.fxRates.get(key) ?? [];
    upsertByDate(series, fxRate);
    this.fxRates.set(key, series);
    this.lastUpdate = new Date();
    return fxRate;
  }

  priceOnOrBefore(ticker: string, date: CalendarDate): PriceObservation | undefined {
    return lastOnOrBefore(this.prices.get(ticker), date);
  }

  fxRateOnOrBefore(baseCurrency: string, quoteCurrency: string, date: CalendarDate): FxRate | undefined {
    return lastOnOrBefore(this.fxRates.get(fxPairKey(baseCurrency, quoteCurrency)), date);
  }

  /** Ascending by date, bounds inclusive */
  listPrices(ticker: string, from?: CalendarDate, to?: CalendarDate): PriceObservation[] {
    return (this.prices.get(ticker) ?? []).filter(
      (observation) =>
        (from === undefined || observation.date >= from) && (to === undefined || observation.date <= to),
    );
  }

  listFxRates(baseCurrency: string, quoteCurrency: string): FxRate[] {
    return [...(this.fxRates.get(fxPairKey(baseCurrency, quoteCurrency)) ?? [])];
  }

  /** Returns all tickers with at least one observation */
  getAvailableTickers(): string[] {
    return Array.from(this.prices.keys());
  }

  /** Timestamp of most recent write */
  getLastUpdateTime(): Date {
    return this.lastUpdate;
  }

  /** Resets the feed - test harness only */
  clearAll(): void {
    this.prices.clear();
    this.fxRates.clear();
    this.lastUpdate = new Date();
  }

  private toObservation(input: PriceInput): PriceObservation {
    const label = `Price for ${input.ticker} on ${input.date}`;
    const close = requirePositive(input.close, label);
    return {
      ticker: input.ticker.toUpperCase(),
      date: input.date,
      open: input.open === undefined ? close : requirePositive(input.open, label),
      high: input.high === undefined ? close : requirePositive(input.high, label),
      low: input.low === undefined ? close : requirePositive(input.low, label),
      close,
      currency: input.currency.toUpperCase(),
      volume: input.volume,
    };
  }

  private storePrice(observation: PriceObservation): void {
    const series = this.prices.get(observation.ticker) ?? [];
    upsertByDate(series, observation);
    this.prices.set(observation.ticker, series);
  }
}
