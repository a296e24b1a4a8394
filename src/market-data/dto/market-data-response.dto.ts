import { FxRate } from '../entities/fx-rate.entity';
import { PriceObservation } from '../entities/price-observation.entity';
import { toNumber } from '../../common/utils/decimal.util';

export interface PriceObservationDto {
  ticker: string;
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  currency: string;
  volume?: number;
}

export interface FxRateDto {
  baseCurrency: string;
  quoteCurrency: string;
  date: string;
  rate: number;
}

// Series for a single ticker with last update timestamp
export interface PriceSeriesResponseDto {
  ticker: string;
  prices: PriceObservationDto[];
  lastUpdated: string;             // ISO timestamp
}

export function toPriceObservationDto(observation: PriceObservation): PriceObservationDto {
  return {
    ticker: observation.ticker,
    date: observation.date,
    open: toNumber(observation.open),
    high: toNumber(observation.high),
    low: toNumber(observation.low),
    close: toNumber(observation.close),
    currency: observation.currency,
    volume: observation.volume,
  };
}

export function toFxRateDto(fxRate: FxRate): FxRateDto {
  return {
    baseCurrency: fxRate.baseCurrency,
    quoteCurrency: fxRate.quoteCurrency,
    date: fxRate.date,
    rate: toNumber(fxRate.rate),
  };
}
