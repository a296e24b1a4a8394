import { CalendarDate } from '../utils/calendar-date.util';

export type PortfolioEngineErrorCode =
  | 'RATE_UNAVAILABLE'
  | 'PRICE_UNAVAILABLE'
  | 'INSUFFICIENT_POSITION'
  | 'MALFORMED_TRANSACTION';

// Typed failures raised by the valuation engine.
// Never defaulted or retried inside the engine - callers decide.
export abstract class PortfolioEngineError extends Error {
  abstract readonly code: PortfolioEngineErrorCode;

  protected constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** No FX rate on or before the date for the pair, in either direction */
export class RateUnavailableError extends PortfolioEngineError {
  readonly code = 'RATE_UNAVAILABLE';

  constructor(
    readonly fromCurrency: string,
    readonly toCurrency: string,
    readonly date: CalendarDate,
  ) {
    super(`No FX rate ${fromCurrency}->${toCurrency} on or before ${date}`);
  }
}

/** No price on or before the date for a ticker that is still held */
export class PriceUnavailableError extends PortfolioEngineError {
  readonly code = 'PRICE_UNAVAILABLE';

  constructor(
    readonly ticker: string,
    readonly date: CalendarDate,
  ) {
    super(`No price for ${ticker} on or before ${date}`);
  }
}

/** SELL larger than the tracked quantity - short positions are not supported */
export class InsufficientPositionError extends PortfolioEngineError {
  readonly code = 'INSUFFICIENT_POSITION';

  constructor(
    readonly ticker: string,
    readonly available: string,
    readonly requested: string,
    readonly transactionId: string,
  ) {
    super(
      `Insufficient quantity for ${ticker}. Available: ${available}, Requested: ${requested} (transaction ${transactionId})`,
    );
  }
}

export class MalformedTransactionError extends PortfolioEngineError {
  readonly code = 'MALFORMED_TRANSACTION';

  constructor(
    readonly transactionId: string,
    readonly reason: string,
  ) {
    super(`Malformed transaction ${transactionId}: ${reason}`);
  }
}
