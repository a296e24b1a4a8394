import Decimal from 'decimal.js';
import { CalendarDate } from '../../common/utils/calendar-date.util';

// Folded ledger state for one ticker, amounts in the reporting currency.
// Derived on demand - never the source of truth.
export interface Position {
  readonly ticker: string;
  readonly currency: string;           // reporting (base) currency
  readonly quantity: Decimal;
  readonly averageCost: Decimal;       // running weighted average per unit
  readonly realizedPnl: Decimal;       // sells, dividends, fees
  readonly grossInvested: Decimal;     // cumulative BUY cost
  readonly grossWithdrawn: Decimal;    // cumulative SELL proceeds
  readonly transactionCount: number;
  readonly lastTransactionAt?: Date;
}

// Position marked to market at `valuationDate`.
export interface ValuedPosition extends Position {
  readonly valuationDate: CalendarDate;
  readonly marketPrice?: Decimal;      // close converted to `currency`
  readonly priceDate?: CalendarDate;   // date of the observation used
  readonly marketValue: Decimal;
  readonly unrealizedPnl: Decimal;
}

export function emptyPosition(ticker: string, currency: string): Position {
  return {
    ticker,
    currency,
    quantity: new Decimal(0),
    averageCost: new Decimal(0),
    realizedPnl: new Decimal(0),
    grossInvested: new Decimal(0),
    grossWithdrawn: new Decimal(0),
    transactionCount: 0,
  };
}

export function isOpen(position: Position): boolean {
  return position.quantity.greaterThan(0);
}
