import Decimal from 'decimal.js';
import { CalendarDate } from '../../common/utils/calendar-date.util';

export interface HoldingBreakdown {
  readonly ticker: string;
  readonly quantity: Decimal;
  readonly price: Decimal;             // in reporting currency
  readonly marketValue: Decimal;
}

// End-of-day portfolio totals in the reporting currency.
export interface PortfolioHistoryPoint {
  readonly date: CalendarDate;
  readonly totalValue: Decimal;
  readonly netInvested: Decimal;       // gross invested - gross withdrawn
  readonly realizedPnl: Decimal;
  readonly unrealizedPnl: Decimal;
  readonly breakdown: HoldingBreakdown[];
}

export interface DateRange {
  readonly from: CalendarDate;
  readonly to: CalendarDate;           // inclusive
}
