import Decimal from 'decimal.js';
import { CalendarDate } from '../../common/utils/calendar-date.util';

// Market convention: `rate` units of quoteCurrency per one baseCurrency.
// EUR/USD at 1.1 turns 10 EUR into 11 USD.
export interface FxRate {
  readonly baseCurrency: string;
  readonly quoteCurrency: string;
  readonly date: CalendarDate;
  readonly rate: Decimal;
}

export function fxPairKey(baseCurrency: string, quoteCurrency: string): string {
  return `${baseCurrency}/${quoteCurrency}`;
}
