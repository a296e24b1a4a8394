import Decimal from 'decimal.js';
import { CalendarDate } from '../../common/utils/calendar-date.util';

// Daily bar for an instrument, quoted in `currency`.
// One per (ticker, date) - later writes replace earlier ones.
export interface PriceObservation {
  readonly ticker: string;
  readonly date: CalendarDate;
  readonly open: Decimal;
  readonly high: Decimal;
  readonly low: Decimal;
  readonly close: Decimal;
  readonly currency: string;
  readonly volume?: number;
}
