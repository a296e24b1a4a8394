import { Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { CalendarDate, addDays, eachDay, toCalendarDate } from '../common/utils/calendar-date.util';
import { sum } from '../common/utils/decimal.util';
import { Transaction, compareTransactions } from '../ledger/entities/transaction.entity';
import { Position, ValuedPosition, emptyPosition, isOpen } from './entities/position.entity';
import { DateRange, HoldingBreakdown, PortfolioHistoryPoint } from './entities/portfolio-history-point.entity';
import { PositionAggregatorService } from './position-aggregator.service';
import { ValuationService } from './valuation.service';

/**
 * Replays the ledger day by day and values the book at each day's close.
 *
 * Positions are advanced incrementally: entries dated before the range seed
 * the book, then each day applies only its own entries. Prices and FX carry
 * forward from the latest observation on or before the day.
 *
 * Leading days on which nothing has been held yet are skipped; once a holding
 * exists every day in the range gets a point, including fully closed days.
 */
@Injectable()
export class HistoryBuilderService {
  private readonly logger = new Logger(HistoryBuilderService.name);

  constructor(
    private readonly aggregator: PositionAggregatorService,
    private readonly valuation: ValuationService,
  ) {}

  buildHistory(transactions: Transaction[], range: DateRange, baseCurrency: string): PortfolioHistoryPoint[] {
    if (range.from > range.to) {
      throw new RangeError(`Invalid range: ${range.from} is after ${range.to}`);
    }

    const ledger = [...transactions].sort(compareTransactions);
    const positions = new Map<string, Position>();
    const points: PortfolioHistoryPoint[] = [];
    let cursor = 0;
    let hasHeld = false;

    const applyThrough = (lastDate: CalendarDate): void => {
      while (cursor < ledger.length && toCalendarDate(ledger[cursor].timestamp) <= lastDate) {
        const transaction = ledger[cursor];
        const current = positions.get(transaction.ticker) ?? emptyPosition(transaction.ticker, baseCurrency);
        positions.set(transaction.ticker, this.aggregator.apply(current, transaction, baseCurrency));
        cursor++;
      }
    };

    // seed: everything strictly before the first day
    applyThrough(addDays(range.from, -1));

    for (const date of eachDay(range.from, range.to)) {
      applyThrough(date);

      const held = [...positions.values()].filter(isOpen);
      hasHeld = hasHeld || held.length > 0;
      if (!hasHeld) {
        continue;
      }

      points.push(this.pointFor(date, positions, held));
    }

    this.logger.debug(
      `Built ${points.length} history points for ${range.from}..${range.to} from ${ledger.length} transactions`,
    );
    return points;
  }

  // Each held ticker is valued on its own; totals are summed once all are done.
  private pointFor(date: CalendarDate, positions: Map<string, Position>, held: Position[]): PortfolioHistoryPoint {
    const valued: ValuedPosition[] = held.map((position) => this.valuation.valueAt(position, date));
    const all = [...positions.values()];

    const breakdown: HoldingBreakdown[] = valued.map((position) => ({
      ticker: position.ticker,
      quantity: position.quantity,
      price: position.marketPrice ?? new Decimal(0),
      marketValue: position.marketValue,
    }));

    return {
      date,
      totalValue: sum(valued.map((position) => position.marketValue)),
      netInvested: sum(all.map((position) => position.grossInvested.minus(position.grossWithdrawn))),
      realizedPnl: sum(all.map((position) => position.realizedPnl)),
      unrealizedPnl: sum(valued.map((position) => position.unrealizedPnl)),
      breakdown,
    };
  }
}
