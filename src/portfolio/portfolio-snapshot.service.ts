import { Injectable } from '@nestjs/common';
import { CalendarDate } from '../common/utils/calendar-date.util';
import { ValuedPosition } from '../valuation/entities/position.entity';
import { DateRange, PortfolioHistoryPoint } from '../valuation/entities/portfolio-history-point.entity';

export interface PositionsSnapshot {
  asOf: CalendarDate;
  currency: string;
  positions: ValuedPosition[];
  computedAt: Date;
}

export interface HistorySnapshot {
  currency: string;
  range: DateRange | null;
  points: PortfolioHistoryPoint[];
  computedAt: Date;
}

// Write-through cache for computed results.
// Queries always recompute from the ledger; this only serves the snapshot endpoints.
@Injectable()
export class PortfolioSnapshotService {
  private positionsSnapshot?: PositionsSnapshot;
  private historySnapshot?: HistorySnapshot;

  /** Replaces the stored positions snapshot */
  savePositions(asOf: CalendarDate, currency: string, positions: ValuedPosition[]): PositionsSnapshot {
    this.positionsSnapshot = { asOf, currency, positions: [...positions], computedAt: new Date() };
    return this.positionsSnapshot;
  }

  getPositionsSnapshot(): PositionsSnapshot | undefined {
    return this.positionsSnapshot;
  }

  /** Replaces the stored history - rebuilds are full, never appended */
  saveHistory(currency: string, range: DateRange | null, points: PortfolioHistoryPoint[]): HistorySnapshot {
    this.historySnapshot = { currency, range, points: [...points], computedAt: new Date() };
    return this.historySnapshot;
  }

  getHistorySnapshot(): HistorySnapshot | undefined {
    return this.historySnapshot;
  }

  /** Nukes all storage - test harness only */
  clearAllData(): void {
    this.positionsSnapshot = undefined;
    this.historySnapshot = undefined;
  }
}
