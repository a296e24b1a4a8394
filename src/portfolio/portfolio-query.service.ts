import { BadRequestException, Inject, Injectable } from '@nestjs/common';
import Decimal from 'decimal.js';
import { PortfolioConfig, portfolioConfig } from '../config/configuration';
import { CalendarDate, addDays, daysBetween, toCalendarDate, today } from '../common/utils/calendar-date.util';
import { divide, sum, toMoney, toNumber } from '../common/utils/decimal.util';
import { Transaction } from '../ledger/entities/transaction.entity';
import { TRANSACTION_STORE, TransactionStore } from '../ledger/transaction-store.interface';
import { ValuedPosition, isOpen } from '../valuation/entities/position.entity';
import { DateRange, PortfolioHistoryPoint } from '../valuation/entities/portfolio-history-point.entity';
import { HistoryBuilderService } from '../valuation/history-builder.service';
import { PositionAggregatorService } from '../valuation/position-aggregator.service';
import { ValuationService } from '../valuation/valuation.service';
import { PnlResponseDto } from './dto/pnl-response.dto';
import { PortfolioResponseDto, PositionDto } from './dto/portfolio-response.dto';
import { PortfolioHistoryPointDto, PortfolioHistoryResponseDto } from './dto/history-response.dto';
import {
  PortfolioWeightsHistoryResponseDto,
  PortfolioWeightsResponseDto,
  WeightDto,
} from './dto/weights-response.dto';

export interface ValuationQuery {
  tickers?: string[];
  asOf?: CalendarDate;
  currency?: string;
}

const money = (value: Decimal): number => Number(toMoney(value));

// Read-only operations for portfolio data.
// CQRS pattern - queries separated from mutations.
// Every answer is recomputed from the ledger and the feed.
@Injectable()
export class PortfolioQueryService {
  constructor(
    @Inject(TRANSACTION_STORE) private readonly ledger: TransactionStore,
    private readonly aggregator: PositionAggregatorService,
    private readonly valuation: ValuationService,
    private readonly historyBuilder: HistoryBuilderService,
    @Inject(portfolioConfig.KEY) private readonly config: PortfolioConfig,
  ) {}

  /**
   * Every ticker with ledger activity up to `asOf` (end of day), marked to
   * market. Closed tickers are included with zero value.
   */
  valuePositions(query: ValuationQuery = {}): { asOf: CalendarDate; currency: string; positions: ValuedPosition[] } {
    const asOf = query.asOf ?? today();
    const currency = this.resolveCurrency(query.currency);
    const transactions = this.filterTickers(this.ledger.listTransactions(undefined, endOfDay(asOf)), query.tickers);

    const positions = [...this.aggregator.aggregateAll(transactions, currency).values()].map((position) =>
      this.valuation.valueAt(position, asOf),
    );
    return { asOf, currency, positions };
  }

  /**
   * Returns current holdings with unrealized P&L.
   * Excludes closed positions (quantity = 0).
   *
   * @param query - Optional ticker filter, valuation date and currency
   */
  getPositions(query: ValuationQuery = {}): PortfolioResponseDto {
    const { asOf, currency, positions } = this.valuePositions(query);
    const open = positions.filter(isOpen);

    return {
      asOf,
      currency,
      positions: open.map(toPositionDto),
      totalValue: money(sum(open.map((pos) => pos.marketValue))),
      totalCostBasis: money(sum(open.map((pos) => pos.quantity.times(pos.averageCost)))),
      totalUnrealizedPnl: money(sum(open.map((pos) => pos.unrealizedPnl))),
    };
  }

  /**
   * Realized P&L for every ticker with activity, unrealized for open ones.
   *
   * @param query - Optional ticker filter, valuation date and currency
   */
  getPnl(query: ValuationQuery = {}): PnlResponseDto {
    const { asOf, currency, positions } = this.valuePositions(query);
    const open = positions.filter(isOpen);

    const totalRealized = sum(positions.map((pos) => pos.realizedPnl));
    const totalUnrealized = sum(open.map((pos) => pos.unrealizedPnl));

    return {
      asOf,
      currency,
      realizedPnl: positions.map((pos) => ({
        ticker: pos.ticker,
        realizedPnl: toNumber(pos.realizedPnl),
        grossInvested: toNumber(pos.grossInvested),
        grossWithdrawn: toNumber(pos.grossWithdrawn),
      })),
      unrealizedPnl: open.map((pos) => ({
        ticker: pos.ticker,
        unrealizedPnl: toNumber(pos.unrealizedPnl),
        currentQuantity: toNumber(pos.quantity),
        averageCost: toNumber(pos.averageCost),
        marketPrice: toNumber(pos.marketPrice ?? new Decimal(0)),
      })),
      totalRealizedPnl: money(totalRealized),
      totalUnrealizedPnl: money(totalUnrealized),
      netPnl: money(totalRealized.plus(totalUnrealized)),
    };
  }

  /** Share of total market value per open position */
  getWeights(query: Omit<ValuationQuery, 'tickers'> = {}): PortfolioWeightsResponseDto {
    const { asOf, currency, positions } = this.valuePositions(query);
    const open = positions.filter(isOpen);
    const total = sum(open.map((pos) => pos.marketValue));

    return {
      asOf,
      currency,
      totalValue: money(total),
      weights: open.map((pos) => toWeightDto(pos.ticker, pos.marketValue, total)),
    };
  }

  /**
   * Weights for every day of the history range, one row per day.
   * `tickers` lists every ticker held on any day of the range, in first-held order.
   */
  getWeightsHistory(from?: CalendarDate, to?: CalendarDate, currency?: string): PortfolioWeightsHistoryResponseDto {
    const range = this.resolveRange(from, to);
    const points = this.computeHistory(range, currency);

    return {
      currency: this.resolveCurrency(currency),
      from: range?.from ?? null,
      to: range?.to ?? null,
      tickers: [...new Set(points.flatMap((point) => point.breakdown.map((holding) => holding.ticker)))],
      rows: points.map((point) => ({
        date: point.date,
        totalValue: money(point.totalValue),
        weights: point.breakdown.map((holding) => toWeightDto(holding.ticker, holding.marketValue, point.totalValue)),
      })),
    };
  }

  /**
   * Resolves the requested range against the ledger and the configured cap.
   * Returns null when the ledger is empty and no start was given.
   */
  resolveRange(from?: CalendarDate, to?: CalendarDate): DateRange | null {
    const end = to ?? today();
    const first = this.ledger.listTransactions()[0];
    const start = from ?? (first ? toCalendarDate(first.timestamp) : undefined);
    if (start === undefined) {
      return null;
    }

    if (start > end) {
      throw new BadRequestException(`from (${start}) must not be after to (${end})`);
    }
    const days = daysBetween(start, end) + 1;
    if (days > this.config.maxHistoryDays) {
      throw new BadRequestException(
        `Range of ${days} days exceeds the limit of ${this.config.maxHistoryDays} days`,
      );
    }
    return { from: start, to: end };
  }

  computeHistory(range: DateRange | null, currency?: string): PortfolioHistoryPoint[] {
    if (!range) {
      return [];
    }
    return this.historyBuilder.buildHistory(this.ledger.listTransactions(), range, this.resolveCurrency(currency));
  }

  /**
   * Daily portfolio value series.
   * `from` defaults to the first transaction's date, `to` to today.
   */
  getHistory(from?: CalendarDate, to?: CalendarDate, currency?: string): PortfolioHistoryResponseDto {
    const range = this.resolveRange(from, to);
    return {
      currency: this.resolveCurrency(currency),
      from: range?.from ?? null,
      to: range?.to ?? null,
      history: this.computeHistory(range, currency).map(toHistoryPointDto),
    };
  }

  /** Returns all transactions, optionally filtered by ticker */
  getAllTransactions(ticker?: string): Transaction[] {
    return this.ledger.listTransactions(ticker);
  }

  /** Finds transaction by id - used for idempotency checks */
  getTransactionById(id: string): Transaction | undefined {
    return this.ledger.findById(id);
  }

  resolveCurrency(currency?: string): string {
    return (currency ?? this.config.baseCurrency).toUpperCase();
  }

  private filterTickers(transactions: Transaction[], tickers?: string[]): Transaction[] {
    if (!tickers || tickers.length === 0) {
      return transactions;
    }
    const tickerSet = new Set(tickers);
    return transactions.filter((transaction) => tickerSet.has(transaction.ticker));
  }
}

function endOfDay(date: CalendarDate): Date {
  return new Date(`${addDays(date, 1)}T00:00:00.000Z`);
}

function toWeightDto(ticker: string, marketValue: Decimal, total: Decimal): WeightDto {
  return {
    ticker,
    marketValue: toNumber(marketValue),
    weight: total.isZero() ? 0 : toNumber(divide(marketValue, total)),
  };
}

export function toPositionDto(pos: ValuedPosition): PositionDto {
  return {
    ticker: pos.ticker,
    quantity: toNumber(pos.quantity),
    averageCost: toNumber(pos.averageCost),
    costBasis: toNumber(pos.quantity.times(pos.averageCost)),
    marketPrice: toNumber(pos.marketPrice ?? new Decimal(0)),
    priceDate: pos.priceDate ?? pos.valuationDate,
    marketValue: toNumber(pos.marketValue),
    unrealizedPnl: toNumber(pos.unrealizedPnl),
    realizedPnl: toNumber(pos.realizedPnl),
  };
}

export function toHistoryPointDto(point: PortfolioHistoryPoint): PortfolioHistoryPointDto {
  return {
    date: point.date,
    totalValue: toNumber(point.totalValue),
    netInvested: toNumber(point.netInvested),
    totalPnl: toNumber(point.realizedPnl.plus(point.unrealizedPnl)),
    realizedPnl: toNumber(point.realizedPnl),
    unrealizedPnl: toNumber(point.unrealizedPnl),
    breakdown: point.breakdown.map((holding) => ({
      ticker: holding.ticker,
      quantity: toNumber(holding.quantity),
      price: toNumber(holding.price),
      marketValue: toNumber(holding.marketValue),
    })),
  };
}
