import { Injectable } from '@nestjs/common';
import Decimal from 'decimal.js';
import {
  InsufficientPositionError,
  MalformedTransactionError,
} from '../common/errors/portfolio-engine.errors';
import { toCalendarDate } from '../common/utils/calendar-date.util';
import {
  Transaction,
  TransactionType,
  compareTransactions,
} from '../ledger/entities/transaction.entity';
import { Position, emptyPosition } from './entities/position.entity';
import { FxNormalizerService } from './fx-normalizer.service';

// Folds ledger entries into positions with a running average cost basis.
// Every amount is converted to the reporting currency at the entry's own date.
@Injectable()
export class PositionAggregatorService {
  constructor(private readonly fxNormalizer: FxNormalizerService) {}

  /**
   * Folds one ticker's history in ledger order.
   * Throws on the first entry that cannot be applied; no partial result.
   */
  aggregate(ticker: string, transactions: Transaction[], baseCurrency: string): Position {
    return [...transactions]
      .sort(compareTransactions)
      .reduce(
        (position, transaction) => this.apply(position, transaction, baseCurrency),
        emptyPosition(ticker, baseCurrency),
      );
  }

  /** Folds a mixed ledger into one position per ticker, in first-seen order */
  aggregateAll(transactions: Transaction[], baseCurrency: string): Map<string, Position> {
    const positions = new Map<string, Position>();
    for (const transaction of [...transactions].sort(compareTransactions)) {
      const current = positions.get(transaction.ticker) ?? emptyPosition(transaction.ticker, baseCurrency);
      positions.set(transaction.ticker, this.apply(current, transaction, baseCurrency));
    }
    return positions;
  }

  /**
   * Checks shape and quantities of a ticker's ledger without touching prices or FX,
   * so entries can be accepted before market data for their dates arrives.
   *
   * @throws MalformedTransactionError, InsufficientPositionError
   */
  validateLedger(ticker: string, transactions: Transaction[]): void {
    let position = emptyPosition(ticker, '');
    for (const transaction of [...transactions].sort(compareTransactions)) {
      this.assertWellFormed(position, transaction);
      if (transaction.type === TransactionType.BUY) {
        position = { ...position, quantity: position.quantity.plus(transaction.quantity) };
      } else if (transaction.type === TransactionType.SELL) {
        this.assertCovered(position, transaction);
        position = { ...position, quantity: position.quantity.minus(transaction.quantity) };
      }
    }
  }

  /**
   * Applies a single entry and returns the next position.
   * The input position is never modified, so a failed apply leaves it as it was.
   */
  apply(position: Position, transaction: Transaction, baseCurrency: string): Position {
    this.assertWellFormed(position, transaction);
    if (transaction.type === TransactionType.SELL) {
      this.assertCovered(position, transaction);
    }

    const date = toCalendarDate(transaction.timestamp);
    const unitPrice = this.fxNormalizer.convert(transaction.price, transaction.currency, baseCurrency, date);
    const next = {
      transactionCount: position.transactionCount + 1,
      lastTransactionAt: transaction.timestamp,
    };

    switch (transaction.type) {
      case TransactionType.BUY:
        return { ...position, ...next, ...this.buy(position, transaction.quantity, unitPrice) };
      case TransactionType.SELL:
        return { ...position, ...next, ...this.sell(position, transaction, unitPrice) };
      case TransactionType.DIVIDEND:
        return {
          ...position,
          ...next,
          realizedPnl: position.realizedPnl.plus(transaction.quantity.times(unitPrice)),
        };
      case TransactionType.FEE:
        return {
          ...position,
          ...next,
          realizedPnl: position.realizedPnl.minus(transaction.quantity.times(unitPrice)),
        };
    }
  }

  private buy(
    position: Position,
    quantity: Decimal,
    unitPrice: Decimal,
  ): Pick<Position, 'quantity' | 'averageCost' | 'grossInvested'> {
    const cost = quantity.times(unitPrice);
    const newQuantity = position.quantity.plus(quantity);
    const totalCost = position.quantity.times(position.averageCost).plus(cost);

    return {
      quantity: newQuantity,
      averageCost: totalCost.dividedBy(newQuantity),
      grossInvested: position.grossInvested.plus(cost),
    };
  }

  // Average cost is untouched by a sell; it only resets once the position is flat.
  // Cover is checked in apply, before any FX lookup.
  private sell(
    position: Position,
    transaction: Transaction,
    unitPrice: Decimal,
  ): Pick<Position, 'quantity' | 'averageCost' | 'realizedPnl' | 'grossWithdrawn'> {
    const newQuantity = position.quantity.minus(transaction.quantity);
    return {
      quantity: newQuantity,
      averageCost: newQuantity.isZero() ? new Decimal(0) : position.averageCost,
      realizedPnl: position.realizedPnl.plus(unitPrice.minus(position.averageCost).times(transaction.quantity)),
      grossWithdrawn: position.grossWithdrawn.plus(transaction.quantity.times(unitPrice)),
    };
  }

  private assertCovered(position: Position, transaction: Transaction): void {
    if (position.quantity.lessThan(transaction.quantity)) {
      throw new InsufficientPositionError(
        transaction.ticker,
        position.quantity.toString(),
        transaction.quantity.toString(),
        transaction.id,
      );
    }
  }

  private assertWellFormed(position: Position, transaction: Transaction): void {
    const fail = (reason: string): never => {
      throw new MalformedTransactionError(transaction.id, reason);
    };

    if (!transaction.ticker) {
      fail('ticker is empty');
    }
    if (transaction.ticker !== position.ticker) {
      fail(`ticker ${transaction.ticker} does not belong to position ${position.ticker}`);
    }
    if (!transaction.currency) {
      fail('currency is empty');
    }
    if (!Object.values(TransactionType).includes(transaction.type)) {
      fail(`unknown type ${String(transaction.type)}`);
    }
    if (Number.isNaN(transaction.timestamp.getTime())) {
      fail('timestamp is invalid');
    }
    if (!transaction.quantity.isFinite() || transaction.quantity.lessThanOrEqualTo(0)) {
      fail(`quantity must be positive, got ${transaction.quantity.toString()}`);
    }
    if (!transaction.price.isFinite() || transaction.price.lessThanOrEqualTo(0)) {
      fail(`price must be positive, got ${transaction.price.toString()}`);
    }
  }
}
