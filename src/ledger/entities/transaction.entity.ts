import Decimal from 'decimal.js';

export enum TransactionType {
  BUY = 'BUY',
  SELL = 'SELL',
  DIVIDEND = 'DIVIDEND',
  FEE = 'FEE',
}

// Ledger entry with Decimal precision for financial values.
// Immutable once recorded; the engine only reads these.
export interface Transaction {
  readonly id: string;                 // idempotency key
  readonly ticker: string;
  readonly type: TransactionType;
  readonly quantity: Decimal;          // units; 1 for a lump-sum DIVIDEND/FEE
  readonly price: Decimal;             // per unit, in `currency`
  readonly currency: string;
  readonly timestamp: Date;
  readonly note?: string;
  readonly recordedAt?: Date;
}

/** Ascending by timestamp, ties broken by id. */
export function compareTransactions(a: Transaction, b: Transaction): number {
  const byTime = a.timestamp.getTime() - b.timestamp.getTime();
  if (byTime !== 0) {
    return byTime;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}
