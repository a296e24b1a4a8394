import { Transaction } from '../entities/transaction.entity';
import { toNumber } from '../../common/utils/decimal.util';

export interface TransactionDto {
  id: string;
  ticker: string;
  type: string;
  quantity: number;
  price: number;
  currency: string;
  timestamp: string;
  note?: string;
  recordedAt?: string;
}

// Response after recording a transaction
export interface TransactionResponseDto extends TransactionDto {
  message: string;
  duplicate: boolean;             // true if id was already recorded
}

export interface ImportTransactionsResponseDto {
  imported: number;
  duplicates: number;
  tickers: string[];              // tickers touched by the import
}

export function toTransactionDto(transaction: Transaction): TransactionDto {
  return {
    id: transaction.id,
    ticker: transaction.ticker,
    type: transaction.type,
    quantity: toNumber(transaction.quantity),
    price: toNumber(transaction.price),
    currency: transaction.currency,
    timestamp: transaction.timestamp.toISOString(),
    note: transaction.note,
    recordedAt: transaction.recordedAt?.toISOString(),
  };
}
