import { Transaction } from './entities/transaction.entity';

export const TRANSACTION_STORE = Symbol('TRANSACTION_STORE');

// Append-only ledger queried by the engine.
export interface TransactionStore {
  /** Ascending by timestamp (id tiebreak); `before` is exclusive */
  listTransactions(ticker?: string, before?: Date): Transaction[];

  findById(id: string): Transaction | undefined;
}
