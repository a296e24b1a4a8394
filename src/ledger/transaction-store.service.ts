import { Injectable } from '@nestjs/common';
import { Transaction, compareTransactions } from './entities/transaction.entity';
import { TransactionStore } from './transaction-store.interface';

// In-memory append-only ledger.
// Entries kept in ledger order; id index for idempotency.
@Injectable()
export class TransactionStoreService implements TransactionStore {
  private transactions: Transaction[] = [];
  private idIndex: Map<string, Transaction> = new Map();

  /**
   * Appends an entry at its chronological slot.
   * Returns the already stored entry when the id is known.
   */
  record(transaction: Transaction): Transaction {
    const existing = this.idIndex.get(transaction.id);
    if (existing) {
      return existing;
    }

    this.transactions.splice(this.insertionIndex(transaction), 0, transaction);
    this.idIndex.set(transaction.id, transaction);
    return transaction;
  }

  recordMany(transactions: Transaction[]): Transaction[] {
    return transactions.map((transaction) => this.record(transaction));
  }

  findById(id: string): Transaction | undefined {
    return this.idIndex.get(id);
  }

  listTransactions(ticker?: string, before?: Date): Transaction[] {
    return this.transactions.filter(
      (transaction) =>
        (ticker === undefined || transaction.ticker === ticker) &&
        (before === undefined || transaction.timestamp.getTime() < before.getTime()),
    );
  }

  getTransactionCount(): number {
    return this.transactions.length;
  }

  /** Nukes all storage - test harness only */
  clearAllData(): void {
    this.transactions = [];
    this.idIndex.clear();
  }

  // first slot whose entry sorts after the new one
  private insertionIndex(transaction: Transaction): number {
    let low = 0;
    let high = this.transactions.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      if (compareTransactions(this.transactions[mid], transaction) <= 0) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    return low;
  }
}
