import { Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { PortfolioEngineError } from '../common/errors/portfolio-engine.errors';
import { CalendarDate } from '../common/utils/calendar-date.util';
import { toDecimal } from '../common/utils/decimal.util';
import { CreateTransactionDto } from '../ledger/dto/create-transaction.dto';
import { Transaction } from '../ledger/entities/transaction.entity';
import { TransactionStoreService } from '../ledger/transaction-store.service';
import { PositionAggregatorService } from '../valuation/position-aggregator.service';
import { HistorySnapshot, PortfolioSnapshotService, PositionsSnapshot } from './portfolio-snapshot.service';
import { PortfolioQueryService } from './portfolio-query.service';

export interface ImportResult {
  imported: Transaction[];
  duplicates: number;
}

// Ledger writes and snapshot rebuilds.
// A write is accepted only if the ticker's whole ledger still folds cleanly.
@Injectable()
export class PortfolioService {
  private readonly logger = new Logger(PortfolioService.name);

  constructor(
    private readonly ledger: TransactionStoreService,
    private readonly aggregator: PositionAggregatorService,
    private readonly queryService: PortfolioQueryService,
    private readonly snapshots: PortfolioSnapshotService,
  ) {}

  /**
   * Records a transaction after replaying its ticker's ledger with it.
   * Idempotent - a known id returns the existing record.
   *
   * @throws InsufficientPositionError, MalformedTransactionError
   */
  recordTransaction(dto: CreateTransactionDto): Transaction {
    const existing = dto.id ? this.ledger.findById(dto.id) : undefined;
    if (existing) {
      return existing;
    }

    const transaction = this.toTransaction(dto);
    this.assertLedgerFolds([transaction]);
    this.ledger.record(transaction);

    this.logger.log(
      `Recorded ${transaction.type} ${transaction.quantity.toString()} ${transaction.ticker} @ ${transaction.price.toString()} ${transaction.currency} (${transaction.id})`,
    );
    return transaction;
  }

  /**
   * Imports a batch all-or-nothing: every touched ticker is replayed with the
   * new entries before anything is stored. Known ids, and repeats within the
   * batch, are skipped and counted.
   */
  importTransactions(dtos: CreateTransactionDto[]): ImportResult {
    const seen = new Set<string>();
    const fresh: Transaction[] = [];
    let duplicates = 0;

    for (const dto of dtos) {
      if (dto.id && (seen.has(dto.id) || this.ledger.findById(dto.id))) {
        duplicates++;
        continue;
      }
      const transaction = this.toTransaction(dto);
      seen.add(transaction.id);
      fresh.push(transaction);
    }

    this.assertLedgerFolds(fresh);
    const imported = this.ledger.recordMany(fresh);

    this.logger.log(
      `Imported ${imported.length} transactions (${duplicates} duplicates skipped), ledger holds ${this.ledger.getTransactionCount()}`,
    );
    return { imported, duplicates };
  }

  /** Values every ticker as of `asOf` and stores the result */
  rebuildPositions(asOf?: CalendarDate, currency?: string): PositionsSnapshot {
    const startedAt = Date.now();
    const valued = this.queryService.valuePositions({ asOf, currency });
    const snapshot = this.snapshots.savePositions(valued.asOf, valued.currency, valued.positions);

    this.logger.log(
      `Rebuilt positions snapshot as of ${snapshot.asOf}: ${snapshot.positions.length} tickers in ${Date.now() - startedAt}ms`,
    );
    return snapshot;
  }

  /** Recomputes the full history and replaces the stored one */
  rebuildHistory(from?: CalendarDate, to?: CalendarDate, currency?: string): HistorySnapshot {
    const startedAt = Date.now();
    const range = this.queryService.resolveRange(from, to);
    const points = this.queryService.computeHistory(range, currency);
    const snapshot = this.snapshots.saveHistory(this.queryService.resolveCurrency(currency), range, points);

    this.logger.log(`Rebuilt portfolio history: ${points.length} points in ${Date.now() - startedAt}ms`);
    return snapshot;
  }

  getPositionsSnapshot(): PositionsSnapshot | undefined {
    return this.snapshots.getPositionsSnapshot();
  }

  getHistorySnapshot(): HistorySnapshot | undefined {
    return this.snapshots.getHistorySnapshot();
  }

  /** Clears ledger and snapshots - test harness only */
  clearAll(): void {
    this.ledger.clearAllData();
    this.snapshots.clearAllData();
  }

  private toTransaction(dto: CreateTransactionDto): Transaction {
    return {
      id: dto.id ?? uuidv4(),
      ticker: dto.ticker.toUpperCase(),
      type: dto.type,
      quantity: toDecimal(dto.quantity),
      price: toDecimal(dto.price),
      currency: dto.currency.toUpperCase(),
      timestamp: new Date(dto.timestamp),
      note: dto.note,
      recordedAt: new Date(),
    };
  }

  // Replays each touched ticker with the candidates merged in; throws on the first failure.
  private assertLedgerFolds(candidates: Transaction[]): void {
    const tickers = new Set(candidates.map((transaction) => transaction.ticker));

    for (const ticker of tickers) {
      const merged = [
        ...this.ledger.listTransactions(ticker),
        ...candidates.filter((transaction) => transaction.ticker === ticker),
      ];
      try {
        this.aggregator.validateLedger(ticker, merged);
      } catch (error) {
        if (error instanceof PortfolioEngineError) {
          this.logger.warn(`Rejected ${candidates.length} transaction(s) for ${ticker}: ${error.message}`);
        }
        throw error;
      }
    }
  }
}
