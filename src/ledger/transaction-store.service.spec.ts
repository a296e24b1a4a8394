import { Test, TestingModule } from '@nestjs/testing';
import Decimal from 'decimal.js';
import { TransactionStoreService } from './transaction-store.service';
import { Transaction, TransactionType } from './entities/transaction.entity';

describe('TransactionStoreService', () => {
  let service: TransactionStoreService;

  const createTransaction = (id: string, ticker: string, timestamp: string): Transaction => ({
    id,
    ticker,
    type: TransactionType.BUY,
    quantity: new Decimal(1),
    price: new Decimal(100),
    currency: 'USD',
    timestamp: new Date(timestamp),
  });

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [TransactionStoreService],
    }).compile();

    service = module.get<TransactionStoreService>(TransactionStoreService);
  });

  afterEach(() => {
    service.clearAllData();
  });

  describe('record', () => {
    it('should keep entries in timestamp order whatever the arrival order', () => {
      service.record(createTransaction('c', 'AAPL', '2024-01-03T10:00:00Z'));
      service.record(createTransaction('a', 'AAPL', '2024-01-01T10:00:00Z'));
      service.record(createTransaction('b', 'MSFT', '2024-01-02T10:00:00Z'));

      expect(service.listTransactions().map((tx) => tx.id)).toEqual(['a', 'b', 'c']);
    });

    it('should order same-timestamp entries by id', () => {
      service.record(createTransaction('tx-2', 'AAPL', '2024-01-01T10:00:00Z'));
      service.record(createTransaction('tx-1', 'AAPL', '2024-01-01T10:00:00Z'));

      expect(service.listTransactions().map((tx) => tx.id)).toEqual(['tx-1', 'tx-2']);
    });

    it('should return the stored entry for a known id', () => {
      const first = service.record(createTransaction('dup', 'AAPL', '2024-01-01T10:00:00Z'));
      const second = service.record(createTransaction('dup', 'MSFT', '2024-02-01T10:00:00Z'));

      expect(second).toBe(first);
      expect(service.getTransactionCount()).toBe(1);
      expect(service.findById('dup')?.ticker).toBe('AAPL');
    });
  });

  describe('listTransactions', () => {
    beforeEach(() => {
      service.recordMany([
        createTransaction('a', 'AAPL', '2024-01-01T10:00:00Z'),
        createTransaction('b', 'MSFT', '2024-01-02T10:00:00Z'),
        createTransaction('c', 'AAPL', '2024-01-03T10:00:00Z'),
      ]);
    });

    it('should filter by ticker', () => {
      expect(service.listTransactions('AAPL').map((tx) => tx.id)).toEqual(['a', 'c']);
      expect(service.listTransactions('NVDA')).toEqual([]);
    });

    it('should treat the cutoff as exclusive', () => {
      expect(service.listTransactions(undefined, new Date('2024-01-02T10:00:00Z')).map((tx) => tx.id)).toEqual([
        'a',
      ]);
      expect(service.listTransactions('AAPL', new Date('2024-01-04T00:00:00Z'))).toHaveLength(2);
    });
  });

  it('should return undefined for an unknown id', () => {
    expect(service.findById('missing')).toBeUndefined();
  });
});
