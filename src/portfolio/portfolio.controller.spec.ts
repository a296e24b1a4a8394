import 'reflect-metadata';
import { NotFoundException } from '@nestjs/common';
import { ROUTE_ARGS_METADATA } from '@nestjs/common/constants';
import { Test, TestingModule } from '@nestjs/testing';
import { PortfolioController } from './portfolio.controller';
import { PortfolioService } from './portfolio.service';
import { PortfolioQueryService } from './portfolio-query.service';
import { PortfolioSnapshotService } from './portfolio-snapshot.service';
import { LedgerModule } from '../ledger/ledger.module';
import { ValuationModule } from '../valuation/valuation.module';
import { MarketDataService } from '../market-data/market-data.service';
import { PortfolioConfig, portfolioConfig } from '../config/configuration';
import { CreateTransactionDto } from '../ledger/dto/create-transaction.dto';
import { TransactionType } from '../ledger/entities/transaction.entity';
import { InsufficientPositionError } from '../common/errors/portfolio-engine.errors';
import { ParseCurrencyPipe } from '../common/pipes/parse-currency.pipe';

describe('PortfolioController', () => {
  let controller: PortfolioController;
  let service: PortfolioService;
  let marketData: MarketDataService;
  let idCounter = 1;

  const testConfig: PortfolioConfig = { baseCurrency: 'USD', maxHistoryDays: 366 };

  const createTestTransactionDto = (overrides: Partial<CreateTransactionDto>): CreateTransactionDto => {
    return {
      id: `tx-${idCounter++}`,
      ticker: 'AAPL',
      type: TransactionType.BUY,
      quantity: 1,
      price: 100,
      currency: 'USD',
      timestamp: '2024-01-10T15:00:00Z',
      ...overrides,
    };
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      imports: [LedgerModule, ValuationModule],
      controllers: [PortfolioController],
      providers: [
        PortfolioSnapshotService,
        PortfolioService,
        PortfolioQueryService,
        { provide: portfolioConfig.KEY, useValue: testConfig },
      ],
    }).compile();

    controller = module.get<PortfolioController>(PortfolioController);
    service = module.get<PortfolioService>(PortfolioService);
    marketData = module.get<MarketDataService>(MarketDataService);
    idCounter = 1;

    marketData.upsertPrices([
      { ticker: 'AAPL', date: '2024-01-10', close: 110, currency: 'USD' },
      { ticker: 'MSFT', date: '2024-01-10', close: 300, currency: 'USD' },
    ]);
  });

  afterEach(() => {
    service.clearAll();
    marketData.clearAll();
  });

  describe('addTransaction', () => {
    it('should record a transaction and return proper response', () => {
      const result = controller.addTransaction(createTestTransactionDto({ quantity: 2, price: 100.5 }));

      expect(result.id).toBe('tx-1');
      expect(result.ticker).toBe('AAPL');
      expect(result.type).toBe(TransactionType.BUY);
      expect(result.quantity).toBe(2);
      expect(result.price).toBe(100.5);
      expect(result.timestamp).toBe('2024-01-10T15:00:00.000Z');
      expect(result.duplicate).toBe(false);
      expect(result.message).toBe('Transaction recorded successfully');
    });

    it('should return existing transaction for duplicate id', () => {
      const dto = createTestTransactionDto({ id: 'fixed-id' });

      const first = controller.addTransaction(dto);
      const second = controller.addTransaction(dto);

      expect(second.id).toBe(first.id);
      expect(second.duplicate).toBe(true);
      expect(second.message).toBe('Transaction already recorded (idempotent)');
    });

    it('should propagate engine errors for an oversized sell', () => {
      expect(() =>
        controller.addTransaction(createTestTransactionDto({ type: TransactionType.SELL, quantity: 5 })),
      ).toThrow(InsufficientPositionError);
    });
  });

  describe('importTransactions', () => {
    it('should report counts and touched tickers', () => {
      const result = controller.importTransactions({
        transactions: [
          createTestTransactionDto({ ticker: 'AAPL' }),
          createTestTransactionDto({ ticker: 'MSFT' }),
          createTestTransactionDto({ id: 'tx-1', ticker: 'AAPL' }),
        ],
      });

      expect(result).toEqual({ imported: 2, duplicates: 1, tickers: ['AAPL', 'MSFT'] });
    });
  });

  describe('getAllTransactions', () => {
    it('should return all transactions or those of one ticker', () => {
      controller.addTransaction(createTestTransactionDto({ ticker: 'AAPL' }));
      controller.addTransaction(createTestTransactionDto({ ticker: 'MSFT' }));

      expect(controller.getAllTransactions()).toHaveLength(2);
      expect(controller.getAllTransactions(' msft ').map((transaction) => transaction.ticker)).toEqual(['MSFT']);
    });
  });

  describe('getPositions', () => {
    it('should parse the ticker list', () => {
      controller.addTransaction(createTestTransactionDto({ ticker: 'AAPL', quantity: 2 }));
      controller.addTransaction(createTestTransactionDto({ ticker: 'MSFT', quantity: 1 }));

      const result = controller.getPositions('aapl, msft', '2024-01-31');

      expect(result.positions.map((position) => position.ticker)).toEqual(['AAPL', 'MSFT']);
      expect(result.totalValue).toBe(520);
      expect(controller.getPositions('msft', '2024-01-31').totalValue).toBe(300);
    });
  });

  describe('getPnl', () => {
    it('should return realized and unrealized totals', () => {
      controller.addTransaction(createTestTransactionDto({ quantity: 2, price: 100 }));
      controller.addTransaction(
        createTestTransactionDto({
          type: TransactionType.SELL,
          quantity: 1,
          price: 120,
          timestamp: '2024-01-11T15:00:00Z',
        }),
      );

      const pnl = controller.getPnl(undefined, '2024-01-31');

      expect(pnl.totalRealizedPnl).toBe(20);
      expect(pnl.totalUnrealizedPnl).toBe(10);
      expect(pnl.netPnl).toBe(30);
    });
  });

  describe('getWeightsHistory', () => {
    it('should return daily weights over the range', () => {
      controller.addTransaction(createTestTransactionDto({ ticker: 'AAPL', quantity: 3 }));
      controller.addTransaction(createTestTransactionDto({ ticker: 'MSFT', quantity: 1 }));

      const result = controller.getWeightsHistory('2024-01-10', '2024-01-11');

      expect(result.from).toBe('2024-01-10');
      expect(result.to).toBe('2024-01-11');
      expect(result.tickers).toEqual(['AAPL', 'MSFT']);
      expect(result.rows.map((row) => row.totalValue)).toEqual([630, 630]);
      expect(result.rows[1].weights.map((weight) => weight.weight)).toEqual([0.52380952, 0.47619048]);
    });
  });

  describe('snapshots', () => {
    it('should 404 before any history rebuild', () => {
      expect(() => controller.getHistorySnapshot()).toThrow(NotFoundException);
    });

    it('should serve the last rebuilt history', () => {
      controller.addTransaction(createTestTransactionDto({ quantity: 1 }));

      const rebuilt = controller.rebuildHistory('2024-01-10', '2024-01-11');
      const snapshot = controller.getHistorySnapshot();

      expect(rebuilt.rows).toBe(2);
      expect(rebuilt.status).toBe('ok');
      expect(snapshot.from).toBe('2024-01-10');
      expect(snapshot.to).toBe('2024-01-11');
      expect(snapshot.history.map((point) => point.totalValue)).toEqual([110, 110]);
      expect(snapshot.computedAt).toBe(rebuilt.computedAt);
    });

    it('should 404 before any positions rebuild and serve the last one after', () => {
      expect(() => controller.getPositionsSnapshot()).toThrow(NotFoundException);

      controller.addTransaction(createTestTransactionDto({ quantity: 3 }));
      const rebuilt = controller.rebuildPositions('2024-01-31');

      expect(rebuilt.tickers).toBe(1);
      expect(controller.getPositionsSnapshot().positions[0].marketValue).toBe(330);
    });
  });

  describe('currency parameters', () => {
    const currencyPipesOf = (handler: keyof PortfolioController): unknown[] => {
      const args: Record<string, { data?: unknown; pipes?: unknown[] }> =
        Reflect.getMetadata(ROUTE_ARGS_METADATA, PortfolioController, handler) ?? {};
      return Object.values(args)
        .filter((arg) => arg.data === 'currency')
        .flatMap((arg) => arg.pipes ?? []);
    };

    it('should validate the currency of every reporting route', () => {
      const handlers: (keyof PortfolioController)[] = [
        'getPositions',
        'getPnl',
        'getWeights',
        'getWeightsHistory',
        'getHistory',
        'rebuildHistory',
        'rebuildPositions',
      ];

      for (const handler of handlers) {
        expect(currencyPipesOf(handler)).toEqual([ParseCurrencyPipe]);
      }
    });
  });
});
