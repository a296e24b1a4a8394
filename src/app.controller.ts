import { Controller, Get } from '@nestjs/common';
import { HealthResponse } from './common/interfaces/health.interface';
import { TransactionStoreService } from './ledger/transaction-store.service';
import { MarketDataService } from './market-data/market-data.service';

@Controller()
export class AppController {
  constructor(
    private readonly ledger: TransactionStoreService,
    private readonly marketData: MarketDataService,
  ) {}

  /**
   * Health check for load balancers and monitoring.
   *
   * GET /health
   */
  @Get('health')
  getHealth(): HealthResponse {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      service: 'portfolio-valuation-engine',
      transactions: this.ledger.getTransactionCount(),
      pricedTickers: this.marketData.getAvailableTickers().length,
      marketDataUpdatedAt: this.marketData.getLastUpdateTime().toISOString(),
    };
  }

  /**
   * API root - returns service info and available endpoints.
   *
   * GET /
   */
  @Get()
  getRoot() {
    return {
      message: 'Portfolio Valuation API',
      version: '1.0.0',
      endpoints: {
        health: '/health',
        transactions: '/portfolio/transactions',
        positions: '/portfolio/positions',
        pnl: '/portfolio/pnl',
        weights: '/portfolio/weights',
        history: '/portfolio/history',
        prices: '/market-data/prices',
        tickers: '/market-data/tickers',
        fxRates: '/market-data/fx-rates',
      },
    };
  }
}
