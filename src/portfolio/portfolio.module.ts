import { Module } from '@nestjs/common';
import { LedgerModule } from '../ledger/ledger.module';
import { ValuationModule } from '../valuation/valuation.module';
import { PortfolioController } from './portfolio.controller';
import { PortfolioService } from './portfolio.service';
import { PortfolioQueryService } from './portfolio-query.service';
import { PortfolioSnapshotService } from './portfolio-snapshot.service';

@Module({
  imports: [LedgerModule, ValuationModule],
  controllers: [PortfolioController],
  providers: [
    PortfolioSnapshotService,
    PortfolioService,      // Mutations: record/import transactions, rebuild snapshots
    PortfolioQueryService, // Queries: positions, pnl, weights, history, transactions
  ],
})
export class PortfolioModule {}
