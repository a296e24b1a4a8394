import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_FILTER } from '@nestjs/core';
import { AppController } from './app.controller';
import { PortfolioEngineExceptionFilter } from './common/filters/portfolio-engine-exception.filter';
import { appConfig, portfolioConfig } from './config/configuration';
import { validateEnv } from './config/env.validation';
import { LedgerModule } from './ledger/ledger.module';
import { MarketDataModule } from './market-data/market-data.module';
import { PortfolioModule } from './portfolio/portfolio.module';
import { ValuationModule } from './valuation/valuation.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig, portfolioConfig],
      validate: validateEnv,
    }),
    LedgerModule,
    MarketDataModule,
    ValuationModule,
    PortfolioModule,
  ],
  controllers: [AppController],
  providers: [{ provide: APP_FILTER, useClass: PortfolioEngineExceptionFilter }],
})
export class AppModule {}
