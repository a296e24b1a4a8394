import { Body, Controller, Get, HttpCode, HttpStatus, NotFoundException, Post, Query } from '@nestjs/common';
import { ParseCalendarDatePipe } from '../common/pipes/parse-calendar-date.pipe';
import { ParseCurrencyPipe } from '../common/pipes/parse-currency.pipe';
import { CalendarDate } from '../common/utils/calendar-date.util';
import { CreateTransactionDto } from '../ledger/dto/create-transaction.dto';
import { ImportTransactionsDto } from '../ledger/dto/import-transactions.dto';
import {
  ImportTransactionsResponseDto,
  TransactionDto,
  TransactionResponseDto,
  toTransactionDto,
} from '../ledger/dto/transaction-response.dto';
import { PortfolioService } from './portfolio.service';
import { PortfolioQueryService, toHistoryPointDto, toPositionDto } from './portfolio-query.service';
import { PortfolioResponseDto } from './dto/portfolio-response.dto';
import { PnlResponseDto } from './dto/pnl-response.dto';
import { PortfolioHistoryResponseDto } from './dto/history-response.dto';
import { PortfolioWeightsHistoryResponseDto, PortfolioWeightsResponseDto } from './dto/weights-response.dto';

function parseTickers(tickersQuery?: string): string[] | undefined {
  return tickersQuery ? tickersQuery.split(',').map((t) => t.trim().toUpperCase()).filter(Boolean) : undefined;
}

@Controller('portfolio')
export class PortfolioController {
  constructor(
    private readonly portfolioService: PortfolioService,
    private readonly queryService: PortfolioQueryService,
  ) {}

  /**
   * Records a ledger entry.
   * Idempotent - duplicate id returns 201 with existing record.
   *
   * POST /portfolio/transactions
   * @returns 201 with transaction details + duplicate flag
   */
  @Post('transactions')
  @HttpCode(HttpStatus.CREATED)
  addTransaction(@Body() dto: CreateTransactionDto): TransactionResponseDto {
    const existing = dto.id ? this.queryService.getTransactionById(dto.id) : undefined;

    if (existing) {
      return {
        ...toTransactionDto(existing),
        message: 'Transaction already recorded (idempotent)',
        duplicate: true,
      };
    }

    const transaction = this.portfolioService.recordTransaction(dto);

    return {
      ...toTransactionDto(transaction),
      message: 'Transaction recorded successfully',
      duplicate: false,
    };
  }

  /**
   * Bulk import, all-or-nothing.
   *
   * POST /portfolio/transactions/bulk
   */
  @Post('transactions/bulk')
  @HttpCode(HttpStatus.CREATED)
  importTransactions(@Body() dto: ImportTransactionsDto): ImportTransactionsResponseDto {
    const result = this.portfolioService.importTransactions(dto.transactions);
    return {
      imported: result.imported.length,
      duplicates: result.duplicates,
      tickers: [...new Set(result.imported.map((transaction) => transaction.ticker))],
    };
  }

  /**
   * Ledger, optionally filtered by ticker.
   *
   * GET /portfolio/transactions?ticker=AAPL
   */
  @Get('transactions')
  @HttpCode(HttpStatus.OK)
  getAllTransactions(@Query('ticker') ticker?: string): TransactionDto[] {
    return this.queryService.getAllTransactions(ticker?.trim().toUpperCase()).map(toTransactionDto);
  }

  /**
   * Returns current holdings with unrealized P&L.
   *
   * GET /portfolio/positions?tickers=AAPL,MSFT&asOf=2024-06-30&currency=EUR
   */
  @Get('positions')
  @HttpCode(HttpStatus.OK)
  getPositions(
    @Query('tickers') tickersQuery?: string,
    @Query('asOf', ParseCalendarDatePipe) asOf?: CalendarDate,
    @Query('currency', ParseCurrencyPipe) currency?: string,
  ): PortfolioResponseDto {
    return this.queryService.getPositions({ tickers: parseTickers(tickersQuery), asOf, currency });
  }

  /**
   * Calculates realized + unrealized P&L.
   *
   * GET /portfolio/pnl?tickers=AAPL,MSFT
   * @param tickersQuery - Comma-separated tickers or omit for all
   */
  @Get('pnl')
  @HttpCode(HttpStatus.OK)
  getPnl(
    @Query('tickers') tickersQuery?: string,
    @Query('asOf', ParseCalendarDatePipe) asOf?: CalendarDate,
    @Query('currency', ParseCurrencyPipe) currency?: string,
  ): PnlResponseDto {
    return this.queryService.getPnl({ tickers: parseTickers(tickersQuery), asOf, currency });
  }

  /**
   * GET /portfolio/weights?asOf=2024-06-30
   */
  @Get('weights')
  @HttpCode(HttpStatus.OK)
  getWeights(
    @Query('asOf', ParseCalendarDatePipe) asOf?: CalendarDate,
    @Query('currency', ParseCurrencyPipe) currency?: string,
  ): PortfolioWeightsResponseDto {
    return this.queryService.getWeights({ asOf, currency });
  }

  /**
   * Daily weights over a range.
   *
   * GET /portfolio/weights/history?from=2024-01-01&to=2024-06-30
   */
  @Get('weights/history')
  @HttpCode(HttpStatus.OK)
  getWeightsHistory(
    @Query('from', ParseCalendarDatePipe) from?: CalendarDate,
    @Query('to', ParseCalendarDatePipe) to?: CalendarDate,
    @Query('currency', ParseCurrencyPipe) currency?: string,
  ): PortfolioWeightsHistoryResponseDto {
    return this.queryService.getWeightsHistory(from, to, currency);
  }

  /**
   * Daily value series, recomputed from the ledger.
   *
   * GET /portfolio/history?from=2024-01-01&to=2024-06-30
   */
  @Get('history')
  @HttpCode(HttpStatus.OK)
  getHistory(
    @Query('from', ParseCalendarDatePipe) from?: CalendarDate,
    @Query('to', ParseCalendarDatePipe) to?: CalendarDate,
    @Query('currency', ParseCurrencyPipe) currency?: string,
  ): PortfolioHistoryResponseDto {
    return this.queryService.getHistory(from, to, currency);
  }

  /**
   * POST /portfolio/history/rebuild?from=2024-01-01
   */
  @Post('history/rebuild')
  @HttpCode(HttpStatus.OK)
  rebuildHistory(
    @Query('from', ParseCalendarDatePipe) from?: CalendarDate,
    @Query('to', ParseCalendarDatePipe) to?: CalendarDate,
    @Query('currency', ParseCurrencyPipe) currency?: string,
  ) {
    const snapshot = this.portfolioService.rebuildHistory(from, to, currency);
    return {
      status: 'ok',
      rows: snapshot.points.length,
      currency: snapshot.currency,
      computedAt: snapshot.computedAt.toISOString(),
    };
  }

  /**
   * Last stored history.
   *
   * GET /portfolio/history/snapshot
   */
  @Get('history/snapshot')
  @HttpCode(HttpStatus.OK)
  getHistorySnapshot(): PortfolioHistoryResponseDto {
    const snapshot = this.portfolioService.getHistorySnapshot();
    if (!snapshot) {
      throw new NotFoundException('No history snapshot has been built yet');
    }
    return {
      currency: snapshot.currency,
      from: snapshot.range?.from ?? null,
      to: snapshot.range?.to ?? null,
      history: snapshot.points.map(toHistoryPointDto),
      computedAt: snapshot.computedAt.toISOString(),
    };
  }

  /**
   * POST /portfolio/positions/rebuild?asOf=2024-06-30
   */
  @Post('positions/rebuild')
  @HttpCode(HttpStatus.OK)
  rebuildPositions(
    @Query('asOf', ParseCalendarDatePipe) asOf?: CalendarDate,
    @Query('currency', ParseCurrencyPipe) currency?: string,
  ) {
    const snapshot = this.portfolioService.rebuildPositions(asOf, currency);
    return {
      status: 'ok',
      asOf: snapshot.asOf,
      tickers: snapshot.positions.length,
      currency: snapshot.currency,
      computedAt: snapshot.computedAt.toISOString(),
    };
  }

  /**
   * Last stored positions, closed tickers included.
   *
   * GET /portfolio/positions/snapshot
   */
  @Get('positions/snapshot')
  @HttpCode(HttpStatus.OK)
  getPositionsSnapshot() {
    const snapshot = this.portfolioService.getPositionsSnapshot();
    if (!snapshot) {
      throw new NotFoundException('No positions snapshot has been built yet');
    }
    return {
      asOf: snapshot.asOf,
      currency: snapshot.currency,
      positions: snapshot.positions.map(toPositionDto),
      computedAt: snapshot.computedAt.toISOString(),
    };
  }
}
