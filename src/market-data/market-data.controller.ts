import { BadRequestException, Body, Controller, Get, HttpCode, HttpStatus, Post, Query } from '@nestjs/common';
import { CalendarDate } from '../common/utils/calendar-date.util';
import { ParseCalendarDatePipe } from '../common/pipes/parse-calendar-date.pipe';
import { ParseCurrencyPipe } from '../common/pipes/parse-currency.pipe';
import { MarketDataService } from './market-data.service';
import { BulkUpsertPricesDto, UpsertPriceDto } from './dto/upsert-price.dto';
import { UpsertFxRateDto } from './dto/upsert-fx-rate.dto';
import {
  FxRateDto,
  PriceObservationDto,
  PriceSeriesResponseDto,
  toFxRateDto,
  toPriceObservationDto,
} from './dto/market-data-response.dto';

@Controller('market-data')
export class MarketDataController {
  constructor(private readonly marketDataService: MarketDataService) {}

  /**
   * Upserts one daily bar. Same (ticker, date) overwrites.
   *
   * POST /market-data/prices
   */
  @Post('prices')
  @HttpCode(HttpStatus.OK)
  upsertPrice(@Body() dto: UpsertPriceDto): PriceObservationDto {
    return toPriceObservationDto(this.marketDataService.upsertPrice(dto));
  }

  /**
   * Batch upsert across tickers and dates.
   *
   * POST /market-data/prices/bulk
   */
  @Post('prices/bulk')
  @HttpCode(HttpStatus.OK)
  bulkUpsertPrices(@Body() dto: BulkUpsertPricesDto) {
    const observations = this.marketDataService.upsertPrices(dto.prices);
    return {
      message: 'Market prices updated',
      upserted: observations.length,
      tickers: [...new Set(observations.map((observation) => observation.ticker))],
    };
  }

  /**
   * Price series for a ticker.
   *
   * GET /market-data/prices?ticker=AAPL&from=2024-01-01&to=2024-03-31
   */
  @Get('prices')
  @HttpCode(HttpStatus.OK)
  listPrices(
    @Query('ticker') ticker?: string,
    @Query('from', ParseCalendarDatePipe) from?: CalendarDate,
    @Query('to', ParseCalendarDatePipe) to?: CalendarDate,
  ): PriceSeriesResponseDto {
    if (!ticker) {
      throw new BadRequestException('ticker is required');
    }
    const normalized = ticker.trim().toUpperCase();
    return {
      ticker: normalized,
      prices: this.marketDataService.listPrices(normalized, from, to).map(toPriceObservationDto),
      lastUpdated: this.marketDataService.getLastUpdateTime().toISOString(),
    };
  }

  /**
   * Tickers with at least one stored price.
   *
   * GET /market-data/tickers
   */
  @Get('tickers')
  @HttpCode(HttpStatus.OK)
  getAvailableTickers() {
    return {
      tickers: this.marketDataService.getAvailableTickers(),
      lastUpdated: this.marketDataService.getLastUpdateTime().toISOString(),
    };
  }

  /**
   * POST /market-data/fx-rates
   */
  @Post('fx-rates')
  @HttpCode(HttpStatus.OK)
  upsertFxRate(@Body() dto: UpsertFxRateDto): FxRateDto {
    return toFxRateDto(this.marketDataService.upsertFxRate(dto));
  }

  /**
   * Stored series for one direction of a pair.
   *
   * GET /market-data/fx-rates?base=EUR&quote=USD
   */
  @Get('fx-rates')
  @HttpCode(HttpStatus.OK)
  listFxRates(
    @Query('base', ParseCurrencyPipe) base?: string,
    @Query('quote', ParseCurrencyPipe) quote?: string,
  ): FxRateDto[] {
    if (!base || !quote) {
      throw new BadRequestException('base and quote are required');
    }
    return this.marketDataService.listFxRates(base.toUpperCase(), quote.toUpperCase()).map(toFxRateDto);
  }
}
