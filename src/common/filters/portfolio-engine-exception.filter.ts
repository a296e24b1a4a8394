import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import { HttpAdapterHost } from '@nestjs/core';
import { PortfolioEngineError, PortfolioEngineErrorCode } from '../errors/portfolio-engine.errors';
import { HttpExceptionResponse } from '../interfaces/http-exception.interface';

// Ledger problems map to 400, missing market data to 422.
const STATUS_BY_CODE: Record<PortfolioEngineErrorCode, HttpStatus> = {
  MALFORMED_TRANSACTION: HttpStatus.BAD_REQUEST,
  INSUFFICIENT_POSITION: HttpStatus.BAD_REQUEST,
  RATE_UNAVAILABLE: HttpStatus.UNPROCESSABLE_ENTITY,
  PRICE_UNAVAILABLE: HttpStatus.UNPROCESSABLE_ENTITY,
};

export function statusForEngineError(error: PortfolioEngineError): HttpStatus {
  return STATUS_BY_CODE[error.code];
}

@Catch(PortfolioEngineError)
export class PortfolioEngineExceptionFilter implements ExceptionFilter<PortfolioEngineError> {
  private readonly logger = new Logger(PortfolioEngineExceptionFilter.name);

  constructor(private readonly httpAdapterHost: HttpAdapterHost) {}

  catch(exception: PortfolioEngineError, host: ArgumentsHost): void {
    const { httpAdapter } = this.httpAdapterHost;
    const ctx = host.switchToHttp();
    const statusCode = statusForEngineError(exception);
    const path: string = httpAdapter.getRequestUrl(ctx.getRequest());

    this.logger.warn(`${exception.code} on ${path}: ${exception.message}`);

    const body: HttpExceptionResponse = {
      statusCode,
      message: exception.message,
      error: exception.code,
      timestamp: new Date().toISOString(),
      path,
    };

    httpAdapter.reply(ctx.getResponse(), body, statusCode);
  }
}
