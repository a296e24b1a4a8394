import { HttpStatus } from '@nestjs/common';
import { statusForEngineError } from './portfolio-engine-exception.filter';
import {
  InsufficientPositionError,
  MalformedTransactionError,
  PriceUnavailableError,
  RateUnavailableError,
} from '../errors/portfolio-engine.errors';

describe('statusForEngineError', () => {
  it('should map ledger errors to 400', () => {
    expect(statusForEngineError(new InsufficientPositionError('AAPL', '1', '2', 'tx-1'))).toBe(
      HttpStatus.BAD_REQUEST,
    );
    expect(statusForEngineError(new MalformedTransactionError('tx-1', 'quantity must be positive'))).toBe(
      HttpStatus.BAD_REQUEST,
    );
  });

  it('should map missing market data to 422', () => {
    expect(statusForEngineError(new PriceUnavailableError('AAPL', '2024-01-01'))).toBe(
      HttpStatus.UNPROCESSABLE_ENTITY,
    );
    expect(statusForEngineError(new RateUnavailableError('EUR', 'USD', '2024-01-01'))).toBe(
      HttpStatus.UNPROCESSABLE_ENTITY,
    );
  });

  it('should name errors after their class', () => {
    const error = new RateUnavailableError('EUR', 'USD', '2024-01-01');
    expect(error.name).toBe('RateUnavailableError');
    expect(error.code).toBe('RATE_UNAVAILABLE');
  });
});
