import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { CreateTransactionDto } from './create-transaction.dto';
import { TransactionType } from '../entities/transaction.entity';

describe('CreateTransactionDto', () => {
  const validPayload = {
    ticker: ' aapl ',
    type: 'buy',
    quantity: 1.5,
    price: 187.25,
    currency: 'usd',
    timestamp: '2024-01-02T15:30:00Z',
  };

  const errorProperties = (payload: Record<string, unknown>): string[] =>
    validateSync(plainToInstance(CreateTransactionDto, payload)).map((error) => error.property);

  it('should normalize ticker, type and currency', () => {
    const dto = plainToInstance(CreateTransactionDto, validPayload);

    expect(validateSync(dto)).toEqual([]);
    expect(dto.ticker).toBe('AAPL');
    expect(dto.type).toBe(TransactionType.BUY);
    expect(dto.currency).toBe('USD');
  });

  it('should reject non-positive quantities and prices', () => {
    expect(errorProperties({ ...validPayload, quantity: 0, price: -1 })).toEqual(['quantity', 'price']);
  });

  it('should reject unknown types and currencies', () => {
    expect(errorProperties({ ...validPayload, type: 'SHORT', currency: 'DOLLARS' })).toEqual(['type', 'currency']);
  });

  it('should reject a timestamp that is not ISO 8601', () => {
    expect(errorProperties({ ...validPayload, timestamp: 'yesterday' })).toEqual(['timestamp']);
  });

  it('should reject a timestamp without a UTC offset', () => {
    expect(errorProperties({ ...validPayload, timestamp: '2024-01-01T00:30:00' })).toEqual(['timestamp']);
  });

  it('should accept a timestamp with an explicit offset', () => {
    expect(errorProperties({ ...validPayload, timestamp: '2024-01-01T00:30:00+01:00' })).toEqual([]);
    expect(errorProperties({ ...validPayload, timestamp: '2024-01-01T00:30:00.250Z' })).toEqual([]);
  });
});
