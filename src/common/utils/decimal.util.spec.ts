import Decimal from 'decimal.js';
import { divide, sum, toDecimal, toMoney, toNumber } from './decimal.util';

describe('decimal.util', () => {
  it('should add without binary floating point drift', () => {
    expect(toDecimal(0.1).plus(toDecimal(0.2)).toString()).toBe('0.3');
  });

  it('should round to 8 places for serialization', () => {
    expect(toNumber(new Decimal('1.123456789'))).toBe(1.12345679);
  });

  it('should format money with 2 places, rounding half up', () => {
    expect(toMoney(new Decimal('2.345'))).toBe('2.35');
    expect(toMoney(new Decimal(10))).toBe('10.00');
  });

  it('should sum to zero for an empty list', () => {
    expect(sum([]).toNumber()).toBe(0);
    expect(sum([new Decimal('1.5'), new Decimal('2.25')]).toString()).toBe('3.75');
  });

  it('should divide with 20 significant digits', () => {
    expect(divide(new Decimal(1), new Decimal(3)).toString()).toBe('0.33333333333333333333');
  });

  it('should throw on division by zero', () => {
    expect(() => divide(new Decimal(1), new Decimal(0))).toThrow('Division by zero');
  });
});
