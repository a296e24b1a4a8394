import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { IsCalendarDate } from './is-calendar-date.validator';

class DatedDto {
  @IsCalendarDate()
  date!: unknown;
}

describe('IsCalendarDate', () => {
  const messagesFor = (date: unknown): string[] =>
    validateSync(plainToInstance(DatedDto, { date })).flatMap((error) => Object.values(error.constraints ?? {}));

  it('should accept real days, leap days included', () => {
    expect(messagesFor('2024-01-31')).toEqual([]);
    expect(messagesFor('2024-02-29')).toEqual([]);
  });

  it('should reject days that do not exist', () => {
    expect(messagesFor('2024-02-30')).toEqual(['date must be a valid YYYY-MM-DD date']);
    expect(messagesFor('2023-02-29')).toEqual(['date must be a valid YYYY-MM-DD date']);
    expect(messagesFor('2024-13-45')).toEqual(['date must be a valid YYYY-MM-DD date']);
  });

  it('should reject other shapes and non-strings', () => {
    expect(messagesFor('2024-1-5')).toEqual(['date must be a valid YYYY-MM-DD date']);
    expect(messagesFor('2024-01-05T00:00:00Z')).toEqual(['date must be a valid YYYY-MM-DD date']);
    expect(messagesFor(20240105)).toEqual(['date must be a valid YYYY-MM-DD date']);
  });
});
