import { Transform } from 'class-transformer';
import { IsISO4217CurrencyCode, IsNumber, IsPositive } from 'class-validator';
import { toUpperCase } from '../../ledger/dto/create-transaction.dto';
import { IsCalendarDate } from '../../common/validators/is-calendar-date.validator';

// One FX observation: `rate` quote units per base unit
export class UpsertFxRateDto {
  @Transform(toUpperCase)
  @IsISO4217CurrencyCode()
  baseCurrency!: string;

  @Transform(toUpperCase)
  @IsISO4217CurrencyCode()
  quoteCurrency!: string;

  @IsCalendarDate()
  date!: string;

  @IsNumber()
  @IsPositive()
  rate!: number;
}
