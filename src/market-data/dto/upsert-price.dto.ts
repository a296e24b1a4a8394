import { Transform, Type } from 'class-transformer';
import {
  ArrayMinSize,
  IsArray,
  IsInt,
  IsISO4217CurrencyCode,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  Min,
  ValidateNested,
} from 'class-validator';
import { toUpperCase } from '../../ledger/dto/create-transaction.dto';
import { IsCalendarDate } from '../../common/validators/is-calendar-date.validator';

// Daily bar for a single ticker; open/high/low default to close
export class UpsertPriceDto {
  @Transform(toUpperCase)
  @IsString()
  @IsNotEmpty()
  ticker!: string;

  @IsCalendarDate()
  date!: string;

  @IsOptional()
  @IsNumber()
  @IsPositive()
  open?: number;

  @IsOptional()
  @IsNumber()
  @IsPositive()
  high?: number;

  @IsOptional()
  @IsNumber()
  @IsPositive()
  low?: number;

  @IsNumber()
  @IsPositive()
  close!: number;

  @Transform(toUpperCase)
  @IsISO4217CurrencyCode()
  currency!: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  volume?: number;
}

// Upsert many bars at once
export class BulkUpsertPricesDto {
  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => UpsertPriceDto)
  prices!: UpsertPriceDto[];
}
