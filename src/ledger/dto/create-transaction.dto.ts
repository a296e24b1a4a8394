import { Transform, TransformFnParams } from 'class-transformer';
import {
  IsEnum,
  IsISO4217CurrencyCode,
  IsISO8601,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  Matches,
  MaxLength,
} from 'class-validator';
import { TransactionType } from '../entities/transaction.entity';

// Timestamps must carry Z or an explicit offset
export const UTC_OFFSET_REGEX = /(Z|[+-]\d{2}:\d{2})$/;

export const toUpperCase = ({ value }: TransformFnParams): unknown =>
  typeof value === 'string' ? value.trim().toUpperCase() : value;

// DTO for recording a ledger entry.
// id is the idempotency key; a UUID is generated when omitted.
export class CreateTransactionDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  id?: string;

  @Transform(toUpperCase)
  @IsString()
  @IsNotEmpty()
  ticker!: string;

  @Transform(toUpperCase)
  @IsEnum(TransactionType)
  type!: TransactionType;

  @IsNumber()
  @IsPositive()
  quantity!: number;

  @IsNumber()
  @IsPositive()
  price!: number;

  @Transform(toUpperCase)
  @IsISO4217CurrencyCode()
  currency!: string;

  @IsISO8601({ strict: true })
  @Matches(UTC_OFFSET_REGEX, { message: 'timestamp must end in Z or a +hh:mm offset' })
  timestamp!: string;

  @IsOptional()
  @IsString()
  @MaxLength(500)
  note?: string;
}
