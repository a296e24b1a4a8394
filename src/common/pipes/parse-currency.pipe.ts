import { ArgumentMetadata, BadRequestException, Injectable, PipeTransform } from '@nestjs/common';
import { isISO4217CurrencyCode } from 'class-validator';

/** Trims and uppercases an optional ISO 4217 code; absent values pass through as undefined */
@Injectable()
export class ParseCurrencyPipe implements PipeTransform<string | undefined, string | undefined> {
  transform(value: string | undefined, metadata: ArgumentMetadata): string | undefined {
    const code = value?.trim().toUpperCase();
    if (code === undefined || code === '') {
      return undefined;
    }
    if (!isISO4217CurrencyCode(code)) {
      throw new BadRequestException(`${metadata.data ?? 'currency'} must be an ISO 4217 currency code, got "${value}"`);
    }
    return code;
  }
}
