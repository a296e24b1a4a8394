import { ArgumentMetadata, BadRequestException, Injectable, PipeTransform } from '@nestjs/common';
import { CalendarDate, isCalendarDate } from '../utils/calendar-date.util';

/** Accepts YYYY-MM-DD or nothing; optional params pass through as undefined */
@Injectable()
export class ParseCalendarDatePipe implements PipeTransform<string | undefined, CalendarDate | undefined> {
  transform(value: string | undefined, metadata: ArgumentMetadata): CalendarDate | undefined {
    if (value === undefined || value === '') {
      return undefined;
    }
    if (!isCalendarDate(value)) {
      throw new BadRequestException(`${metadata.data ?? 'date'} must be a valid YYYY-MM-DD date, got "${value}"`);
    }
    return value;
  }
}
