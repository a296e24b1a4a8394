import { ValidateBy, ValidationOptions, buildMessage } from 'class-validator';
import { isCalendarDate } from '../utils/calendar-date.util';

export const IS_CALENDAR_DATE = 'isCalendarDate';

/** Checks for a real YYYY-MM-DD day, so 2024-02-30 is refused */
export function IsCalendarDate(validationOptions?: ValidationOptions): PropertyDecorator {
  return ValidateBy(
    {
      name: IS_CALENDAR_DATE,
      validator: {
        validate: (value: unknown): boolean => typeof value === 'string' && isCalendarDate(value),
        defaultMessage: buildMessage(
          (eachPrefix) => `${eachPrefix}$property must be a valid YYYY-MM-DD date`,
          validationOptions,
        ),
      },
    },
    validationOptions,
  );
}
