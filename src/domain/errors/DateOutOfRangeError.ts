import { DomainError, type CalendarKind } from './DomainError';

/**
 * Thrown when a real date lies outside what the configured Jalali backend
 * can convert. Unlike InvalidCalendarDateError the date itself exists; only
 * the backend named in `backend` cannot represent it.
 */
export class DateOutOfRangeError extends DomainError {
  public readonly code = 'DATE_OUT_OF_RANGE' as const;

  public constructor(
    public readonly backend: string,
    public readonly calendar: CalendarKind,
    public readonly value: string
  ) {
    super(`The ${backend} backend cannot convert the ${calendar} date ${value}`);
  }
}
