import { DomainError, type CalendarKind } from './DomainError';

/**
 * Thrown when a well-formed year/month/day triple is not a real day
 * in the target calendar (month 13, Feb 30, Esfand 30 in a common year)
 */
export class InvalidCalendarDateError extends DomainError {
  public readonly code = 'INVALID_CALENDAR_DATE' as const;

  public constructor(
    public readonly calendar: CalendarKind,
    public readonly value: string,
    reason?: string
  ) {
    super(`Not a valid ${calendar} date: ${value}${reason ? ` (${reason})` : ''}`);
  }
}
