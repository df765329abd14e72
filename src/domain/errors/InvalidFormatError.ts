import { DomainError, type CalendarKind } from './DomainError';

const EXAMPLES: Record<CalendarKind, string> = {
  gregorian: '1990-07-15',
  jalali: '1370-04-24',
};

/**
 * Thrown when input does not match the YYYY-M-D digit/separator pattern
 */
export class InvalidFormatError extends DomainError {
  public readonly code = 'INVALID_FORMAT' as const;

  public constructor(
    public readonly input: string,
    public readonly calendar: CalendarKind
  ) {
    super(
      `Invalid ${calendar} date: "${input}". Use YYYY-MM-DD (e.g., ${EXAMPLES[calendar]}).`
    );
  }
}
