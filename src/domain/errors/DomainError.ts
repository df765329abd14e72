/**
 * Codes carried by every domain error so the presentation layer can tell
 * failures apart without `instanceof` chains.
 */
export type DomainErrorCode =
  | 'INVALID_FORMAT'
  | 'INVALID_CALENDAR_DATE'
  | 'FUTURE_BIRTHDATE'
  | 'DATE_OUT_OF_RANGE'
  | 'CAPABILITY_UNAVAILABLE'
  | 'TIME_SOURCE_UNAVAILABLE';

/**
 * Calendar systems a date can be parsed, validated or converted in
 */
export type CalendarKind = 'gregorian' | 'jalali';

/**
 * Base class for all domain errors
 * Extends Error to provide custom domain-specific error handling
 */
export abstract class DomainError extends Error {
  public abstract readonly code: DomainErrorCode;

  public constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Type guard used at flow boundaries, where anything that is not a
 * DomainError must keep propagating.
 */
export function isDomainError(error: unknown): error is DomainError {
  return error instanceof DomainError;
}
