import { DomainError } from './DomainError';

/**
 * Thrown when a birthdate falls after the reference "today"
 */
export class FutureBirthdateError extends DomainError {
  public readonly code = 'FUTURE_BIRTHDATE' as const;

  public constructor(
    public readonly birthdate: string,
    public readonly today: string
  ) {
    super(`Birthdate cannot be in the future: ${birthdate} is after ${today}`);
  }
}
