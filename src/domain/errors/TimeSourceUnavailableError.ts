import { DomainError } from './DomainError';

/**
 * TimeSourceUnavailableError
 *
 * Thrown by a time source when it cannot produce a date, including:
 * - Network failures and timeouts
 * - Non-2xx responses
 * - Payloads without a usable `datetime` field
 *
 * Only CurrentDateResolver sees this error; it moves on to the next
 * source or the fallback date and never rethrows it.
 */
export class TimeSourceUnavailableError extends DomainError {
  public readonly code = 'TIME_SOURCE_UNAVAILABLE' as const;

  public constructor(
    public readonly endpoint: string,
    message: string
  ) {
    super(`Time source ${endpoint} unavailable: ${message}`);
  }
}
