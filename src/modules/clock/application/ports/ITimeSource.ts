import type { GregorianDate } from '../../../calendar/domain/value-objects/GregorianDate';

/**
 * ITimeSource Port Interface
 *
 * One external strategy for learning today's date, tried by
 * CurrentDateResolver when the system clock is not trusted. Sources are
 * untrusted and best-effort.
 *
 * **Error Handling:**
 * - Any failure (network, timeout, bad payload): throw TimeSourceUnavailableError
 * - Never retry internally; the resolver moves on to the next source
 */
export interface ITimeSource {
  /**
   * Identifies the source in logs and in the `online` result (usually its URL)
   */
  readonly endpoint: string;

  /**
   * @throws TimeSourceUnavailableError when no date could be obtained
   */
  fetchToday(): Promise<GregorianDate>;
}
