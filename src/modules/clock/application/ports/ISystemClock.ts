import type { GregorianDate } from '../../../calendar/domain/value-objects/GregorianDate';

/**
 * Local system clock, read as a plain calendar date
 *
 * Implementations may throw when the clock cannot be read; the resolver
 * treats that the same as an implausible reading.
 */
export interface ISystemClock {
  today(): GregorianDate;
}
