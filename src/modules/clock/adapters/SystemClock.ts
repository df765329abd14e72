import { DateTime } from 'luxon';
import type { ISystemClock } from '../application/ports/ISystemClock';
import { GregorianDate } from '../../calendar/domain/value-objects/GregorianDate';

/**
 * Reads today's date from the machine clock in the local zone
 */
export class SystemClock implements ISystemClock {
  public today(): GregorianDate {
    return GregorianDate.fromDateTime(DateTime.local());
  }
}

/**
 * Clock frozen at a specific date. Useful for deterministic tests.
 */
export class FixedClock implements ISystemClock {
  public constructor(private readonly date: GregorianDate) {}

  public today(): GregorianDate {
    return this.date;
  }
}
