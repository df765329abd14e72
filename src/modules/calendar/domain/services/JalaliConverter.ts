import type { IJalaliCalendar, JalaliBackendName } from '../../application/ports/IJalaliCalendar';
import type { GregorianDate } from '../value-objects/GregorianDate';
import type { JalaliDate } from '../value-objects/JalaliDate';
import { CapabilityUnavailableError } from '../../../../domain/errors/CapabilityUnavailableError';
import { InvalidCalendarDateError } from '../../../../domain/errors/InvalidCalendarDateError';
import { DateOutOfRangeError } from '../../../../domain/errors/DateOutOfRangeError';

export const JALALI_CAPABILITY = 'jalali-calendar';

/**
 * JalaliConverter - Gregorian ↔ Jalali conversion behind an optional backend
 *
 * The backend is fixed at construction. Without one, every conversion
 * throws CapabilityUnavailableError; call sites check isAvailable() before
 * offering Jalali features at all.
 *
 * **Round trip:**
 * For every GregorianDate g that canConvertGregorian() accepts,
 * `jalaliToGregorian(gregorianToJalali(g))` equals g, and the same holds
 * from the Jalali side for every date isValidJalali() accepts.
 */
export class JalaliConverter {
  /**
   * @param calendar - Conversion backend, or null when Jalali support is disabled
   */
  public constructor(private readonly calendar: IJalaliCalendar | null) {}

  public isAvailable(): boolean {
    return this.calendar !== null;
  }

  public get backendName(): JalaliBackendName | null {
    return this.calendar?.name ?? null;
  }

  /**
   * Whether a backend is configured and can convert `date` to Jalali
   */
  public canConvertGregorian(date: GregorianDate): boolean {
    return this.calendar !== null && this.calendar.supportsGregorian(date);
  }

  /**
   * @throws CapabilityUnavailableError when no backend is configured
   * @throws DateOutOfRangeError when the backend cannot represent the date
   */
  public gregorianToJalali(date: GregorianDate): JalaliDate {
    const calendar = this.requireCalendar();
    if (!calendar.supportsGregorian(date)) {
      throw new DateOutOfRangeError(calendar.name, 'gregorian', date.toString());
    }
    return calendar.toJalali(date);
  }

  /**
   * @throws CapabilityUnavailableError when no backend is configured
   * @throws DateOutOfRangeError when the backend cannot represent the date
   * @throws InvalidCalendarDateError when the date does not exist in the Jalali calendar
   */
  public jalaliToGregorian(date: JalaliDate): GregorianDate {
    const calendar = this.requireCalendar();
    if (!calendar.supportsJalali(date)) {
      throw new DateOutOfRangeError(calendar.name, 'jalali', date.toString());
    }
    if (!calendar.isValid(date)) {
      throw new InvalidCalendarDateError('jalali', date.toString());
    }
    return calendar.toGregorian(date);
  }

  public isValidJalali(date: JalaliDate): boolean {
    return this.requireCalendar().isValid(date);
  }

  public isLeapJalaliYear(year: number): boolean {
    return this.requireCalendar().isLeapYear(year);
  }

  private requireCalendar(): IJalaliCalendar {
    if (this.calendar === null) {
      throw new CapabilityUnavailableError(JALALI_CAPABILITY);
    }
    return this.calendar;
  }
}
