import type { GregorianDate } from '../../domain/value-objects/GregorianDate';
import type { JalaliDate } from '../../domain/value-objects/JalaliDate';

/**
 * Names of the Jalali calendar backends that can be configured
 */
export type JalaliBackendName = 'arithmetic' | 'jalaali-js';

/**
 * IJalaliCalendar Port Interface
 *
 * A Gregorian ↔ Jalali conversion algorithm. Implementations must be
 * mutually inverse over the dates they support: converting a supported,
 * valid date one way and back returns the original date.
 *
 * @see ArithmeticJalaliCalendar - 33-year cycle, every Gregorian year from 1
 * @see JalaaliJsCalendar - astronomical break table from jalaali-js
 */
export interface IJalaliCalendar {
  readonly name: JalaliBackendName;

  /**
   * @throws DateOutOfRangeError unless supportsGregorian(date)
   */
  toJalali(date: GregorianDate): JalaliDate;

  /**
   * Callers validate with isValid() first; behaviour for invalid dates is
   * implementation-defined
   *
   * @throws DateOutOfRangeError unless supportsJalali(date)
   */
  toGregorian(date: JalaliDate): GregorianDate;

  /** Whether toJalali() can convert `date` */
  supportsGregorian(date: GregorianDate): boolean;

  /** Whether `date` falls inside the range toGregorian() converts */
  supportsJalali(date: JalaliDate): boolean;

  /** Supported and a real day of the Jalali calendar */
  isValid(date: JalaliDate): boolean;

  isLeapYear(year: number): boolean;
}
