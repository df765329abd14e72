import { isLeapJalaaliYear, isValidJalaaliDate, toGregorian, toJalaali } from 'jalaali-js';
import type { IJalaliCalendar } from '../../application/ports/IJalaliCalendar';
import { GregorianDate } from '../../domain/value-objects/GregorianDate';
import { JalaliDate } from '../../domain/value-objects/JalaliDate';
import { DateOutOfRangeError } from '../../../../domain/errors/DateOutOfRangeError';

/** Jalali years covered by the jalaali-js break table */
export const JALAALI_JS_YEAR_RANGE = { min: -61, max: 3177 } as const;

/**
 * The library derives the Jalali year from the Gregorian one (gy - 621), so
 * Gregorian 3799 fails even where its Jalali image still lies in 3177.
 */
const LAST_GREGORIAN_YEAR = JALAALI_JS_YEAR_RANGE.max + 621;

const firstGregorian = (() => {
  const { gy, gm, gd } = toGregorian(JALAALI_JS_YEAR_RANGE.min, 1, 1);
  return GregorianDate.of(gy, gm, gd);
})();

const firstJalali = JalaliDate.of(JALAALI_JS_YEAR_RANGE.min, 1, 1);

const lastJalali = (() => {
  const { jy, jm, jd } = toJalaali(LAST_GREGORIAN_YEAR, 12, 31);
  return JalaliDate.of(jy, jm, jd);
})();

/** Dates both directions convert and convert back */
export const JALAALI_JS_SUPPORTED_RANGE = {
  gregorian: { first: firstGregorian, last: GregorianDate.of(LAST_GREGORIAN_YEAR, 12, 31) },
  jalali: { first: firstJalali, last: lastJalali },
} as const;

function compareParts(a: JalaliDate, b: JalaliDate): number {
  return a.year - b.year || a.month - b.month || a.day - b.day;
}

/**
 * JalaaliJsCalendar
 *
 * Adapter over the jalaali-js package, which follows the astronomical
 * calendar through a table of 33-year cycle breaks. Only dates whose image
 * converts back are supported: Jalali -61-01-01 through 3177-10-11, and the
 * Gregorian days between them. Anything else raises DateOutOfRangeError.
 */
export class JalaaliJsCalendar implements IJalaliCalendar {
  public readonly name = 'jalaali-js' as const;

  public isLeapYear(year: number): boolean {
    if (!this.isSupportedYear(year)) {
      return false;
    }
    return isLeapJalaaliYear(year);
  }

  public isValid(date: JalaliDate): boolean {
    return this.supportsJalali(date) && isValidJalaaliDate(date.year, date.month, date.day);
  }

  public supportsGregorian(date: GregorianDate): boolean {
    const { first, last } = JALAALI_JS_SUPPORTED_RANGE.gregorian;
    return date.compareTo(first) >= 0 && date.compareTo(last) <= 0;
  }

  public supportsJalali(date: JalaliDate): boolean {
    const { first, last } = JALAALI_JS_SUPPORTED_RANGE.jalali;
    return compareParts(date, first) >= 0 && compareParts(date, last) <= 0;
  }

  public toJalali(date: GregorianDate): JalaliDate {
    if (!this.supportsGregorian(date)) {
      throw new DateOutOfRangeError(this.name, 'gregorian', date.toString());
    }
    const { jy, jm, jd } = toJalaali(date.year, date.month, date.day);
    return JalaliDate.of(jy, jm, jd);
  }

  public toGregorian(date: JalaliDate): GregorianDate {
    if (!this.supportsJalali(date)) {
      throw new DateOutOfRangeError(this.name, 'jalali', date.toString());
    }
    const { gy, gm, gd } = toGregorian(date.year, date.month, date.day);
    return GregorianDate.of(gy, gm, gd);
  }

  private isSupportedYear(year: number): boolean {
    return (
      Number.isInteger(year) && year >= JALAALI_JS_YEAR_RANGE.min && year <= JALAALI_JS_YEAR_RANGE.max
    );
  }
}
