import type { IJalaliCalendar } from '../../application/ports/IJalaliCalendar';
import { GregorianDate } from '../../domain/value-objects/GregorianDate';
import { JalaliDate } from '../../domain/value-objects/JalaliDate';
import { DateOutOfRangeError } from '../../../../domain/errors/DateOutOfRangeError';

const CYCLE_YEARS = 33;
const CYCLE_DAYS = 12_053;
const LEAP_YEARS_PER_CYCLE = 8;

/** Positions of the leap years inside each 33-year cycle */
const LEAP_POSITIONS: readonly number[] = [1, 5, 9, 13, 17, 22, 26, 30];

/**
 * Julian Day Number of 1 Farvardin, year 1. Chosen so that the cycle puts
 * 1 Farvardin 1404 on 2025-03-21.
 */
const EPOCH_DAY_NUMBER = 1_948_320;

/** Julian Day Number of 0001-01-01, the first day GregorianDate accepts */
const FIRST_GREGORIAN_DAY_NUMBER = GregorianDate.of(1, 1, 1).toDayNumber();

function floorDiv(a: number, b: number): number {
  return Math.floor(a / b);
}

function floorMod(a: number, b: number): number {
  return a - floorDiv(a, b) * b;
}

/**
 * ArithmeticJalaliCalendar
 *
 * Jalali calendar on a fixed 33-year cycle with eight leap years. Pure
 * arithmetic over Julian Day Numbers, so it covers every Gregorian year from
 * 1 onward, including the negative Jalali years before the Hijra.
 *
 * The cycle agrees with the observed calendar for the modern era; far from
 * it the two drift apart by a day now and then. Conversions stay mutually
 * inverse everywhere.
 */
export class ArithmeticJalaliCalendar implements IJalaliCalendar {
  public readonly name = 'arithmetic' as const;

  public isLeapYear(year: number): boolean {
    return LEAP_POSITIONS.includes(floorMod(year, CYCLE_YEARS));
  }

  public monthLength(year: number, month: number): number {
    if (month <= 6) return 31;
    if (month <= 11) return 30;
    return this.isLeapYear(year) ? 30 : 29;
  }

  public isValid(date: JalaliDate): boolean {
    const { year, month, day } = date;
    if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) {
      return false;
    }
    if (month < 1 || month > 12 || day < 1) {
      return false;
    }
    return day <= this.monthLength(year, month) && this.supportsJalali(date);
  }

  public supportsGregorian(): boolean {
    return true;
  }

  /** Jalali dates before Gregorian year 1 have no GregorianDate to map to */
  public supportsJalali(date: JalaliDate): boolean {
    return this.yearStart(date.year) + date.dayOfYear() >= FIRST_GREGORIAN_DAY_NUMBER;
  }

  public toJalali(date: GregorianDate): JalaliDate {
    const dayNumber = date.toDayNumber();

    let year = floorDiv((dayNumber - EPOCH_DAY_NUMBER) * CYCLE_YEARS, CYCLE_DAYS) + 1;
    while (this.yearStart(year + 1) <= dayNumber) year += 1;
    while (this.yearStart(year) > dayNumber) year -= 1;

    const dayOfYear = dayNumber - this.yearStart(year);
    if (dayOfYear < 186) {
      return JalaliDate.of(year, floorDiv(dayOfYear, 31) + 1, (dayOfYear % 31) + 1);
    }
    const rest = dayOfYear - 186;
    return JalaliDate.of(year, 7 + floorDiv(rest, 30), (rest % 30) + 1);
  }

  public toGregorian(date: JalaliDate): GregorianDate {
    if (!this.supportsJalali(date)) {
      throw new DateOutOfRangeError(this.name, 'jalali', date.toString());
    }
    return GregorianDate.fromDayNumber(this.yearStart(date.year) + date.dayOfYear());
  }

  /**
   * Julian Day Number of 1 Farvardin of `year`
   */
  private yearStart(year: number): number {
    return EPOCH_DAY_NUMBER + 365 * (year - 1) + this.leapYearsThrough(year - 1);
  }

  /**
   * Leap years in (0, n]; negative for n < 0 so that yearStart() stays linear
   */
  private leapYearsThrough(n: number): number {
    const position = floorMod(n, CYCLE_YEARS);
    const partial = LEAP_POSITIONS.filter((leap) => leap <= position).length;
    return floorDiv(n, CYCLE_YEARS) * LEAP_YEARS_PER_CYCLE + partial;
  }
}
