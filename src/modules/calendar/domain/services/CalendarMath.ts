import { GregorianDate } from '../value-objects/GregorianDate';
import { FutureBirthdateError } from '../../../../domain/errors/FutureBirthdateError';

/**
 * Elapsed calendar time between two dates
 */
export interface AgeResult {
  years: number;
  months: number;
  days: number;
}

/**
 * Next birthday on or after tomorrow, with the distance from today
 */
export interface NextBirthday {
  date: GregorianDate;
  daysUntil: number;
}

/**
 * CalendarMath - Gregorian age and birthday arithmetic
 *
 * Pure and stateless; "today" is always passed in, so every result is
 * reproducible from its arguments.
 *
 * **Leap-day policy:**
 * A Feb 29 birthday observed in a common year falls on Feb 28, never Mar 1.
 */
export class CalendarMath {
  /**
   * Exact years, months and days elapsed from `born` to `today`
   *
   * Days are borrowed from the month before `today`'s month; when that
   * month is too short to cover the deficit (born on the 31st, today on
   * Mar 1) borrowing continues into the month before it. Born 2000-01-31,
   * today 2001-03-01 gives (1, 0, 29); a single borrow would yield
   * (1, 1, -2).
   *
   * @throws FutureBirthdateError if `born` is after `today`
   */
  public ageYMD(born: GregorianDate, today: GregorianDate): AgeResult {
    if (born.isAfter(today)) {
      throw new FutureBirthdateError(born.toString(), today.toString());
    }

    let years = today.year - born.year;
    let months = today.month - born.month;
    let days = today.day - born.day;

    let borrowYear = today.year;
    let borrowMonth = today.month;
    while (days < 0) {
      if (borrowMonth === 1) {
        borrowMonth = 12;
        borrowYear -= 1;
      } else {
        borrowMonth -= 1;
      }
      days += GregorianDate.daysInMonth(borrowYear, borrowMonth);
      months -= 1;
    }

    while (months < 0) {
      months += 12;
      years -= 1;
    }

    return { years, months, days };
  }

  /**
   * First birthday strictly after `today`
   *
   * @example
   * // born 2000-02-29, today 2025-01-10 → 2025-02-28
   * // born 2000-02-29, today 2025-03-01 → 2026-02-28
   */
  public nextBirthdayAfter(born: GregorianDate, today: GregorianDate): GregorianDate {
    const candidate = this.safeDate(today.year, born.month, born.day);
    if (candidate.isOnOrBefore(today)) {
      return this.safeDate(today.year + 1, born.month, born.day);
    }
    return candidate;
  }

  /**
   * Days from `today` to nextBirthdayAfter(); always positive
   */
  public daysUntilNextBirthday(born: GregorianDate, today: GregorianDate): number {
    return this.nextBirthdayAfter(born, today).daysSince(today);
  }

  public nextBirthday(born: GregorianDate, today: GregorianDate): NextBirthday {
    const date = this.nextBirthdayAfter(born, today);
    return { date, daysUntil: date.daysSince(today) };
  }

  /**
   * Builds a date, clamping `day` to the last day of the month
   */
  public safeDate(year: number, month: number, day: number): GregorianDate {
    return GregorianDate.of(year, month, Math.min(day, GregorianDate.daysInMonth(year, month)));
  }
}
