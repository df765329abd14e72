import { DateTime } from 'luxon';
import { InvalidCalendarDateError } from '../../../../domain/errors/InvalidCalendarDateError';

/** Julian Day Number of 1970-01-01 */
const UNIX_EPOCH_DAY_NUMBER = 2_440_588;
const MS_PER_DAY = 86_400_000;

/**
 * GregorianDate value object
 * A real day of the proleptic Gregorian calendar, year 1 onward.
 *
 * Backed by a luxon DateTime pinned to UTC midnight so that day arithmetic
 * never crosses a DST transition.
 */
export class GregorianDate {
  private readonly value: DateTime;

  private constructor(value: DateTime) {
    this.value = value;
  }

  /**
   * Creates a date from its parts
   *
   * @throws InvalidCalendarDateError if the parts do not form a real day
   */
  public static of(year: number, month: number, day: number): GregorianDate {
    const label = GregorianDate.formatParts(year, month, day);
    if (year < 1) {
      throw new InvalidCalendarDateError('gregorian', label, 'year must be 1 or later');
    }
    const parsed = DateTime.utc(year, month, day);
    if (!parsed.isValid) {
      throw new InvalidCalendarDateError(
        'gregorian',
        label,
        parsed.invalidExplanation ?? parsed.invalidReason ?? undefined
      );
    }
    return new GregorianDate(parsed);
  }

  /**
   * Takes the calendar day of a DateTime in its own zone, dropping the time
   */
  public static fromDateTime(dateTime: DateTime): GregorianDate {
    return GregorianDate.of(dateTime.year, dateTime.month, dateTime.day);
  }

  /**
   * Inverse of toDayNumber()
   */
  public static fromDayNumber(dayNumber: number): GregorianDate {
    return GregorianDate.fromDateTime(
      DateTime.fromMillis((dayNumber - UNIX_EPOCH_DAY_NUMBER) * MS_PER_DAY, { zone: 'utc' })
    );
  }

  public static isLeapYear(year: number): boolean {
    return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
  }

  public static daysInMonth(year: number, month: number): number {
    const days = DateTime.utc(year, month, 1).daysInMonth;
    if (days === undefined) {
      throw new InvalidCalendarDateError('gregorian', GregorianDate.formatParts(year, month, 1));
    }
    return days;
  }

  public get year(): number {
    return this.value.year;
  }

  public get month(): number {
    return this.value.month;
  }

  public get day(): number {
    return this.value.day;
  }

  /**
   * Julian Day Number (days since 4713 BCE, noon-based), the shared
   * reference point for calendar conversions
   */
  public toDayNumber(): number {
    return UNIX_EPOCH_DAY_NUMBER + Math.round(this.value.toMillis() / MS_PER_DAY);
  }

  /**
   * Whole days from `other` to this date (negative when this date is earlier)
   */
  public daysSince(other: GregorianDate): number {
    return this.toDayNumber() - other.toDayNumber();
  }

  public compareTo(other: GregorianDate): number {
    return Math.sign(this.daysSince(other));
  }

  public isAfter(other: GregorianDate): boolean {
    return this.compareTo(other) > 0;
  }

  public isOnOrBefore(other: GregorianDate): boolean {
    return this.compareTo(other) <= 0;
  }

  public equals(other: GregorianDate): boolean {
    return this.compareTo(other) === 0;
  }

  public toDateTime(): DateTime {
    return this.value;
  }

  /**
   * Returns the date in ISO format (YYYY-MM-DD)
   */
  public toString(): string {
    return GregorianDate.formatParts(this.year, this.month, this.day);
  }

  private static formatParts(year: number, month: number, day: number): string {
    return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
  }
}
