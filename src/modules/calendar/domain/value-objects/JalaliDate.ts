/**
 * Raw Jalali year/month/day triple as typed by a user, before any calendar
 * validation
 */
export interface JalaliDateParts {
  year: number;
  month: number;
  day: number;
}

/**
 * JalaliDate value object
 *
 * Months 1–6 have 31 days, 7–11 have 30 and Esfand (12) has 29, or 30 in a
 * leap year. Which years are leap depends on the active calendar backend,
 * so a JalaliDate is only known to be valid once a backend has produced or
 * accepted it (see JalaliConverter).
 */
export class JalaliDate {
  public readonly year: number;
  public readonly month: number;
  public readonly day: number;

  private constructor(parts: JalaliDateParts) {
    this.year = parts.year;
    this.month = parts.month;
    this.day = parts.day;
  }

  public static of(year: number, month: number, day: number): JalaliDate {
    return new JalaliDate({ year, month, day });
  }

  public static fromParts(parts: JalaliDateParts): JalaliDate {
    return new JalaliDate(parts);
  }

  /**
   * Day index within the year, 0 for 1 Farvardin
   */
  public dayOfYear(): number {
    const monthOffset = this.month <= 7 ? (this.month - 1) * 31 : 186 + (this.month - 7) * 30;
    return monthOffset + this.day - 1;
  }

  public toParts(): JalaliDateParts {
    return { year: this.year, month: this.month, day: this.day };
  }

  public equals(other: JalaliDate): boolean {
    return this.year === other.year && this.month === other.month && this.day === other.day;
  }

  /**
   * Returns the date as YYYY-MM-DD
   */
  public toString(): string {
    const year = this.year < 0 ? `-${String(-this.year).padStart(4, '0')}` : String(this.year).padStart(4, '0');
    return `${year}-${String(this.month).padStart(2, '0')}-${String(this.day).padStart(2, '0')}`;
  }
}
