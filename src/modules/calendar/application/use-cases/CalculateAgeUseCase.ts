import type { AgeReport } from '../types/AgeReport';
import type { CalendarMath } from '../../domain/services/CalendarMath';
import type { JalaliConverter } from '../../domain/services/JalaliConverter';
import { parseGregorian, parseJalali } from '../../domain/services/DateParser';
import type { GregorianDate } from '../../domain/value-objects/GregorianDate';
import { JalaliDate } from '../../domain/value-objects/JalaliDate';

/**
 * CalculateAgeUseCase - Age card from a birthdate entry
 *
 * Accepts the birthdate either as a Gregorian or as a Jalali entry; Jalali
 * birthdates are converted to Gregorian first, since all age arithmetic is
 * Gregorian. The Jalali mirror of the card is left out when no backend is
 * configured or the backend cannot convert one of its dates.
 *
 * **Throws:**
 * - InvalidFormatError / InvalidCalendarDateError for bad entries
 * - FutureBirthdateError if the birthdate is after `today`
 * - CapabilityUnavailableError for Jalali input without a backend
 * - DateOutOfRangeError for Jalali input the backend cannot convert
 */
export class CalculateAgeUseCase {
  public constructor(
    private readonly calendarMath: CalendarMath,
    private readonly jalaliConverter: JalaliConverter
  ) {}

  public fromGregorianInput(input: string, today: GregorianDate): AgeReport {
    return this.execute(parseGregorian(input), today);
  }

  public fromJalaliInput(input: string, today: GregorianDate): AgeReport {
    const parts = parseJalali(input);
    const born = this.jalaliConverter.jalaliToGregorian(JalaliDate.fromParts(parts));
    return this.execute(born, today);
  }

  public execute(born: GregorianDate, today: GregorianDate): AgeReport {
    const age = this.calendarMath.ageYMD(born, today);
    const nextBirthday = this.calendarMath.nextBirthday(born, today);

    const report: AgeReport = { born, today, age, nextBirthday };
    const mirrored = [born, today, nextBirthday.date].every((date) =>
      this.jalaliConverter.canConvertGregorian(date)
    );
    if (mirrored) {
      report.jalali = {
        born: this.jalaliConverter.gregorianToJalali(born),
        today: this.jalaliConverter.gregorianToJalali(today),
        nextBirthday: this.jalaliConverter.gregorianToJalali(nextBirthday.date),
      };
    }
    return report;
  }
}
