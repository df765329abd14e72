import type { AgeResult, NextBirthday } from '../../domain/services/CalendarMath';
import type { GregorianDate } from '../../domain/value-objects/GregorianDate';
import type { JalaliDate } from '../../domain/value-objects/JalaliDate';

/**
 * Jalali rendering of the dates in an AgeReport
 */
export interface JalaliMirror {
  born: JalaliDate;
  today: JalaliDate;
  nextBirthday: JalaliDate;
}

/**
 * Everything the age card shows, as structured values
 */
export interface AgeReport {
  born: GregorianDate;
  today: GregorianDate;
  age: AgeResult;
  nextBirthday: NextBirthday;
  /**
   * Present only when a Jalali backend is configured
   */
  jalali?: JalaliMirror;
}
