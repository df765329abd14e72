import type { GregorianDate } from '../../domain/value-objects/GregorianDate';
import type { JalaliDate } from '../../domain/value-objects/JalaliDate';

/**
 * The same day in both calendars
 */
export interface ConversionResult {
  gregorian: GregorianDate;
  jalali: JalaliDate;
}
