import type { ConversionResult } from '../types/ConversionResult';
import type { JalaliConverter } from '../../domain/services/JalaliConverter';
import { parseJalali } from '../../domain/services/DateParser';
import { JalaliDate } from '../../domain/value-objects/JalaliDate';

/**
 * ConvertJalaliToGregorianUseCase - Jalali entry to the Gregorian day
 *
 * The entry is only checked for shape while parsing; whether the day
 * exists is decided by the converter, so `1404-12-30` fails here with
 * InvalidCalendarDateError rather than InvalidFormatError.
 */
export class ConvertJalaliToGregorianUseCase {
  public constructor(private readonly jalaliConverter: JalaliConverter) {}

  public execute(input: string): ConversionResult {
    const jalali = JalaliDate.fromParts(parseJalali(input));
    return { gregorian: this.jalaliConverter.jalaliToGregorian(jalali), jalali };
  }
}
