import type { ConversionResult } from '../types/ConversionResult';
import type { JalaliConverter } from '../../domain/services/JalaliConverter';
import { parseGregorian } from '../../domain/services/DateParser';

/**
 * ConvertGregorianToJalaliUseCase - Gregorian entry to the Jalali day
 *
 * **Throws:**
 * - InvalidFormatError / InvalidCalendarDateError for bad entries
 * - CapabilityUnavailableError without a Jalali backend
 */
export class ConvertGregorianToJalaliUseCase {
  public constructor(private readonly jalaliConverter: JalaliConverter) {}

  public execute(input: string): ConversionResult {
    const gregorian = parseGregorian(input);
    return { gregorian, jalali: this.jalaliConverter.gregorianToJalali(gregorian) };
  }
}
