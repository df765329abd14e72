import { DateEntrySchema, type DateEntry } from '../../../../shared/validation/schemas';
import { GregorianDate } from '../value-objects/GregorianDate';
import type { JalaliDateParts } from '../value-objects/JalaliDate';
import { InvalidFormatError } from '../../../../domain/errors/InvalidFormatError';
import type { CalendarKind } from '../../../../domain/errors/DomainError';

/** Code points of the Persian (U+06F0) and Arabic-Indic (U+0660) zero digits */
const PERSIAN_ZERO = 0x06f0;
const ARABIC_INDIC_ZERO = 0x0660;

/**
 * Maps Persian (۰–۹) and Arabic-Indic (٠–٩) digits to ASCII 0–9, leaving
 * every other character untouched
 */
export function normalizeDigits(text: string): string {
  return text
    .replace(/[۰-۹]/g, (digit) => String(digit.charCodeAt(0) - PERSIAN_ZERO))
    .replace(/[٠-٩]/g, (digit) => String(digit.charCodeAt(0) - ARABIC_INDIC_ZERO));
}

/**
 * Trims the input and turns `/` and `.` separators into `-`
 */
export function normalizeSeparators(text: string): string {
  return text.trim().replace(/[/.]/g, '-');
}

function parseEntry(text: string, calendar: CalendarKind): DateEntry {
  const result = DateEntrySchema.safeParse(normalizeSeparators(normalizeDigits(text)));
  if (!result.success) {
    throw new InvalidFormatError(text, calendar);
  }
  return result.data;
}

/**
 * Parses a Gregorian date entry such as `1990-07-15`, `1990/7/15` or
 * `۱۹۹۰.۰۷.۱۵`
 *
 * @throws InvalidFormatError if the entry does not match YYYY-M-D
 * @throws InvalidCalendarDateError if the parts are not a real day
 */
export function parseGregorian(text: string): GregorianDate {
  const { year, month, day } = parseEntry(text, 'gregorian');
  return GregorianDate.of(year, month, day);
}

/**
 * Parses a Jalali date entry into its raw parts.
 *
 * Unlike parseGregorian, no calendar validation happens here: `1403-12-31`
 * parses fine and is rejected later by JalaliConverter.jalaliToGregorian.
 *
 * @throws InvalidFormatError if the entry does not match YYYY-M-D
 */
export function parseJalali(text: string): JalaliDateParts {
  return parseEntry(text, 'jalali');
}
