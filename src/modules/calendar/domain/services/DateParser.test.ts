import { normalizeDigits, normalizeSeparators, parseGregorian, parseJalali } from './DateParser';
import { InvalidFormatError } from '../../../../domain/errors/InvalidFormatError';
import { InvalidCalendarDateError } from '../../../../domain/errors/InvalidCalendarDateError';

function captureError(action: () => unknown): unknown {
  try {
    action();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('DateParser', () => {
  describe('normalizeDigits', () => {
    it('should map Persian digits to ASCII', () => {
      expect(normalizeDigits('۰۱۲۳۴۵۶۷۸۹')).toBe('0123456789');
    });

    it('should map Arabic-Indic digits to ASCII', () => {
      expect(normalizeDigits('٠١٢٣٤٥٦٧٨٩')).toBe('0123456789');
    });

    it('should leave other characters untouched', () => {
      expect(normalizeDigits('back ۱-b')).toBe('back 1-b');
    });
  });

  describe('normalizeSeparators', () => {
    it('should trim and turn slashes and dots into dashes', () => {
      expect(normalizeSeparators('  1990/07.15 ')).toBe('1990-07-15');
    });
  });

  describe('parseGregorian', () => {
    it.each([
      ['1990-07-15', '1990-07-15'],
      ['1990/7/5', '1990-07-05'],
      ['1990.07.15', '1990-07-15'],
      ['  1990-07-15  ', '1990-07-15'],
      ['۱۹۹۰-۰۷-۱۵', '1990-07-15'],
      ['١٩٩٠/٠٧/١٥', '1990-07-15'],
    ])('should parse %p', (input, expected) => {
      expect(parseGregorian(input).toString()).toBe(expected);
    });

    it.each([['90-07-15'], ['abc'], ['1990-07-15-01'], ['1990 07 15'], ['']])(
      'should throw InvalidFormatError for %p',
      (input) => {
        expect(() => parseGregorian(input)).toThrow(InvalidFormatError);
      }
    );

    it('should keep the raw input and calendar on the format error', () => {
      const error = captureError(() => parseGregorian('15/07/1990'));

      expect(error).toBeInstanceOf(InvalidFormatError);
      expect(error).toMatchObject({
        code: 'INVALID_FORMAT',
        input: '15/07/1990',
        calendar: 'gregorian',
      });
    });

    it.each([['2025-02-30'], ['2025-13-01'], ['0000-01-01'], ['2025-2-29']])(
      'should throw InvalidCalendarDateError for %p',
      (input) => {
        expect(() => parseGregorian(input)).toThrow(InvalidCalendarDateError);
      }
    );
  });

  describe('parseJalali', () => {
    it('should return the raw triple', () => {
      expect(parseJalali('1370-04-24')).toEqual({ year: 1370, month: 4, day: 24 });
    });

    it('should parse Persian digits identically to ASCII digits', () => {
      expect(parseJalali('۱۳۷۰-۰۴-۲۴')).toEqual(parseJalali('1370-04-24'));
    });

    it('should accept slash and dot separators', () => {
      expect(parseJalali('1404/7/26')).toEqual({ year: 1404, month: 7, day: 26 });
      expect(parseJalali('1404.07.26')).toEqual({ year: 1404, month: 7, day: 26 });
    });

    it('should not validate the calendar date', () => {
      expect(parseJalali('1404-12-30')).toEqual({ year: 1404, month: 12, day: 30 });
      expect(parseJalali('1404-13-40')).toEqual({ year: 1404, month: 13, day: 40 });
    });

    it('should throw InvalidFormatError tagged jalali for malformed input', () => {
      const error = captureError(() => parseJalali('1370 04 24'));

      expect(error).toBeInstanceOf(InvalidFormatError);
      expect(error).toMatchObject({ calendar: 'jalali', input: '1370 04 24' });
    });
  });
});
