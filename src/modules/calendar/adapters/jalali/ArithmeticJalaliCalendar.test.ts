import { ArithmeticJalaliCalendar } from './ArithmeticJalaliCalendar';
import { GregorianDate } from '../../domain/value-objects/GregorianDate';
import { JalaliDate } from '../../domain/value-objects/JalaliDate';
import { DateOutOfRangeError } from '../../../../domain/errors/DateOutOfRangeError';

describe('ArithmeticJalaliCalendar', () => {
  const calendar = new ArithmeticJalaliCalendar();

  describe('toJalali', () => {
    it.each([
      ['2025-10-18', '1404-07-26'],
      ['2025-03-21', '1404-01-01'],
      ['2025-03-20', '1403-12-30'],
      ['2024-03-20', '1403-01-01'],
      ['2020-03-20', '1399-01-01'],
      ['2017-03-21', '1396-01-01'],
      ['1991-07-15', '1370-04-24'],
      ['1990-07-15', '1369-04-24'],
    ])('%s should be %s', (gregorian, jalali) => {
      const [year, month, day] = gregorian.split('-').map(Number);

      expect(calendar.toJalali(GregorianDate.of(year ?? 0, month ?? 0, day ?? 0)).toString()).toBe(
        jalali
      );
    });
  });

  describe('toGregorian', () => {
    it('should convert 1404-07-26 to 2025-10-18', () => {
      expect(calendar.toGregorian(JalaliDate.of(1404, 7, 26)).toString()).toBe('2025-10-18');
    });

    it('should convert the last day of a leap year', () => {
      expect(calendar.toGregorian(JalaliDate.of(1403, 12, 30)).toString()).toBe('2025-03-20');
    });

    it('should convert the first day of Mehr', () => {
      expect(calendar.toGregorian(JalaliDate.of(1404, 7, 1)).toString()).toBe('2025-09-23');
    });
  });

  describe('isLeapYear', () => {
    it.each([
      [1399, true],
      [1403, true],
      [1408, true],
      [1404, false],
      [1400, false],
    ])('%i should be leap: %s', (year, expected) => {
      expect(calendar.isLeapYear(year)).toBe(expected);
    });
  });

  describe('isValid', () => {
    it.each([
      [1403, 12, 30, true],
      [1404, 12, 29, true],
      [1404, 12, 30, false],
      [1404, 6, 31, true],
      [1404, 7, 31, false],
      [1404, 13, 1, false],
      [1404, 0, 10, false],
      [1404, 1, 0, false],
    ])('%i-%i-%i should be valid: %s', (year, month, day, expected) => {
      expect(calendar.isValid(JalaliDate.of(year, month, day))).toBe(expected);
    });
  });

  describe('supported range', () => {
    it('should convert every Gregorian date', () => {
      expect(calendar.supportsGregorian()).toBe(true);
      expect(calendar.toJalali(GregorianDate.of(1, 1, 1)).toString()).toBe('-0621-10-11');
    });

    it('should reject Jalali dates that fall before Gregorian year 1', () => {
      const tooEarly = JalaliDate.of(-621, 1, 1);

      expect(calendar.supportsJalali(tooEarly)).toBe(false);
      expect(calendar.isValid(tooEarly)).toBe(false);
      expect(() => calendar.toGregorian(tooEarly)).toThrow(DateOutOfRangeError);
      expect(calendar.supportsJalali(JalaliDate.of(-620, 1, 1))).toBe(true);
    });
  });

  describe('round trip', () => {
    it('should invert toJalali with toGregorian from year 1 to year 3000', () => {
      const first = GregorianDate.of(1, 1, 1).toDayNumber();
      const last = GregorianDate.of(3000, 12, 31).toDayNumber();

      for (let dayNumber = first; dayNumber <= last; dayNumber += 997) {
        const gregorian = GregorianDate.fromDayNumber(dayNumber);
        const jalali = calendar.toJalali(gregorian);

        expect(calendar.isValid(jalali)).toBe(true);
        expect(calendar.toGregorian(jalali).equals(gregorian)).toBe(true);
      }
    });

    it('should map Farvardin 1 and the end of Esfand back to themselves from year -620 to 3500', () => {
      for (let year = -620; year <= 3500; year += 1) {
        const samples = [JalaliDate.of(year, 1, 1), JalaliDate.of(year, 12, 29)];
        if (calendar.isLeapYear(year)) {
          samples.push(JalaliDate.of(year, 12, 30));
        }

        for (const jalali of samples) {
          expect(calendar.isValid(jalali)).toBe(true);
          expect(calendar.toJalali(calendar.toGregorian(jalali)).equals(jalali)).toBe(true);
        }
      }
    });

    it('should map consecutive days across a leap Esfand to consecutive Jalali days', () => {
      const start = GregorianDate.of(2025, 3, 18).toDayNumber();
      const observed = [0, 1, 2, 3].map((offset) =>
        calendar.toJalali(GregorianDate.fromDayNumber(start + offset)).toString()
      );

      expect(observed).toEqual(['1403-12-28', '1403-12-29', '1403-12-30', '1404-01-01']);
    });
  });
});
