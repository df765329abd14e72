import { isDomainError } from './DomainError';
import { InvalidFormatError } from './InvalidFormatError';
import { InvalidCalendarDateError } from './InvalidCalendarDateError';
import { FutureBirthdateError } from './FutureBirthdateError';
import { CapabilityUnavailableError } from './CapabilityUnavailableError';
import { TimeSourceUnavailableError } from './TimeSourceUnavailableError';
import { DateOutOfRangeError } from './DateOutOfRangeError';

describe('DomainError', () => {
  it.each([
    [new InvalidFormatError('abc', 'gregorian'), 'INVALID_FORMAT', 'InvalidFormatError'],
    [new InvalidCalendarDateError('jalali', '1404-12-30'), 'INVALID_CALENDAR_DATE', 'InvalidCalendarDateError'],
    [new FutureBirthdateError('2030-01-01', '2025-10-18'), 'FUTURE_BIRTHDATE', 'FutureBirthdateError'],
    [new DateOutOfRangeError('jalaali-js', 'gregorian', '0500-01-01'), 'DATE_OUT_OF_RANGE', 'DateOutOfRangeError'],
    [new CapabilityUnavailableError('jalali-calendar'), 'CAPABILITY_UNAVAILABLE', 'CapabilityUnavailableError'],
    [new TimeSourceUnavailableError('https://time.test', 'timeout'), 'TIME_SOURCE_UNAVAILABLE', 'TimeSourceUnavailableError'],
  ])('%p should carry code %s and name %s', (error, code, name) => {
    expect(error.code).toBe(code);
    expect(error.name).toBe(name);
    expect(error).toBeInstanceOf(Error);
    expect(isDomainError(error)).toBe(true);
  });

  it('should build readable messages', () => {
    expect(new InvalidFormatError('1370 04 24', 'jalali').message).toBe(
      'Invalid jalali date: "1370 04 24". Use YYYY-MM-DD (e.g., 1370-04-24).'
    );
    expect(new InvalidCalendarDateError('gregorian', '2025-02-30', 'day out of range').message).toBe(
      'Not a valid gregorian date: 2025-02-30 (day out of range)'
    );
    expect(new FutureBirthdateError('2030-01-01', '2025-10-18').message).toBe(
      'Birthdate cannot be in the future: 2030-01-01 is after 2025-10-18'
    );
    expect(new DateOutOfRangeError('jalaali-js', 'jalali', '3177-12-01').message).toBe(
      'The jalaali-js backend cannot convert the jalali date 3177-12-01'
    );
  });

  it('should not treat plain errors as domain errors', () => {
    expect(isDomainError(new Error('boom'))).toBe(false);
    expect(isDomainError('INVALID_FORMAT')).toBe(false);
  });
});
