import { DateTime } from 'luxon';
import { FixedClock, SystemClock } from './SystemClock';
import { GregorianDate } from '../../calendar/domain/value-objects/GregorianDate';

describe('SystemClock', () => {
  it("should return the machine's local calendar day", () => {
    const expected = DateTime.local();
    const today = new SystemClock().today();

    // Guard against the test straddling midnight
    const after = DateTime.local();
    expect([expected.toISODate(), after.toISODate()]).toContain(today.toString());
  });
});

describe('FixedClock', () => {
  it('should always return the date it was built with', () => {
    const clock = new FixedClock(GregorianDate.of(2025, 10, 18));

    expect(clock.today().toString()).toBe('2025-10-18');
    expect(clock.today().toString()).toBe('2025-10-18');
  });
});
