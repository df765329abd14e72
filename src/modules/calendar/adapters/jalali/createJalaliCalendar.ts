import type { IJalaliCalendar, JalaliBackendName } from '../../application/ports/IJalaliCalendar';
import { ArithmeticJalaliCalendar } from './ArithmeticJalaliCalendar';
import { JalaaliJsCalendar } from './JalaaliJsCalendar';

/**
 * Factory for the configured Jalali backend
 *
 * `none` yields no backend at all; JalaliConverter then reports the Jalali
 * capability as unavailable.
 *
 * @param backend - Backend name from getJalaliBackendConfig()
 * @returns The calendar implementation, or null when Jalali support is disabled
 */
export function createJalaliCalendar(backend: JalaliBackendName | 'none'): IJalaliCalendar | null {
  switch (backend) {
    case 'arithmetic':
      return new ArithmeticJalaliCalendar();
    case 'jalaali-js':
      return new JalaaliJsCalendar();
    case 'none':
      return null;
  }
}
