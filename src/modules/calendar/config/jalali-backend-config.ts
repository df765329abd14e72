import { z } from 'zod';
import type { JalaliBackendName } from '../application/ports/IJalaliCalendar';
import { logger } from '../../../shared/logger';

/**
 * Backend used when AGECAL_JALALI_BACKEND is unset or unrecognised.
 * The arithmetic cycle covers every Gregorian year from 1 onward.
 */
export const DEFAULT_JALALI_BACKEND: JalaliBackendName = 'arithmetic';

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
const JalaliBackendSchema = z.enum(['arithmetic', 'jalaali-js', 'none']);

export type JalaliBackendSetting = z.infer<typeof JalaliBackendSchema>;

/**
 * Get the configured Jalali backend
 *
 * ```bash
 * AGECAL_JALALI_BACKEND=arithmetic   # 33-year cycle (default)
 * AGECAL_JALALI_BACKEND=jalaali-js   # astronomical break table
 * AGECAL_JALALI_BACKEND=none         # disable Jalali features
 * ```
 *
 * **Fallback Behavior:**
 * - Invalid value → default backend, with a warning (no error thrown)
 * - Matching is case-insensitive and ignores surrounding whitespace
 *
 * @param env - Environment to read (defaults to process.env)
 */
export function getJalaliBackendConfig(env: NodeJS.ProcessEnv = process.env): JalaliBackendSetting {
  const raw = env.AGECAL_JALALI_BACKEND;
  if (raw === undefined || raw.trim() === '') {
    return DEFAULT_JALALI_BACKEND;
  }

  const parsed = JalaliBackendSchema.safeParse(raw.trim().toLowerCase());
  if (!parsed.success) {
    logger.warn({
      msg: 'Unknown AGECAL_JALALI_BACKEND, using default',
      value: raw,
      fallback: DEFAULT_JALALI_BACKEND,
    });
    return DEFAULT_JALALI_BACKEND;
  }
  return parsed.data;
}
