import { z } from 'zod';
import { logger } from '../../../shared/logger';

/**
 * Time Source Configuration
 *
 * Defaults for resolving "today". These are code constants: the plausible
 * window and the fallback date are part of the product behaviour, only the
 * endpoints and the timeout can be overridden through the environment.
 */

/**
 * Clock readings outside this window are not trusted
 */
export const PLAUSIBLE_YEAR_WINDOW = { min: 1970, max: 2100 } as const;

/**
 * Date used when neither the system clock nor any time source is trusted
 */
export const FALLBACK_TODAY = { year: 2000, month: 1, day: 1 } as const;

export const DEFAULT_TIME_SOURCE_URLS: readonly string[] = [
  'https://worldtimeapi.org/api/ip',
  'https://worldtimeapi.org/api/timezone/Etc/UTC',
];

export const DEFAULT_TIME_SOURCE_TIMEOUT_MS = 3000;

export interface TimeSourceConfig {
  urls: string[];
  timeoutMs: number;
}

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
const UrlListSchema = z.array(z.string().url()).min(1);

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
const TimeoutSchema = z.coerce.number().int().min(1).max(30_000);

/**
 * Get time source configuration
 *
 * ```bash
 * AGECAL_TIME_SOURCE_URLS=https://time.example/a,https://time.example/b
 * AGECAL_TIME_SOURCE_TIMEOUT_MS=1500
 * ```
 *
 * **Fallback Behavior:**
 * - Unset → defaults
 * - Any invalid URL in the list, or a timeout outside 1–30000 ms → default
 *   for that setting, with a warning (no error thrown)
 *
 * @param env - Environment to read (defaults to process.env)
 */
export function getTimeSourceConfig(env: NodeJS.ProcessEnv = process.env): TimeSourceConfig {
  return {
    urls: parseUrls(env.AGECAL_TIME_SOURCE_URLS),
    timeoutMs: parseTimeout(env.AGECAL_TIME_SOURCE_TIMEOUT_MS),
  };
}

function parseUrls(value: string | undefined): string[] {
  if (value === undefined || value.trim() === '') {
    return [...DEFAULT_TIME_SOURCE_URLS];
  }

  const candidates = value
    .split(',')
    .map((url) => url.trim())
    .filter((url) => url.length > 0);
  const parsed = UrlListSchema.safeParse(candidates);
  if (!parsed.success) {
    logger.warn({
      msg: 'Invalid AGECAL_TIME_SOURCE_URLS, using defaults',
      value,
      error: parsed.error.issues.map((issue) => issue.message).join('; '),
    });
    return [...DEFAULT_TIME_SOURCE_URLS];
  }
  return parsed.data;
}

function parseTimeout(value: string | undefined): number {
  if (value === undefined || value.trim() === '') {
    return DEFAULT_TIME_SOURCE_TIMEOUT_MS;
  }

  const parsed = TimeoutSchema.safeParse(value.trim());
  if (!parsed.success) {
    logger.warn({
      msg: 'Invalid AGECAL_TIME_SOURCE_TIMEOUT_MS, using default',
      value,
      fallback: DEFAULT_TIME_SOURCE_TIMEOUT_MS,
    });
    return DEFAULT_TIME_SOURCE_TIMEOUT_MS;
  }
  return parsed.data;
}
