import { z } from 'zod';
import type { Language } from './i18n/Translator';
import { logger } from '../../../shared/logger';

/**
 * Presentation settings for one CLI session
 *
 * Immutable: switching language produces a new SessionConfig rather than
 * toggling shared state.
 */
export interface SessionConfig {
  readonly language: Language;
  readonly color: boolean;
}

export const DEFAULT_LANGUAGE: Language = 'fa';

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
const LanguageSchema = z.enum(['en', 'fa']);

/**
 * Get the initial session configuration
 *
 * - AGECAL_LANG: `fa` (default) or `en`; invalid values fall back to the default
 * - NO_COLOR: any non-empty value disables ANSI colors
 * - Colors are also disabled when stdout is not a terminal
 *
 * @param env - Environment to read (defaults to process.env)
 * @param isTTY - Whether stdout is a terminal
 */
export function getSessionConfig(
  env: NodeJS.ProcessEnv = process.env,
  isTTY: boolean = process.stdout.isTTY === true
): SessionConfig {
  return {
    language: parseLanguage(env.AGECAL_LANG),
    color: isTTY && !env.NO_COLOR,
  };
}

function parseLanguage(value: string | undefined): Language {
  if (value === undefined || value.trim() === '') {
    return DEFAULT_LANGUAGE;
  }
  const parsed = LanguageSchema.safeParse(value.trim().toLowerCase());
  if (!parsed.success) {
    logger.warn({ msg: 'Unknown AGECAL_LANG, using default', value, fallback: DEFAULT_LANGUAGE });
    return DEFAULT_LANGUAGE;
  }
  return parsed.data;
}
