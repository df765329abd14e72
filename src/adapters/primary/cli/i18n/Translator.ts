import en from './locales/en.json';
import fa from './locales/fa.json';

export type Language = 'en' | 'fa';

export type MessageKey = keyof typeof en;

export type MessageParams = Record<string, string | number>;

export type Translate = (key: MessageKey, params?: MessageParams) => string;

const CATALOGS: Record<Language, Record<MessageKey, string>> = { en, fa };

/**
 * Right-to-left languages are right-aligned inside boxes
 */
export function isRightToLeft(language: Language): boolean {
  return language === 'fa';
}

export function otherLanguage(language: Language): Language {
  return language === 'fa' ? 'en' : 'fa';
}

/**
 * Returns a lookup function bound to one catalog.
 * `{name}` placeholders are replaced from params; unknown placeholders stay as written.
 */
export function createTranslator(language: Language): Translate {
  const catalog = CATALOGS[language];
  return (key, params = {}) =>
    catalog[key].replace(/\{(\w+)\}/g, (placeholder, name: string) => {
      const value = params[name];
      return value === undefined ? placeholder : String(value);
    });
}
