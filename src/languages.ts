import { UnsupportedLanguageError } from './types.js';

export const SUPPORTED_LANGUAGES = {
  id: 'Indonesian',
  fil: 'Filipino',
  ta: 'Tamil',
  th: 'Thai',
  vi: 'Vietnamese',
} as const;

export type LanguageCode = keyof typeof SUPPORTED_LANGUAGES;

export type LanguageRegistry = Readonly<Record<string, string>>;

export const LANGUAGE_CODES: readonly string[] = Object.keys(SUPPORTED_LANGUAGES);

export const DEFAULT_SOURCE_LANGUAGE = 'English';

export function isSupportedLanguage(
  code: string,
  languages: LanguageRegistry = SUPPORTED_LANGUAGES
): boolean {
  return Object.prototype.hasOwnProperty.call(languages, code);
}

export function assertSupportedLanguage(
  code: string,
  languages: LanguageRegistry = SUPPORTED_LANGUAGES
): void {
  if (!isSupportedLanguage(code, languages)) {
    throw new UnsupportedLanguageError(code, Object.keys(languages));
  }
}

export function getLanguageName(code: string, languages: LanguageRegistry = SUPPORTED_LANGUAGES): string {
  return isSupportedLanguage(code, languages) ? languages[code] : code;
}
