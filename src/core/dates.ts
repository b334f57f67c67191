import { format, isValid, parse, type Locale } from 'date-fns';
import { de, enGB, es, fr, nl } from 'date-fns/locale';

/**
 * Locale-aware date parsing
 *
 * Turns a matched date string ("12.03.2020", "3rd March, 2020", "1 mars 2019")
 * into an ISO calendar date. Numeric forms follow the configured day/month/year
 * order; month names are read in every configured language.
 */

export type DateOrder = 'DMY' | 'MDY' | 'YMD';

export interface DateParserSettings {
  readonly languages: readonly string[];
  readonly dateOrder: DateOrder;
}

export const DEFAULT_DATE_SETTINGS: DateParserSettings = {
  languages: ['en'],
  dateOrder: 'DMY',
};

const LOCALES: Record<string, Locale> = {
  en: enGB,
  fr,
  de,
  nl,
  es,
};

// Two-digit years resolve to the century nearest this date, never the clock
const REFERENCE_DATE = new Date(2000, 0, 1);

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const NUMERIC_DATE = /^\d{1,4}[./-]\d{1,2}[./-]\d{1,4}$/;
const TWO_DIGIT_YEAR = /[./-]\d{2}$/;
const SEPARATORS = ['.', '/', '-'];

const TEXTUAL_FORMATS = ['d MMMM yyyy', 'd MMM yyyy', 'MMMM d yyyy', 'MMM d yyyy'];

const ENGLISH_MONTHS = new Set([
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
]);
const ENGLISH_MONTH_WORD = /\b(jan|feb|mar|apr|jun|jul|aug|sep|oct|nov|dec)([a-z]*)\b/gi;

export function isSupportedLanguage(language: string): boolean {
  return language in LOCALES;
}

function numericFormats(order: DateOrder, year: string): string[] {
  return SEPARATORS.map((sep) => {
    switch (order) {
      case 'DMY':
        return ['d', 'M', year].join(sep);
      case 'MDY':
        return ['M', 'd', year].join(sep);
      case 'YMD':
        return ['yyyy', 'M', 'd'].join(sep);
    }
  });
}

/**
 * Strip ordinals, commas and abbreviation periods, collapse whitespace
 */
function cleanDateText(text: string): string {
  return text
    .trim()
    .replace(/(\d)(?:st|nd|rd|th|er)\b/gi, '$1')
    .replace(/\bof\b/gi, ' ')
    .replace(/,/g, ' ')
    .replace(/(\p{L})\.(?=\s|$)/gu, '$1')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Reduce English month spellings date-fns does not know ("Sept", "Febr")
 * to their three-letter stem; full month names are left as written
 */
function shortenEnglishMonths(text: string): string {
  return text.replace(ENGLISH_MONTH_WORD, (word: string, stem: string) => {
    return ENGLISH_MONTHS.has(word.toLowerCase()) ? word : stem;
  });
}

function tryFormats(text: string, formats: readonly string[], locale: Locale): Date | null {
  for (const fmt of formats) {
    const parsed = parse(text, fmt, REFERENCE_DATE, { locale });
    if (isValid(parsed)) {
      return parsed;
    }
  }
  return null;
}

/**
 * Parse a date string into YYYY-MM-DD, or null when it is not a real date
 */
export function parseDate(text: string, settings: DateParserSettings = DEFAULT_DATE_SETTINGS): string | null {
  const cleaned = cleanDateText(text);
  if (!cleaned) {
    return null;
  }

  if (ISO_DATE.test(cleaned)) {
    return isValidIsoDate(cleaned) ? cleaned : null;
  }

  if (NUMERIC_DATE.test(cleaned)) {
    const year = TWO_DIGIT_YEAR.test(cleaned) ? 'yy' : 'yyyy';
    const parsed = tryFormats(cleaned, numericFormats(settings.dateOrder, year), enGB);
    return parsed ? format(parsed, 'yyyy-MM-dd') : null;
  }

  for (const language of settings.languages) {
    const locale = LOCALES[language];
    if (!locale) {
      continue;
    }
    const candidate = language === 'en' ? shortenEnglishMonths(cleaned) : cleaned;
    const parsed = tryFormats(candidate, TEXTUAL_FORMATS, locale);
    if (parsed) {
      return format(parsed, 'yyyy-MM-dd');
    }
  }

  return null;
}

/**
 * True for a syntactic YYYY-MM-DD string naming a real calendar date
 */
export function isValidIsoDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) {
    return false;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}
