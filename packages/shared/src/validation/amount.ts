import type { ValidatedToken } from '@fieldwise/contracts';

/**
 * Number formatting convention.
 * - `us`: `1,234.56` (comma thousands, dot decimal)
 * - `eu`: `1.234,56` (dot thousands, comma decimal)
 */
export type NumberLocale = 'us' | 'eu';

export interface AmountHints {
  /** ISO currency code of the document, e.g. `EUR` */
  currency?: string | undefined;

  /** Document language, e.g. `de` or `en-GB` */
  language?: string | undefined;
}

export interface AmountParseResult extends ValidatedToken<string> {
  /** Parsed value; 0 when unparsable */
  readonly amount: number;

  /** Convention the separators were read in */
  readonly locale: NumberLocale;
}

const EU_LANGUAGES = new Set(['de', 'fr', 'es', 'it', 'nl', 'pt', 'pl', 'da', 'sv', 'fi']);
const US_LANGUAGES = new Set(['en']);
const EU_CURRENCIES = new Set(['EUR', 'CHF', 'DKK', 'SEK', 'NOK', 'PLN']);
const US_CURRENCIES = new Set(['USD', 'GBP', 'CAD', 'AUD']);

const CURRENCY_MARKERS = /EUR|USD|GBP|CHF|€|\$|£/gi;

/**
 * Locale suggested by the hints. The language wins over the currency.
 */
export function localeFromHints(hints: AmountHints): NumberLocale | undefined {
  const language = hints.language?.toLowerCase().split(/[-_]/)[0];
  if (language !== undefined) {
    if (EU_LANGUAGES.has(language)) return 'eu';
    if (US_LANGUAGES.has(language)) return 'us';
  }

  const currency = hints.currency?.toUpperCase();
  if (currency !== undefined) {
    if (EU_CURRENCIES.has(currency)) return 'eu';
    if (US_CURRENCIES.has(currency)) return 'us';
  }

  return undefined;
}

const decimalSeparatorOf = (locale: NumberLocale): '.' | ',' => (locale === 'us' ? '.' : ',');

/**
 * Decide which separator is the decimal one.
 *
 * - both `.` and `,`: the last one
 * - one kind, repeated: thousands
 * - one kind, once, not followed by exactly three digits: decimal
 * - one kind, once, followed by three digits: the locale decides
 */
function resolveDecimalSeparator(body: string, locale: NumberLocale): '.' | ',' | undefined {
  const lastDot = body.lastIndexOf('.');
  const lastComma = body.lastIndexOf(',');

  if (lastDot >= 0 && lastComma >= 0) {
    return lastDot > lastComma ? '.' : ',';
  }
  if (lastDot < 0 && lastComma < 0) {
    return undefined;
  }

  const separator = lastDot >= 0 ? '.' : ',';
  const groups = body.split(separator);
  if (groups.length > 2) {
    return undefined;
  }
  if ((groups[1] ?? '').length !== 3) {
    return separator;
  }
  return decimalSeparatorOf(locale) === separator ? separator : undefined;
}

/**
 * Parse a monetary amount, disambiguating thousands and decimal separators.
 * Never throws: unparsable or non-positive input yields `valid: false`.
 *
 * @example
 * ```typescript
 * normalizeAmount('1.234,56', { currency: 'EUR', language: 'de' });
 * // { amount: 1234.56, normalized: '1234.56', locale: 'eu', valid: true, ... }
 *
 * normalizeAmount('1.234', { language: 'de' }).amount; // 1234
 * normalizeAmount('1.234').amount;                      // 1.234
 * ```
 */
export function normalizeAmount(token: string, hints: AmountHints = {}): AmountParseResult {
  const hinted = localeFromHints(hints) ?? 'us';
  const invalid = (locale: NumberLocale = hinted): AmountParseResult => ({
    raw: token,
    normalized: '',
    amount: 0,
    locale,
    valid: false,
  });

  const body = token.replace(CURRENCY_MARKERS, '').replace(/[\s']/g, '');
  if (!/^\d(?:[\d.,]*\d)?$/.test(body)) {
    return invalid();
  }

  const decimalSeparator = resolveDecimalSeparator(body, hinted);
  let integerPart = body;
  let fractionPart = '';
  let locale = hinted;

  if (decimalSeparator !== undefined) {
    const index = body.lastIndexOf(decimalSeparator);
    integerPart = body.slice(0, index);
    fractionPart = body.slice(index + 1);
    locale = decimalSeparator === '.' ? 'us' : 'eu';
  } else if (body.includes('.')) {
    locale = 'eu';
  } else if (body.includes(',')) {
    locale = 'us';
  }

  const thousandsSeparator = locale === 'us' ? ',' : '.';
  const integerDigits = integerPart.split(thousandsSeparator).join('');
  if (!/^\d+$/.test(integerDigits) || !/^\d*$/.test(fractionPart)) {
    return invalid(locale);
  }

  const normalized = `${integerDigits.replace(/^0+(?=\d)/, '')}.${fractionPart.padEnd(2, '0')}`;
  const amount = Number(normalized);
  if (!Number.isFinite(amount) || amount <= 0) {
    return { raw: token, normalized, amount, locale, valid: false };
  }

  return { raw: token, normalized, amount, locale, valid: true };
}
