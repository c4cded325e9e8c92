/**
 * Amount and currency patterns. Group 1 of every amount pattern is the
 * numeric token, still in document formatting.
 */

const CURRENCY_PREFIX = String.raw`(?:[€$£]|EUR|USD|GBP|CHF)?\s*`;

/** `1,234.56`, `1.234,56`, `1250`, `12.5` */
export const NUMBER_TOKEN = String.raw`(?:\d{1,3}(?:[.,]\d{3})+|\d+)(?:[.,]\d{1,2})?(?![.,]?\d)`;

const labeled = (labelSource: string): RegExp =>
  new RegExp(`${labelSource}\\s*[:\\s]\\s*${CURRENCY_PREFIX}(${NUMBER_TOKEN})`, 'i');

/**
 * Ordered from most to least specific; the first match wins.
 */
export const AMOUNT_PATTERNS: readonly RegExp[] = [
  labeled(String.raw`\bTotal\s+Amount(?:\s+Due)?`),
  labeled(String.raw`\bAmount\s+(?:Due|Invoice|Total|Payable)`),
  labeled(String.raw`\bInvoice\s+(?:Amount|Total)`),
  labeled(String.raw`\b(?:Grand\s+)?Total(?:\s+Due)?\s*:`),
  labeled(String.raw`(?<!Tax\s)(?<!VAT\s)\bAmount\s*:`),
  new RegExp(String.raw`€\s*(${NUMBER_TOKEN})\s+(?:due|total)`, 'i'),
  new RegExp(String.raw`\$\s*(${NUMBER_TOKEN})`),
  new RegExp(String.raw`£\s*(${NUMBER_TOKEN})`),
  labeled(String.raw`\bGesamtbetrag`),
  labeled(String.raw`\bRechnungsbetrag`),
  labeled(String.raw`\bBetrag`),
  new RegExp(String.raw`gross\s+amount\s+(${NUMBER_TOKEN})`, 'i'),
];

/**
 * First amount token found in the text, or undefined.
 */
export function findAmountToken(text: string): string | undefined {
  for (const pattern of AMOUNT_PATTERNS) {
    const token = pattern.exec(text)?.[1];
    if (token !== undefined) {
      return token;
    }
  }
  return undefined;
}

const EXPLICIT_CURRENCY = /\bCurrency\s*:\s*([A-Za-z]{3})\b/i;

/**
 * Markers checked in order when no `Currency:` label is present.
 */
const CURRENCY_MARKERS: readonly { code: string; pattern: RegExp }[] = [
  { code: 'EUR', pattern: /€|\bEUR\b/ },
  { code: 'USD', pattern: /\$|\bUSD\b/ },
  { code: 'GBP', pattern: /£|\bGBP\b/ },
  { code: 'CHF', pattern: /\bCHF\b/ },
];

/**
 * ISO code of the document currency.
 *
 * @example
 * ```typescript
 * detectCurrency('Currency: eur');   // 'EUR'
 * detectCurrency('Total: £12.00');   // 'GBP'
 * detectCurrency('Total: 12.00');    // undefined
 * ```
 */
export function detectCurrency(text: string): string | undefined {
  const explicit = EXPLICIT_CURRENCY.exec(text)?.[1];
  if (explicit !== undefined) {
    return explicit.toUpperCase();
  }
  return CURRENCY_MARKERS.find(({ pattern }) => pattern.test(text))?.code;
}

/**
 * ISO code named or symbolized in a money string, e.g. `$1,200` or `EUR 40`.
 */
export function currencyOf(money: string): string | undefined {
  if (/€|\bEUR\b|\beuros?\b/i.test(money)) return 'EUR';
  if (/£|\bGBP\b|\bpounds?\b/i.test(money)) return 'GBP';
  if (/\bCHF\b|\bfrancs?\b/i.test(money)) return 'CHF';
  if (/\$|\bUSD\b|\bdollars?\b/i.test(money)) return 'USD';
  return undefined;
}
