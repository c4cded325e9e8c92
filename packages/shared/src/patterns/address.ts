/**
 * Address heuristics: postal codes, streets, PO boxes, countries and
 * `City, Region` lines.
 */

export const POSTAL_CODE_PATTERNS: Readonly<Record<string, RegExp>> = {
  // 10319, 94104, 94104-1234, 75001
  fiveDigit: /\b\d{5}(?:-\d{4})?\b/,
  // SW1A 1AA, EC2V 7HN
  uk: /\b[A-Z]{1,2}\d[A-Z\d]?\s*\d[A-Z]{2}\b/,
  // 1012 AB
  nl: /\b\d{4}\s?[A-Z]{2}\b/,
  // 1010 Wien, 8000 Zürich (four digits alone are too often years)
  fourDigitWithCity: /\b\d{4}\s+[A-ZÄÖÜ][a-zäöüß]+/,
};

export const STREET_PATTERNS: readonly RegExp[] = [
  /\b\d+[A-Z]?\s+(?:[A-Z][a-z]+\s+){1,2}(?:Street|St\.?|Avenue|Ave\.?|Road|Rd\.?|Drive|Dr\.?|Lane|Ln\.?|Boulevard|Blvd\.?|Way|Court|Ct\.?)(?=\W|$)/,
  /[A-ZÄÖÜ][a-zäöüß]+(?:straße|strasse|str\.|weg|platz|allee|gasse|ring|damm)\s*\d+[a-zA-Z]?/,
  /[A-ZÄÖÜ][a-zäöüß]+\s+(?:Straße|Strasse|Weg|Platz|Allee)\s+\d+[a-zA-Z]?/,
  /\bPMB\s+\d+/,
  /\bP\.?\s?O\.?\s+Box\s+\d+/i,
  /\bPostfach\s+\d+/,
];

export const COUNTRY_NAMES: readonly string[] = [
  'Germany',
  'United States',
  'USA',
  'United Kingdom',
  'UK',
  'France',
  'Netherlands',
  'Belgium',
  'Austria',
  'Switzerland',
  'Italy',
  'Spain',
  'Portugal',
  'Sweden',
  'Denmark',
  'Norway',
  'Poland',
  'Czech Republic',
  'Ireland',
  'Canada',
  'Deutschland',
  'Vereinigte Staaten',
  'Großbritannien',
  'Frankreich',
  'Niederlande',
  'Belgien',
  'Österreich',
  'Schweiz',
  'Italien',
  'Spanien',
];

/** `San Francisco, California` or `Austin, TX` */
const CITY_REGION = /^[A-ZÄÖÜ][a-zäöüß]+(?:\s+[A-ZÄÖÜ][a-zäöüß]+)*,\s*(?:[A-Z]{2}\b|[A-ZÄÖÜ][a-zäöüß]+(?:\s+[A-ZÄÖÜ][a-zäöüß]+)*$)/;

const COUNTRY_PATTERN = new RegExp(`(?:^|[\\s,])(?:${COUNTRY_NAMES.join('|')})(?=$|[\\s,.])`);

export function containsCountry(line: string): boolean {
  return COUNTRY_PATTERN.test(line);
}

/**
 * Whether a line reads as part of a postal address.
 *
 * @example
 * ```typescript
 * looksLikeAddress('Hauptstraße 5');         // true
 * looksLikeAddress('10115 Berlin');          // true
 * looksLikeAddress('Acme Consulting GmbH');  // false
 * ```
 */
export function looksLikeAddress(line: string): boolean {
  const trimmed = line.trim();
  if (trimmed.length < 3 || trimmed.endsWith(':')) {
    return false;
  }
  return (
    Object.values(POSTAL_CODE_PATTERNS).some((pattern) => pattern.test(trimmed)) ||
    STREET_PATTERNS.some((pattern) => pattern.test(trimmed)) ||
    containsCountry(trimmed) ||
    CITY_REGION.test(trimmed)
  );
}

/**
 * Index of the second five-digit postal code on a line, where two address
 * columns run side by side; undefined when there is no second code.
 */
export function secondPostalCodeIndex(line: string): number | undefined {
  const matches = Array.from(line.matchAll(/\b\d{5}\b/g));
  return matches.length === 2 ? matches[1]?.index : undefined;
}
