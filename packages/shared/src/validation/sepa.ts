/**
 * IBAN country prefixes of the SEPA scheme: the EU member states, the EEA
 * states, and the non-EEA participants.
 */
export const SEPA_COUNTRY_CODES = [
  // EU
  'AT', 'BE', 'BG', 'CY', 'CZ', 'DE', 'DK', 'EE', 'ES', 'FI', 'FR', 'GR', 'HR', 'HU',
  'IE', 'IT', 'LT', 'LU', 'LV', 'MT', 'NL', 'PL', 'PT', 'RO', 'SE', 'SI', 'SK',
  // EEA
  'IS', 'LI', 'NO',
  // Other participants
  'AD', 'CH', 'GB', 'GI', 'MC', 'SM', 'VA',
] as const;

export type SepaCountryCode = (typeof SEPA_COUNTRY_CODES)[number];

const SEPA_COUNTRY_CODE_SET: ReadonlySet<string> = new Set(SEPA_COUNTRY_CODES);

export function isSepaCountry(countryCode: string): countryCode is SepaCountryCode {
  return SEPA_COUNTRY_CODE_SET.has(countryCode.toUpperCase());
}
