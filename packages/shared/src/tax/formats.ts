/**
 * Tax identifier formats for offline syntax checks.
 *
 * Patterns match the normalized form (uppercase, separators removed) except
 * for the US EIN, which is matched with its dash.
 */

export type TaxIdKind = 'eu-vat' | 'gb-vat' | 'ch-uid' | 'no-vat' | 'us-ein';

export interface TaxIdFormat {
  /** Prefix as written on invoices ('EL' for Greece, 'CHE' for Switzerland) */
  readonly prefix: string;
  readonly countryCode: string;
  readonly kind: TaxIdKind;
  readonly pattern: RegExp;
}

/**
 * EU member state VAT formats, keyed by VIES prefix.
 */
const EU_VAT_FORMATS: readonly TaxIdFormat[] = [
  { prefix: 'AT', countryCode: 'AT', kind: 'eu-vat', pattern: /^ATU\d{8}$/ },
  { prefix: 'BE', countryCode: 'BE', kind: 'eu-vat', pattern: /^BE[01]\d{9}$/ },
  { prefix: 'BG', countryCode: 'BG', kind: 'eu-vat', pattern: /^BG\d{9,10}$/ },
  { prefix: 'CY', countryCode: 'CY', kind: 'eu-vat', pattern: /^CY\d{8}[A-Z]$/ },
  { prefix: 'CZ', countryCode: 'CZ', kind: 'eu-vat', pattern: /^CZ\d{8,10}$/ },
  { prefix: 'DE', countryCode: 'DE', kind: 'eu-vat', pattern: /^DE\d{9}$/ },
  { prefix: 'DK', countryCode: 'DK', kind: 'eu-vat', pattern: /^DK\d{8}$/ },
  { prefix: 'EE', countryCode: 'EE', kind: 'eu-vat', pattern: /^EE\d{9}$/ },
  { prefix: 'EL', countryCode: 'GR', kind: 'eu-vat', pattern: /^EL\d{9}$/ },
  { prefix: 'ES', countryCode: 'ES', kind: 'eu-vat', pattern: /^ES[A-Z0-9]\d{7}[A-Z0-9]$/ },
  { prefix: 'FI', countryCode: 'FI', kind: 'eu-vat', pattern: /^FI\d{8}$/ },
  { prefix: 'FR', countryCode: 'FR', kind: 'eu-vat', pattern: /^FR[A-Z0-9]{2}\d{9}$/ },
  { prefix: 'HR', countryCode: 'HR', kind: 'eu-vat', pattern: /^HR\d{11}$/ },
  { prefix: 'HU', countryCode: 'HU', kind: 'eu-vat', pattern: /^HU\d{8}$/ },
  { prefix: 'IE', countryCode: 'IE', kind: 'eu-vat', pattern: /^IE(?:\d{7}[A-Z]{1,2}|\d[A-Z+*]\d{5}[A-Z])$/ },
  { prefix: 'IT', countryCode: 'IT', kind: 'eu-vat', pattern: /^IT\d{11}$/ },
  { prefix: 'LT', countryCode: 'LT', kind: 'eu-vat', pattern: /^LT(?:\d{9}|\d{12})$/ },
  { prefix: 'LU', countryCode: 'LU', kind: 'eu-vat', pattern: /^LU\d{8}$/ },
  { prefix: 'LV', countryCode: 'LV', kind: 'eu-vat', pattern: /^LV\d{11}$/ },
  { prefix: 'MT', countryCode: 'MT', kind: 'eu-vat', pattern: /^MT\d{8}$/ },
  { prefix: 'NL', countryCode: 'NL', kind: 'eu-vat', pattern: /^NL\d{9}B\d{2}$/ },
  { prefix: 'PL', countryCode: 'PL', kind: 'eu-vat', pattern: /^PL\d{10}$/ },
  { prefix: 'PT', countryCode: 'PT', kind: 'eu-vat', pattern: /^PT\d{9}$/ },
  { prefix: 'RO', countryCode: 'RO', kind: 'eu-vat', pattern: /^RO\d{2,10}$/ },
  { prefix: 'SE', countryCode: 'SE', kind: 'eu-vat', pattern: /^SE\d{12}$/ },
  { prefix: 'SI', countryCode: 'SI', kind: 'eu-vat', pattern: /^SI\d{8}$/ },
  { prefix: 'SK', countryCode: 'SK', kind: 'eu-vat', pattern: /^SK\d{10}$/ },
  { prefix: 'XI', countryCode: 'GB', kind: 'eu-vat', pattern: /^XI(?:\d{9}|\d{12}|GD\d{3}|HA\d{3})$/ },
];

/**
 * Non-EU formats seen on European and US invoices. Longer prefixes first.
 */
const OTHER_FORMATS: readonly TaxIdFormat[] = [
  { prefix: 'CHE', countryCode: 'CH', kind: 'ch-uid', pattern: /^CHE\d{9}(?:MWST|TVA|IVA)?$/ },
  { prefix: 'GB', countryCode: 'GB', kind: 'gb-vat', pattern: /^GB(?:\d{9}|\d{12}|GD\d{3}|HA\d{3})$/ },
  { prefix: 'NO', countryCode: 'NO', kind: 'no-vat', pattern: /^NO\d{9}(?:MVA)?$/ },
];

export const TAX_ID_FORMATS: readonly TaxIdFormat[] = [...OTHER_FORMATS, ...EU_VAT_FORMATS];

/**
 * US Employer Identification Number, `NN-NNNNNNN`.
 */
export const EIN_PATTERN = /^\d{2}-\d{7}$/;
