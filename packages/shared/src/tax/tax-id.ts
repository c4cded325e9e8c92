import { EIN_PATTERN, TAX_ID_FORMATS, type TaxIdKind } from './formats.js';

/**
 * Error codes for tax id validation failures
 */
export type TaxIdErrorCode = 'EMPTY_INPUT' | 'UNKNOWN_PREFIX' | 'INVALID_FORMAT';

/**
 * Result of tax id format validation
 */
export interface TaxIdValidationResult {
  readonly valid: boolean;

  /** Uppercase without separators; an EIN keeps its dash */
  readonly normalized: string;

  readonly kind: TaxIdKind | undefined;
  readonly countryCode: string | undefined;
  readonly errorCode: TaxIdErrorCode | undefined;
}

/**
 * Uppercase and drop whitespace, dots, dashes and underscores.
 *
 * @example
 * ```typescript
 * normalizeTaxId('de 123 456 789'); // 'DE123456789'
 * normalizeTaxId('CHE-123.456.789'); // 'CHE123456789'
 * ```
 */
export function normalizeTaxId(taxId: string): string {
  return taxId.toUpperCase().replace(/[\s.\-_]/g, '');
}

/**
 * Offline syntax check of a VAT number, Swiss UID or US EIN.
 * Does not confirm that the identifier is registered.
 *
 * @example
 * ```typescript
 * validateTaxId('DE123456789').kind; // 'eu-vat'
 * validateTaxId('12-3456789').kind;  // 'us-ein'
 * validateTaxId('US123').errorCode;  // 'UNKNOWN_PREFIX'
 * ```
 */
export function validateTaxId(taxId: string): TaxIdValidationResult {
  const trimmed = taxId.trim();
  if (trimmed.length === 0) {
    return { valid: false, normalized: '', kind: undefined, countryCode: undefined, errorCode: 'EMPTY_INPUT' };
  }

  if (EIN_PATTERN.test(trimmed)) {
    return { valid: true, normalized: trimmed, kind: 'us-ein', countryCode: 'US', errorCode: undefined };
  }

  const normalized = normalizeTaxId(trimmed);
  const format = TAX_ID_FORMATS.find((candidate) => normalized.startsWith(candidate.prefix));
  if (format === undefined) {
    return { valid: false, normalized, kind: undefined, countryCode: undefined, errorCode: 'UNKNOWN_PREFIX' };
  }

  const valid = format.pattern.test(normalized);
  return {
    valid,
    normalized,
    kind: format.kind,
    countryCode: format.countryCode,
    errorCode: valid ? undefined : 'INVALID_FORMAT',
  };
}
