/**
 * Validators and normalizers for banking and numeric tokens.
 *
 * Pure functions: no logging, no exceptions for bad input.
 *
 * @module @fieldwise/shared/validation
 */

export {
  IBAN_MIN_LENGTH,
  IBAN_MAX_LENGTH,
  compactIban,
  ibanMod97,
  inspectIban,
  validateIban,
  looksLikeIban,
  type IbanFailure,
  type IbanInspection,
} from './iban.js';
export { inspectBic, validateBic, looksLikeBic, type BicInspection } from './bic.js';
export { validateAbaRouting, inspectSortCode, normalizeSortCode, isValidSortCode } from './routing.js';
export {
  normalizeAmount,
  localeFromHints,
  type AmountHints,
  type AmountParseResult,
  type NumberLocale,
} from './amount.js';
export { isValidEmail } from './email.js';
export { SEPA_COUNTRY_CODES, isSepaCountry, type SepaCountryCode } from './sepa.js';
