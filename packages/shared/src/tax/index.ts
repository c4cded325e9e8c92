/**
 * Tax identifier validation (offline syntax check only).
 *
 * @module @fieldwise/shared/tax
 */

export { TAX_ID_FORMATS, EIN_PATTERN, type TaxIdFormat, type TaxIdKind } from './formats.js';
export {
  normalizeTaxId,
  validateTaxId,
  type TaxIdValidationResult,
  type TaxIdErrorCode,
} from './tax-id.js';
