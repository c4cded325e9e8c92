/**
 * Tax identifier validation tests
 *
 * Offline syntax checks for EU VAT numbers, Swiss UIDs, UK and Norwegian
 * VAT numbers, and US EINs.
 */

import { describe, it, expect } from 'vitest';
import { normalizeTaxId, validateTaxId } from './tax-id.js';

describe('normalizeTaxId', () => {
  it('should convert to uppercase', () => {
    expect(normalizeTaxId('de123456789')).toBe('DE123456789');
  });

  it('should remove whitespace and separators', () => {
    expect(normalizeTaxId('DE 123 456 789')).toBe('DE123456789');
    expect(normalizeTaxId('CHE-123.456.789')).toBe('CHE123456789');
    expect(normalizeTaxId('FR-12.345_678 901')).toBe('FR12345678901');
  });
});

describe('validateTaxId', () => {
  describe('EU VAT numbers', () => {
    it('should accept valid formats', () => {
      expect(validateTaxId('DE123456789')).toEqual({
        valid: true,
        normalized: 'DE123456789',
        kind: 'eu-vat',
        countryCode: 'DE',
        errorCode: undefined,
      });
      expect(validateTaxId('ATU12345678').valid).toBe(true);
      expect(validateTaxId('NL123456789B01').valid).toBe(true);
      expect(validateTaxId('FR12345678901').valid).toBe(true);
    });

    it('should map VAT prefixes to ISO country codes', () => {
      expect(validateTaxId('EL123456789').countryCode).toBe('GR');
      expect(validateTaxId('XI123456789').countryCode).toBe('GB');
    });

    it('should reject a wrong format for a known prefix', () => {
      const result = validateTaxId('DE12345');
      expect(result.valid).toBe(false);
      expect(result.kind).toBe('eu-vat');
      expect(result.errorCode).toBe('INVALID_FORMAT');
    });
  });

  describe('other formats', () => {
    it('should accept a Swiss UID with VAT suffix', () => {
      const result = validateTaxId('CHE-123.456.789 MWST');
      expect(result.valid).toBe(true);
      expect(result.kind).toBe('ch-uid');
      expect(result.normalized).toBe('CHE123456789MWST');
    });

    it('should accept UK and Norwegian VAT numbers', () => {
      expect(validateTaxId('GB123456789').kind).toBe('gb-vat');
      expect(validateTaxId('NO123456789MVA').kind).toBe('no-vat');
    });

    it('should keep the dash of a US EIN', () => {
      expect(validateTaxId('12-3456789')).toEqual({
        valid: true,
        normalized: '12-3456789',
        kind: 'us-ein',
        countryCode: 'US',
        errorCode: undefined,
      });
    });
  });

  describe('rejections', () => {
    it('should reject empty input', () => {
      expect(validateTaxId('   ').errorCode).toBe('EMPTY_INPUT');
    });

    it('should reject unknown prefixes', () => {
      expect(validateTaxId('US123').errorCode).toBe('UNKNOWN_PREFIX');
      expect(validateTaxId('123456789').errorCode).toBe('UNKNOWN_PREFIX');
    });
  });
});
