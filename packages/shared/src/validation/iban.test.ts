/**
 * IBAN validation tests
 */

import { describe, it, expect } from 'vitest';
import { compactIban, ibanMod97, inspectIban, validateIban, looksLikeIban } from './iban.js';

describe('compactIban', () => {
  it('should uppercase and remove whitespace', () => {
    expect(compactIban('de89 3704 0044 0532 0130 00')).toBe('DE89370400440532013000');
    expect(compactIban('GB29\tNWBK\n6016')).toBe('GB29NWBK6016');
  });
});

describe('ibanMod97', () => {
  it('should return 1 for a valid IBAN', () => {
    expect(ibanMod97('DE89370400440532013000')).toBe(1);
  });

  it('should return the remainder for an invalid IBAN', () => {
    expect(ibanMod97('DE89370400440532013001')).toBe(28);
    expect(ibanMod97('AB12345678901234567890')).toBe(92);
  });

  it('should return undefined for characters outside A-Z and 0-9', () => {
    expect(ibanMod97('DE89-3704-0044')).toBeUndefined();
  });
});

describe('inspectIban', () => {
  it('should accept valid IBANs from several countries', () => {
    for (const iban of [
      'DE89370400440532013000',
      'GB29NWBK60161331926819',
      'GB82WEST12345698765432',
      'FR1420041010050500013M02606',
      'NL91ABNA0417164300',
      'CH9300762011623852957',
      'US64SVBKUS6S3300958879',
    ]) {
      expect(inspectIban(iban).valid).toBe(true);
    }
  });

  it('should normalize spacing and case', () => {
    const result = inspectIban('de89 3704 0044 0532 0130 00');
    expect(result).toEqual({
      raw: 'de89 3704 0044 0532 0130 00',
      normalized: 'DE89370400440532013000',
      valid: true,
      countryCode: 'DE',
      reason: undefined,
    });
  });

  it('should report the failure reason', () => {
    expect(inspectIban('').reason).toBe('empty');
    expect(inspectIban('DE89').reason).toBe('length');
    expect(inspectIban('D189370400440532013000').reason).toBe('format');
    expect(inspectIban('DE89370400440532013001').reason).toBe('checksum');
  });

  it('should keep the country code of a checksum failure', () => {
    expect(inspectIban('DE89370400440532013001').countryCode).toBe('DE');
  });
});

describe('validateIban', () => {
  it('should reject a wrong check digit', () => {
    expect(validateIban('DE89370400440532013000')).toBe(true);
    expect(validateIban('AB12345678901234567890')).toBe(false);
  });
});

describe('looksLikeIban', () => {
  it('should accept well-formed tokens regardless of checksum', () => {
    expect(looksLikeIban('DE89370400440532013001')).toBe(true);
  });

  it('should reject tokens of the wrong shape', () => {
    expect(looksLikeIban('HELLO')).toBe(false);
    expect(looksLikeIban('1234567890123456')).toBe(false);
  });
});
