import type { ValidatedToken } from '@fieldwise/contracts';

export const IBAN_MIN_LENGTH = 15;
export const IBAN_MAX_LENGTH = 34;

const IBAN_SHAPE = /^[A-Z]{2}\d{2}[A-Z0-9]+$/;

/**
 * Reason an IBAN was rejected
 */
export type IbanFailure = 'empty' | 'length' | 'format' | 'checksum';

export interface IbanInspection extends ValidatedToken<string> {
  /** ISO country prefix of a well-formed candidate */
  readonly countryCode: string | undefined;

  readonly reason: IbanFailure | undefined;
}

/**
 * Uppercase and drop all whitespace.
 */
export function compactIban(token: string): string {
  return token.replace(/\s+/g, '').toUpperCase();
}

/**
 * ISO 7064 mod-97 remainder of an IBAN: the first four characters are moved
 * to the end, letters become 10..35, and the digit string is reduced as a
 * big integer. Returns undefined for characters outside A-Z and 0-9.
 */
export function ibanMod97(token: string): number | undefined {
  const compact = compactIban(token);
  if (!/^[A-Z0-9]+$/.test(compact)) {
    return undefined;
  }

  const rearranged = compact.slice(4) + compact.slice(0, 4);
  let digits = '';
  for (const char of rearranged) {
    const code = char.charCodeAt(0);
    digits += code >= 65 && code <= 90 ? String(code - 55) : char;
  }

  return Number(BigInt(digits) % 97n);
}

/**
 * Validate an IBAN and report why it failed.
 *
 * @example
 * ```typescript
 * inspectIban('DE89 3704 0044 0532 0130 00')
 * // { raw: 'DE89 3704 0044 0532 0130 00', normalized: 'DE89370400440532013000',
 * //   valid: true, countryCode: 'DE', reason: undefined }
 * ```
 */
export function inspectIban(token: string): IbanInspection {
  const normalized = compactIban(token);
  const reject = (reason: IbanFailure, countryCode?: string): IbanInspection => ({
    raw: token,
    normalized,
    valid: false,
    countryCode,
    reason,
  });

  if (normalized.length === 0) {
    return reject('empty');
  }
  if (normalized.length < IBAN_MIN_LENGTH || normalized.length > IBAN_MAX_LENGTH) {
    return reject('length');
  }
  if (!IBAN_SHAPE.test(normalized)) {
    return reject('format');
  }

  const countryCode = normalized.slice(0, 2);
  if (ibanMod97(normalized) !== 1) {
    return reject('checksum', countryCode);
  }

  return { raw: token, normalized, valid: true, countryCode, reason: undefined };
}

export function validateIban(token: string): boolean {
  return inspectIban(token).valid;
}

/**
 * Whether a token has the length and shape of an IBAN, whatever its checksum.
 */
export function looksLikeIban(token: string): boolean {
  const reason = inspectIban(token).reason;
  return reason === undefined || reason === 'checksum';
}
