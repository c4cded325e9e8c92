import type { ValidatedToken } from '@fieldwise/contracts';

/**
 * Bank (4 letters), country (2 letters), location (2 alphanumerics),
 * optional branch (3 alphanumerics).
 */
const BIC_SHAPE = /^[A-Z]{4}[A-Z]{2}[A-Z0-9]{2}(?:[A-Z0-9]{3})?$/;

export interface BicInspection extends ValidatedToken<string> {
  readonly countryCode: string | undefined;
  readonly branchCode: string | undefined;
}

export function inspectBic(token: string): BicInspection {
  const normalized = token.replace(/\s+/g, '').toUpperCase();
  if (!BIC_SHAPE.test(normalized)) {
    return { raw: token, normalized, valid: false, countryCode: undefined, branchCode: undefined };
  }
  return {
    raw: token,
    normalized,
    valid: true,
    countryCode: normalized.slice(4, 6),
    branchCode: normalized.length === 11 ? normalized.slice(8) : undefined,
  };
}

export function validateBic(token: string): boolean {
  return inspectBic(token).valid;
}

/**
 * 8 to 11 alphanumerics: the shape of a BIC without its format rules.
 */
export function looksLikeBic(token: string): boolean {
  return /^[A-Z0-9]{8,11}$/.test(token.replace(/\s+/g, '').toUpperCase());
}
