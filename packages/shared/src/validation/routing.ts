import type { ValidatedToken } from '@fieldwise/contracts';

/**
 * Federal Reserve routing symbol prefixes: 01-12 (regular), 21-32 (thrift),
 * 61-72 (electronic), 80 (traveler's checks).
 */
const ABA_PREFIX_RANGES: readonly (readonly [number, number])[] = [
  [1, 12],
  [21, 32],
  [61, 72],
  [80, 80],
];

const ABA_WEIGHTS = [3, 7, 1, 3, 7, 1, 3, 7, 1] as const;

/**
 * Validate a 9-digit ABA routing number: prefix range, weighted checksum
 * `3·(d1+d4+d7) + 7·(d2+d5+d8) + (d3+d6+d9) ≡ 0 (mod 10)`, and no
 * repeated-digit strings such as `000000000`.
 *
 * @example
 * ```typescript
 * validateAbaRouting('121000248'); // true
 * validateAbaRouting('121000247'); // false
 * ```
 */
export function validateAbaRouting(token: string): boolean {
  const value = token.trim();
  if (!/^\d{9}$/.test(value) || /^(\d)\1{8}$/.test(value)) {
    return false;
  }

  const prefix = Number(value.slice(0, 2));
  if (!ABA_PREFIX_RANGES.some(([low, high]) => prefix >= low && prefix <= high)) {
    return false;
  }

  const checksum = Array.from(value, Number).reduce(
    (sum, digit, index) => sum + digit * (ABA_WEIGHTS[index] ?? 0),
    0,
  );
  return checksum % 10 === 0;
}

/**
 * Validate a UK sort code. There is no checksum; the only rule is exactly
 * six digits once separators are removed.
 */
export function inspectSortCode(token: string): ValidatedToken<string> {
  const digits = token.replace(/\D/g, '');
  if (/[A-Za-z]/.test(token) || digits.length !== 6) {
    return { raw: token, normalized: digits, valid: false };
  }
  return {
    raw: token,
    normalized: `${digits.slice(0, 2)}-${digits.slice(2, 4)}-${digits.slice(4)}`,
    valid: true,
  };
}

/**
 * Format a sort code as `DD-DD-DD`. Invalid input yields its digits only,
 * so the function is idempotent.
 *
 * @example
 * ```typescript
 * normalizeSortCode('20 00 00'); // '20-00-00'
 * normalizeSortCode('2000');     // '2000'
 * ```
 */
export function normalizeSortCode(token: string): string {
  return inspectSortCode(token).normalized;
}

export function isValidSortCode(token: string): boolean {
  return inspectSortCode(token).valid;
}
