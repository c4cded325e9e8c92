/**
 * Structural email check: exactly one `@`, a non-empty local part, and a
 * domain containing a dot with no empty labels. Whitespace is rejected.
 */
export function isValidEmail(token: string): boolean {
  if (/\s/.test(token)) {
    return false;
  }

  const parts = token.split('@');
  if (parts.length !== 2) {
    return false;
  }

  const [local = '', domain = ''] = parts;
  if (local.length === 0 || !domain.includes('.')) {
    return false;
  }
  return domain.split('.').every((label) => label.length > 0);
}
