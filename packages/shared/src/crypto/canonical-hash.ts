import { createHash } from 'crypto';

/**
 * Canonical JSON stringification for deterministic hashing.
 * - Sorts object keys alphabetically
 * - Removes undefined values
 * - Uses consistent formatting (no extra whitespace)
 */
export function canonicalStringify(value: unknown): string {
  return JSON.stringify(value, (_, entry: unknown) => {
    if (entry === null || typeof entry !== 'object' || Array.isArray(entry)) {
      return entry;
    }
    const sorted: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(entry).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      if (inner !== undefined) {
        sorted[key] = inner;
      }
    }
    return sorted;
  });
}

/**
 * SHA-256 of the canonical form, as `sha256:<hex>`.
 */
export function computeConfigHash(config: unknown): string {
  const hash = createHash('sha256').update(canonicalStringify(config)).digest('hex');
  return `sha256:${hash}`;
}

/**
 * First 12 hex characters, for log lines.
 */
export function shortHash(hash: string): string {
  const [algorithm, value] = hash.split(':');
  if (algorithm === undefined || value === undefined) {
    return hash.slice(0, 12);
  }
  return `${algorithm}:${value.slice(0, 12)}`;
}
