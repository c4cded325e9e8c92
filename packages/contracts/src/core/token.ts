/**
 * Transient result of a validator. Never persisted.
 */
export interface ValidatedToken<T extends string | number = string> {
  /** The token as it was passed in */
  readonly raw: string;

  /** Canonical form (empty or partial when invalid) */
  readonly normalized: T;

  readonly valid: boolean;
}
