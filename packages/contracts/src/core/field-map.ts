/**
 * Sentinel marking a field for which no valid value was found.
 *
 * A field value is either a non-empty, trimmed string or exactly this symbol.
 * It is never `undefined`, `null` or `''`.
 */
export const UNRESOLVED: unique symbol = Symbol.for('fieldwise.unresolved');

export type Unresolved = typeof UNRESOLVED;

/**
 * Closed, ordered set of extracted business fields.
 */
export const FIELD_NAMES = [
  'sender',
  'recipient',
  'amount',
  'currency',
  'sender_address',
  'recipient_address',
  'sender_email',
  'recipient_email',
  'iban',
  'bic',
  'bank_name',
  'payment_address',
  'routing_number',
  'account_number',
  'sort_code',
  'payment_method',
] as const;

export type FieldName = (typeof FIELD_NAMES)[number];

export type FieldValue = string | Unresolved;

/**
 * Every field name is always present.
 */
export type FieldMap = Readonly<Record<FieldName, FieldValue>>;

/**
 * Input accepted when building a field map. Missing, `null` and blank
 * values all become {@link UNRESOLVED}.
 */
export type FieldMapInput = Partial<Record<FieldName, FieldValue | null | undefined>>;

/**
 * Type guard for resolved values.
 */
export function isResolved(value: FieldValue): value is string {
  return value !== UNRESOLVED;
}

/**
 * Normalize a raw candidate into a field value.
 */
export function toFieldValue(raw: FieldValue | null | undefined): FieldValue {
  if (raw === undefined || raw === null || raw === UNRESOLVED) {
    return UNRESOLVED;
  }
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : UNRESOLVED;
}

/**
 * Build a record over every field name, in canonical order.
 */
export function mapFieldNames<T>(fn: (name: FieldName) => T): Record<FieldName, T> {
  return {
    sender: fn('sender'),
    recipient: fn('recipient'),
    amount: fn('amount'),
    currency: fn('currency'),
    sender_address: fn('sender_address'),
    recipient_address: fn('recipient_address'),
    sender_email: fn('sender_email'),
    recipient_email: fn('recipient_email'),
    iban: fn('iban'),
    bic: fn('bic'),
    bank_name: fn('bank_name'),
    payment_address: fn('payment_address'),
    routing_number: fn('routing_number'),
    account_number: fn('account_number'),
    sort_code: fn('sort_code'),
    payment_method: fn('payment_method'),
  };
}

/**
 * Create a complete, frozen field map. Unspecified fields are {@link UNRESOLVED}.
 *
 * @example
 * ```typescript
 * const map = createFieldMap({ sender: 'Acme GmbH', iban: '' });
 * map.iban === UNRESOLVED; // true
 * ```
 */
export function createFieldMap(input: FieldMapInput = {}): FieldMap {
  return Object.freeze(mapFieldNames((name) => toFieldValue(input[name])));
}

/**
 * Number of resolved values in a field map or details map.
 */
export function countResolved(map: Readonly<Record<string, FieldValue>>): number {
  return Object.values(map).filter(isResolved).length;
}

/**
 * Plain record for serialization; {@link UNRESOLVED} becomes `null`.
 */
export function fieldMapToRecord(map: FieldMap): Record<FieldName, string | null> {
  return mapFieldNames((name) => {
    const value = map[name];
    return isResolved(value) ? value : null;
  });
}
