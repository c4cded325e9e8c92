import { isResolved, toFieldValue, type FieldValue } from './field-map.js';

/**
 * Invoice metadata and tax fields extracted alongside the field map.
 * Same sentinel contract as the field map; not part of the confidence score.
 */
export const DETAIL_NAMES = [
  'invoice_number',
  'invoice_date',
  'due_date',
  'payment_terms',
  'tax_amount',
  'tax_rate',
  'tax_id',
] as const;

export type DetailName = (typeof DETAIL_NAMES)[number];

export type DocumentDetails = Readonly<Record<DetailName, FieldValue>>;

export type DocumentDetailsInput = Partial<Record<DetailName, FieldValue | null | undefined>>;

export function mapDetailNames<T>(fn: (name: DetailName) => T): Record<DetailName, T> {
  return {
    invoice_number: fn('invoice_number'),
    invoice_date: fn('invoice_date'),
    due_date: fn('due_date'),
    payment_terms: fn('payment_terms'),
    tax_amount: fn('tax_amount'),
    tax_rate: fn('tax_rate'),
    tax_id: fn('tax_id'),
  };
}

export function createDocumentDetails(input: DocumentDetailsInput = {}): DocumentDetails {
  return Object.freeze(mapDetailNames((name) => toFieldValue(input[name])));
}

export function detailsToRecord(details: DocumentDetails): Record<DetailName, string | null> {
  return mapDetailNames((name) => {
    const value = details[name];
    return isResolved(value) ? value : null;
  });
}
