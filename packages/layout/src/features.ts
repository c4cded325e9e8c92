import type { DocumentText } from '@fieldwise/contracts';
import { hasSideBySideAnchor, hasVendorFingerprint } from '@fieldwise/shared';

/**
 * Layout features in vector order. A trained model receives its input in
 * exactly this order, so entries are only ever appended.
 */
export const LAYOUT_FEATURE_NAMES = [
  // Text statistics
  'line_count',
  'non_empty_line_count',
  'char_count',
  'word_count',
  'avg_line_length',
  'max_line_length',
  'min_line_length',
  'line_length_variance',
  // Structural flags (0 or 1)
  'has_from_to',
  'has_bill_from_to',
  'has_sender_recipient',
  'has_german_labels',
  'has_vendor_fingerprint',
  'has_side_by_side_anchor',
  'has_invoice_keyword',
  'has_date_pattern',
  // Punctuation per character
  'colon_density',
  'comma_density',
  'period_density',
] as const;

export type LayoutFeatureName = (typeof LAYOUT_FEATURE_NAMES)[number];

export type LayoutFeatures = Readonly<Record<LayoutFeatureName, number>>;

const DATE_PATTERN = /\b\d{1,4}[./-]\d{1,2}[./-]\d{2,4}\b/;

const flag = (condition: boolean): number => (condition ? 1 : 0);

const density = (text: string, char: string): number =>
  text.length > 0 ? (text.split(char).length - 1) / text.length : 0;

/**
 * Structural features of a document's text.
 *
 * @example
 * ```typescript
 * const features = extractLayoutFeatures(createDocumentText(['From: Acme', 'To: Beta']));
 * features.has_from_to;  // 1
 * features.line_count;   // 2
 * ```
 */
export function extractLayoutFeatures(doc: DocumentText): LayoutFeatures {
  const { lines, text } = doc;
  const lengths = lines.filter((line) => line.length > 0).map((line) => line.length);
  const avg = lengths.length > 0 ? lengths.reduce((sum, length) => sum + length, 0) / lengths.length : 0;
  const variance =
    lengths.length > 1 ? lengths.reduce((sum, length) => sum + (length - avg) ** 2, 0) / lengths.length : 0;
  const lower = text.toLowerCase();

  return {
    line_count: lines.length,
    non_empty_line_count: lengths.length,
    char_count: text.length,
    word_count: text.split(/\s+/).filter((word) => word.length > 0).length,
    avg_line_length: avg,
    max_line_length: lengths.length > 0 ? Math.max(...lengths) : 0,
    min_line_length: lengths.length > 0 ? Math.min(...lengths) : 0,
    line_length_variance: variance,

    has_from_to: flag(text.includes('From:') && text.includes('To:')),
    has_bill_from_to: flag(text.includes('Bill from:') || text.includes('Bill to:')),
    has_sender_recipient: flag(text.includes('Sender:') || text.includes('Recipient:')),
    has_german_labels: flag(text.includes('Absender:') || text.includes('Empfänger:')),
    has_vendor_fingerprint: flag(hasVendorFingerprint(text)),
    has_side_by_side_anchor: flag(hasSideBySideAnchor(lines)),
    has_invoice_keyword: flag(lower.includes('invoice') || lower.includes('rechnung')),
    has_date_pattern: flag(DATE_PATTERN.test(text)),

    colon_density: density(text, ':'),
    comma_density: density(text, ','),
    period_density: density(text, '.'),
  };
}

export function toFeatureVector(features: LayoutFeatures): number[] {
  return LAYOUT_FEATURE_NAMES.map((name) => features[name]);
}
