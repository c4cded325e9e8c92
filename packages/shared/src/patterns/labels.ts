/**
 * Party labels and the structural triggers derived from them.
 */

/**
 * A line-anchored label. Group 1 captures whatever follows the colon.
 */
const label = (source: string): RegExp => new RegExp(`^\\s*${source}\\s*:\\s*(.*)$`, 'i');

/** Two-column layouts name both parties with paired headers */
export const TWO_COLUMN_SENDER_LABELS: readonly RegExp[] = [
  label('From'),
  label('Bill\\s+from'),
  label('Invoice\\s+from'),
  label('Billed\\s+by'),
];

export const TWO_COLUMN_RECIPIENT_LABELS: readonly RegExp[] = [
  label('To'),
  label('Bill\\s+to'),
  label('Invoice\\s+to'),
  label('Billed\\s+to'),
];

/** Single-column layouts list each party under its own label */
export const SINGLE_COLUMN_SENDER_LABELS: readonly RegExp[] = [
  label('Sender'),
  label('Absender'),
  label('Von'),
  label('Rechnungssteller'),
  label('Vendor'),
  label('Supplier'),
  label('Issued\\s+by'),
];

export const SINGLE_COLUMN_RECIPIENT_LABELS: readonly RegExp[] = [
  label('Recipient'),
  label('Empfänger'),
  label('Rechnungsempfänger'),
  label('An'),
  label('Customer'),
  label('Kunde'),
];

/**
 * Side-by-side header: the sender name and the recipient heading on one
 * line, e.g. `Acme, Inc. Bill to`. Group 1 is the sender.
 */
export const SIDE_BY_SIDE_ANCHOR = /^(.+?)\s+Bill\s+to\s*:?\s*$/i;

/**
 * Any `Label:` line. Ends a party block.
 */
export const GENERIC_LABEL_LINE = /^\s*[A-Za-zÄÖÜäöüß][A-Za-zÄÖÜäöüß0-9 ./#&()-]{0,40}:/;

/**
 * Vendor headers recognized by the company-specific strategy.
 */
export const VENDOR_FINGERPRINTS: readonly string[] = ['Deutsche Bahn', 'DB Vertrieb'];

/**
 * Result of searching lines for a label
 */
export interface LabelMatch {
  /** Index of the matching line */
  readonly index: number;

  /** Text after the label's colon, trimmed; may be empty */
  readonly value: string;
}

/**
 * First line matching any of the patterns.
 */
export function findLabel(lines: readonly string[], patterns: readonly RegExp[]): LabelMatch | undefined {
  for (let index = 0; index < lines.length; index++) {
    const line = lines[index] ?? '';
    for (const pattern of patterns) {
      const match = pattern.exec(line);
      if (match) {
        return { index, value: (match[1] ?? '').trim() };
      }
    }
  }
  return undefined;
}

const anyLineMatches = (lines: readonly string[], patterns: readonly RegExp[]): boolean =>
  lines.some((line) => patterns.some((pattern) => pattern.test(line)));

export function hasTwoColumnHeaders(lines: readonly string[]): boolean {
  return anyLineMatches(lines, [...TWO_COLUMN_SENDER_LABELS, ...TWO_COLUMN_RECIPIENT_LABELS]);
}

export function hasSideBySideAnchor(lines: readonly string[]): boolean {
  return anyLineMatches(lines, [SIDE_BY_SIDE_ANCHOR]);
}

export function hasSingleColumnLabels(lines: readonly string[]): boolean {
  return anyLineMatches(lines, [...SINGLE_COLUMN_SENDER_LABELS, ...SINGLE_COLUMN_RECIPIENT_LABELS]);
}

export function hasVendorFingerprint(text: string): boolean {
  return VENDOR_FINGERPRINTS.some((fingerprint) => text.includes(fingerprint));
}

export function isLabelLine(line: string): boolean {
  return GENERIC_LABEL_LINE.test(line);
}

const BOUNDARY_KEYWORDS = [
  'invoice',
  'description',
  'item',
  'quantity',
  'price',
  'amount',
  'total',
  'subtotal',
  'tax',
  'vat',
  'mwst',
  'payment',
  'due',
  'date',
  'number',
  'reference',
  'rechnung',
  'betrag',
] as const;

/**
 * Whether a line starts a new section: a header ending in a colon, an
 * all-caps heading, a horizontal rule, or a line with a document keyword.
 */
export function isSectionBoundary(line: string): boolean {
  const trimmed = line.trim();
  if (trimmed.endsWith(':') || /^[-=_]{3,}$/.test(trimmed)) {
    return true;
  }
  if (trimmed.length > 3 && trimmed === trimmed.toUpperCase() && /[A-Z]/.test(trimmed)) {
    return true;
  }
  const lower = trimmed.toLowerCase();
  return BOUNDARY_KEYWORDS.some((keyword) => lower.includes(keyword));
}
