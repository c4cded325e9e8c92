/**
 * Invoice metadata and tax patterns. Group 1 is the value.
 */

const MONTH = String.raw`[A-Za-zäÄ]{3,9}\.?`;

/** `2024-01-15`, `15.01.2024`, `01/15/24`, `January 15, 2024`, `15. März 2024` */
const DATE = String.raw`(\d{4}-\d{2}-\d{2}|\d{1,2}[./-]\d{1,2}[./-]\d{2,4}|${MONTH}\s+\d{1,2}(?:st|nd|rd|th)?,?\s+\d{4}|\d{1,2}\.?\s+${MONTH}\s+\d{4})`;

/** An identifier token containing at least one digit */
const IDENTIFIER = String.raw`((?=[A-Z0-9/_.-]*\d)[A-Z0-9][A-Z0-9/_.-]*[A-Z0-9]|\d)`;

export const INVOICE_NUMBER_PATTERN = new RegExp(
  String.raw`\b(?:Invoice\s*(?:Number|No\.?|#|ID)|Rechnungs(?:nummer|-?Nr\.?)|Document\s+(?:Number|No\.?)|Bill\s*(?:#|No\.?)|Reference|Ref\.?)\s*[:#]?\s*${IDENTIFIER}`,
  'i',
);

export const INVOICE_DATE_PATTERN = new RegExp(
  String.raw`\b(?:Invoice\s+Date|Date\s+of\s+Issue|Issue\s+Date|Issued(?:\s+on)?|Rechnungsdatum|Datum|(?<!Due\s)(?<!Payment\s)(?<!Delivery\s)Date)\s*:?\s*${DATE}`,
  'i',
);

export const DUE_DATE_PATTERN = new RegExp(
  String.raw`\b(?:Due\s+Date|Payment\s+Due(?:\s+Date)?|Pay(?:able)?\s+by|Due\s+on|Due|Fälligkeitsdatum|Fällig\s+am|Zahlbar\s+bis)\s*:?\s*${DATE}`,
  'i',
);

export const PAYMENT_TERMS_PATTERNS: readonly RegExp[] = [
  /^\s*(?:Payment\s+Terms|Terms(?:\s+of\s+Payment)?|Zahlungsbedingungen|Zahlungsziel)\s*:\s*(.+?)\s*$/im,
  /\b(Net\s+\d{1,3}(?:\s+days)?|Due\s+on\s+receipt)\b/i,
];

const TAX_LABEL = String.raw`(?:VAT|Sales\s+Tax|Tax|GST|HST|MwSt\.?|USt\.?|Mehrwertsteuer|Umsatzsteuer)`;
const RATE = String.raw`\d{1,2}(?:[.,]\d{1,2})?`;

export const TAX_AMOUNT_PATTERN = new RegExp(
  String.raw`\b${TAX_LABEL}(?:\s+Amount)?(?:\s*\(?${RATE}\s*%\)?)?\s*:?\s*(?:[€$£]|EUR|USD|GBP)?\s*((?:\d{1,3}(?:[.,]\d{3})+|\d+)[.,]\d{2})(?!\d)`,
  'i',
);

export const TAX_RATE_PATTERNS: readonly RegExp[] = [
  new RegExp(String.raw`\b${TAX_LABEL}(?:\s+Rate)?\s*:?\s*\(?(${RATE})\s*%`, 'i'),
  new RegExp(String.raw`(${RATE})\s*%\s*(?:VAT|MwSt|USt|Tax)\b`, 'i'),
];

export const TAX_ID_PATTERN =
  /\b(?:VAT\s*(?:Reg(?:istration)?\.?\s*)?(?:Number|No\.?|ID|#)|Tax\s*(?:ID|Number|No\.?)|TIN|EIN|USt-?Id(?:Nr)?\.?|UID)\s*[:#]?\s*([A-Z]{2,3}[A-Z0-9.-]{2,16}|\d{2}-\d{7})/i;
