/**
 * Banking identifier patterns. Captured tokens are candidates only; the
 * validators decide whether they are kept.
 */

/** `IBAN: DE89 3704 0044 0532 0130 00`; group 1 keeps the spacing */
export const IBAN_LABELED = /\bIBAN\b\s*:?\s*([A-Z]{2}\s?\d{2}(?:\s?[A-Z0-9]{4}){2,7}(?:\s?[A-Z0-9]{1,3})?)/i;

/** Unlabeled IBAN-shaped tokens, uppercase only */
export const IBAN_CANDIDATE = /\b[A-Z]{2}\d{2}(?:\s?[A-Z0-9]{4}){2,7}(?:\s?[A-Z0-9]{1,3})?\b/g;

export const BIC_LABELED = /\b(?:BIC|SWIFT)(?:\s*\/\s*SWIFT)?(?:\s*Code)?\s*:?\s*([A-Z]{6}[A-Z0-9]{2}(?:[A-Z0-9]{3})?)\b/i;

export const ROUTING_LABELED = /\b(?:Routing\s*(?:Number|No\.?|#)?|ABA(?:\s*(?:Routing|Number|No\.?|#))*|RTN)\s*[:#]?\s*(\d{9})\b/i;

export const ACCOUNT_LABELED = /\b(?:Account\s+(?:Number|No\.?)|Acct\.?(?:\s*(?:#|No\.?|Number))?|Bank(?:ing)?\s+Account|A\/C)\s*[:#]?\s*(\d{4,17})\b/i;

export const SORT_CODE_LABELED = /\b(?:Sort\s*Code|SC)\s*[:#]?\s*(\d{2}[-\s]?\d{2}[-\s]?\d{2})\b/i;

/**
 * Bank name candidates, labeled first. Group 1 is the name; unlabeled
 * patterns never cross a line break.
 */
export const BANK_NAME_PATTERNS: readonly RegExp[] = [
  /^\s*(?:Bank(?:\s*Name)?|Bankname|Kreditinstitut)\s*:\s*(.+?)\s*$/im,
  /\b((?:[A-Z][\w&.'-]* +){1,3}Bank(?: +of +[A-Z][A-Za-z]+)?(?: +(?:AG|GmbH|PLC|plc|N\.A\.))?)(?!\w)/,
  /\b(Bank +of +[A-Z][A-Za-z]+(?: +[A-Z][A-Za-z]+)?)\b/,
  /\b((?:Postbank|Commerzbank|Sparkasse|Volksbank)(?: +[A-Z][\wäöü-]+)?)(?![\wäöü-])/,
];

export const PAYMENT_ADDRESS_HEADER = /PAYMENT\s+ADDRESS/i;
