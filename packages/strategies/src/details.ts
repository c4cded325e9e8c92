import { createDocumentDetails, type DocumentDetails, type DocumentText } from '@fieldwise/contracts';
import {
  DUE_DATE_PATTERN,
  INVOICE_DATE_PATTERN,
  INVOICE_NUMBER_PATTERN,
  PAYMENT_TERMS_PATTERNS,
  TAX_AMOUNT_PATTERN,
  TAX_ID_PATTERN,
  TAX_RATE_PATTERNS,
  normalizeAmount,
  validateTaxId,
} from '@fieldwise/shared';
import { amountHints } from './amount.js';

const firstGroup = (text: string, patterns: readonly RegExp[]): string | undefined => {
  for (const pattern of patterns) {
    const value = pattern.exec(text)?.[1]?.trim();
    if (value) {
      return value;
    }
  }
  return undefined;
};

function findTaxAmount(doc: DocumentText): string | undefined {
  const token = TAX_AMOUNT_PATTERN.exec(doc.text)?.[1];
  if (token === undefined) {
    return undefined;
  }
  const parsed = normalizeAmount(token, amountHints(doc));
  return parsed.valid ? parsed.normalized : undefined;
}

function findTaxRate(text: string): string | undefined {
  const rate = firstGroup(text, TAX_RATE_PATTERNS);
  return rate !== undefined ? `${rate.replace(',', '.')}%` : undefined;
}

function findTaxId(text: string): string | undefined {
  const candidate = TAX_ID_PATTERN.exec(text)?.[1];
  if (candidate === undefined) {
    return undefined;
  }
  const result = validateTaxId(candidate);
  return result.valid ? result.normalized : undefined;
}

/**
 * Invoice metadata and tax fields, shared by every strategy.
 *
 * Dates and payment terms are kept as written. The tax amount is
 * normalized like the invoice total, the rate is rendered as `19%` and the
 * tax id must pass {@link validateTaxId}.
 */
export function extractDocumentDetails(doc: DocumentText): DocumentDetails {
  return createDocumentDetails({
    invoice_number: firstGroup(doc.text, [INVOICE_NUMBER_PATTERN]),
    invoice_date: firstGroup(doc.text, [INVOICE_DATE_PATTERN]),
    due_date: firstGroup(doc.text, [DUE_DATE_PATTERN]),
    payment_terms: firstGroup(doc.text, PAYMENT_TERMS_PATTERNS),
    tax_amount: findTaxAmount(doc),
    tax_rate: findTaxRate(doc.text),
    tax_id: findTaxId(doc.text),
  });
}
