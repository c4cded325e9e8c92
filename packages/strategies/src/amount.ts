import type { DocumentText } from '@fieldwise/contracts';
import { detectCurrency, detectLanguage, findAmountToken, normalizeAmount, type AmountHints } from '@fieldwise/shared';

/**
 * Number-format hints of a document: its currency and language.
 */
export function amountHints(doc: DocumentText): AmountHints {
  return { currency: detectCurrency(doc.text), language: detectLanguage(doc.text) };
}

/**
 * Invoice total as a canonical decimal string, e.g. `1250.00`.
 *
 * A token that cannot be normalized (such as a zero total) is kept as
 * written; the scorer gives it partial credit only.
 *
 * @example
 * ```typescript
 * extractAmount(createDocumentText('Betrag: 1.250,00 EUR\nRechnung')); // '1250.00'
 * extractAmount(createDocumentText('Amount: 1,250.00'));              // '1250.00'
 * ```
 */
export function extractAmount(doc: DocumentText): string | undefined {
  const token = findAmountToken(doc.text);
  if (token === undefined) {
    return undefined;
  }
  const parsed = normalizeAmount(token, amountHints(doc));
  return parsed.valid ? parsed.normalized : token;
}
