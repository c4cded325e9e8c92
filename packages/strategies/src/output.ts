import { createFieldMap, type DocumentText, type StrategyOutput } from '@fieldwise/contracts';
import { detectCurrency } from '@fieldwise/shared';
import { extractAmount } from './amount.js';
import { extractBankingFields } from './banking.js';
import { extractDocumentDetails } from './details.js';
import type { PartyFields } from './types.js';

/**
 * Complete a strategy's party fields with the routines every strategy
 * shares: amount, currency, banking fields and document details.
 */
export function buildStrategyOutput(doc: DocumentText, parties: PartyFields): StrategyOutput {
  const fieldMap = createFieldMap({
    ...parties,
    amount: extractAmount(doc),
    currency: detectCurrency(doc.text),
    ...extractBankingFields(doc),
  });

  return { fieldMap, details: extractDocumentDetails(doc) };
}
