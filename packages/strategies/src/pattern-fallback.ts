/**
 * Pattern fallback strategy
 *
 * Makes no assumption about layout. Used only for documents none of the
 * structured strategies recognize.
 */

import type { DocumentText, ExtractionStrategy, StrategyOutput } from '@fieldwise/contracts';
import {
  findEmails,
  hasSideBySideAnchor,
  hasSingleColumnLabels,
  hasTwoColumnHeaders,
  hasVendorFingerprint,
  splitPartyEmails,
} from '@fieldwise/shared';
import { buildStrategyOutput } from './output.js';
import type { PartyFields } from './types.js';

export const PATTERN_FALLBACK_STRATEGY_ID = 'pattern_fallback';

/**
 * Whether any structured strategy's trigger is present.
 */
export function hasStructuredTrigger(doc: DocumentText): boolean {
  return (
    hasTwoColumnHeaders(doc.lines) ||
    hasSideBySideAnchor(doc.lines) ||
    hasSingleColumnLabels(doc.lines) ||
    hasVendorFingerprint(doc.text)
  );
}

/**
 * Text in front of an email on its line, e.g. `Acme GmbH` in
 * `Acme GmbH billing@acme.com`. Label text (anything with a colon) does
 * not count.
 */
function nameBeforeEmail(lines: readonly string[], email: string): string | undefined {
  const line = lines.find((candidate) => candidate.includes(email));
  if (line === undefined) {
    return undefined;
  }
  const before = line.slice(0, line.indexOf(email)).trim();
  if (before.includes(':')) {
    return undefined;
  }
  const name = before.replace(/[,<(\s-]+$/, '');
  return name.length > 3 ? name : undefined;
}

function parties(doc: DocumentText): PartyFields {
  const emails = splitPartyEmails(doc.text);
  const nameAnchor = emails.sender ?? findEmails(doc.text)[0];

  return {
    sender: nameAnchor !== undefined ? nameBeforeEmail(doc.lines, nameAnchor) : undefined,
    sender_email: emails.sender,
    recipient_email: emails.recipient,
  };
}

/**
 * Create the pattern fallback strategy.
 *
 * @example
 * ```typescript
 * const doc = createDocumentText(['Acme GmbH billing@acme.com', 'Total: €99.00']);
 * const { fieldMap } = createPatternFallbackStrategy().extract(doc);
 * fieldMap.sender; // 'Acme GmbH'
 * fieldMap.amount; // '99.00'
 * ```
 */
export function createPatternFallbackStrategy(): ExtractionStrategy {
  return {
    id: PATTERN_FALLBACK_STRATEGY_ID,
    name: 'Pattern fallback',
    version: '1.0.0',

    canHandle(doc: DocumentText): boolean {
      return !hasStructuredTrigger(doc);
    },

    extract(doc: DocumentText): StrategyOutput {
      return buildStrategyOutput(doc, parties(doc));
    },
  };
}

/**
 * Default pattern fallback strategy instance
 */
export const patternFallbackStrategy = createPatternFallbackStrategy();
