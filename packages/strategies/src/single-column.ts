/**
 * Single-column label strategy
 *
 * Handles invoices that list each party under its own label
 * (`Absender:`, `Rechnungsempfänger:`, `Vendor:`, `Customer:` ...), one
 * section below the other.
 */

import type { DocumentText, ExtractionStrategy, StrategyOutput } from '@fieldwise/contracts';
import {
  SINGLE_COLUMN_RECIPIENT_LABELS,
  SINGLE_COLUMN_SENDER_LABELS,
  findLabel,
  hasSingleColumnLabels,
  splitPartyEmails,
} from '@fieldwise/shared';
import { buildStrategyOutput } from './output.js';
import { readLabeledSection, type PartyBlock } from './parties.js';
import type { PartyFields, SingleColumnStrategyConfig } from './types.js';

export const SINGLE_COLUMN_STRATEGY_ID = 'single_column';

const DEFAULT_CONFIG: Required<SingleColumnStrategyConfig> = {
  maxSectionLines: 10,
};

function parties(doc: DocumentText, maxSectionLines: number): PartyFields {
  const { lines } = doc;
  const senderLabel = findLabel(lines, SINGLE_COLUMN_SENDER_LABELS);
  const recipientLabel = findLabel(lines, SINGLE_COLUMN_RECIPIENT_LABELS);

  // A section stops at the other party's label when that label follows it
  const endFor = (index: number, other: number | undefined): number =>
    other !== undefined && other > index ? other : lines.length;

  let sender: PartyBlock | undefined;
  if (senderLabel !== undefined) {
    sender = readLabeledSection(lines, senderLabel, endFor(senderLabel.index, recipientLabel?.index), maxSectionLines);
  }
  let recipient: PartyBlock | undefined;
  if (recipientLabel !== undefined) {
    recipient = readLabeledSection(
      lines,
      recipientLabel,
      endFor(recipientLabel.index, senderLabel?.index),
      maxSectionLines,
    );
  }

  let senderEmail = sender?.email;
  let recipientEmail = recipient?.email;
  if (senderEmail === undefined || recipientEmail === undefined) {
    const fallback = splitPartyEmails(doc.text);
    senderEmail = senderEmail ?? fallback.sender;
    recipientEmail = recipientEmail ?? fallback.recipient;
  }

  return {
    sender: sender?.name,
    sender_address: sender?.address,
    sender_email: senderEmail,
    recipient: recipient?.name,
    recipient_address: recipient?.address,
    recipient_email: recipientEmail,
  };
}

/**
 * Create the single-column label strategy.
 *
 * Emails not found inside a section fall back to whole-text mailbox
 * heuristics: `billing@`, `support@` and similar belong to the sender,
 * anything else to the recipient.
 */
export function createSingleColumnStrategy(userConfig?: SingleColumnStrategyConfig): ExtractionStrategy {
  const config: Required<SingleColumnStrategyConfig> = { ...DEFAULT_CONFIG, ...userConfig };

  return {
    id: SINGLE_COLUMN_STRATEGY_ID,
    name: 'Single-column labels',
    version: '1.0.0',

    canHandle(doc: DocumentText): boolean {
      return hasSingleColumnLabels(doc.lines);
    },

    extract(doc: DocumentText): StrategyOutput {
      return buildStrategyOutput(doc, parties(doc, config.maxSectionLines));
    },
  };
}

/**
 * Default single-column strategy instance
 */
export const singleColumnStrategy = createSingleColumnStrategy();
