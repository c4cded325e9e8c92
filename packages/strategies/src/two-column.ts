/**
 * Two-column strategy
 *
 * Handles invoices that name both parties with paired headers
 * (`From:` / `To:`, `Bill from:` / `Bill to:`) and the side-by-side layout
 * where the sender name and the `Bill to` heading share one line and the
 * address columns run next to each other below it.
 */

import type { DocumentText, ExtractionStrategy, StrategyOutput } from '@fieldwise/contracts';
import {
  SIDE_BY_SIDE_ANCHOR,
  TWO_COLUMN_RECIPIENT_LABELS,
  TWO_COLUMN_SENDER_LABELS,
  containsCountry,
  findEmails,
  findLabel,
  hasSideBySideAnchor,
  hasTwoColumnHeaders,
  isSenderMailbox,
  secondPostalCodeIndex,
} from '@fieldwise/shared';
import { buildStrategyOutput } from './output.js';
import { readLabeledParty } from './parties.js';
import type { PartyFields, TwoColumnStrategyConfig } from './types.js';

export const TWO_COLUMN_STRATEGY_ID = 'two_column';

const DEFAULT_CONFIG: Required<TwoColumnStrategyConfig> = {
  sideBySideWindow: 5,
  maxBlockLines: 6,
};

/** `john@beta.io's Organization`: the recipient workspace after its email */
const POSSESSIVE_EMAIL = /^(.*?)([\w.+-]+@[\w-]+(?:\.[\w-]+)+)'s\s+(.+)$/;

/** Lines that end the header area below a side-by-side anchor */
const HEADER_END = /€|\bdue\b|\bpay/i;

function labeledParties(lines: readonly string[], maxBlockLines: number): PartyFields | undefined {
  const senderLabel = findLabel(lines, TWO_COLUMN_SENDER_LABELS);
  const recipientLabel = findLabel(lines, TWO_COLUMN_RECIPIENT_LABELS);
  if (senderLabel === undefined && recipientLabel === undefined) {
    return undefined;
  }

  const sender = senderLabel !== undefined ? readLabeledParty(lines, senderLabel, maxBlockLines) : undefined;
  const recipient = recipientLabel !== undefined ? readLabeledParty(lines, recipientLabel, maxBlockLines) : undefined;

  return {
    sender: sender?.name,
    sender_address: sender?.address,
    sender_email: sender?.email,
    recipient: recipient?.name,
    recipient_address: recipient?.address,
    recipient_email: recipient?.email,
  };
}

function sideBySideParties(lines: readonly string[], window: number): PartyFields {
  const anchorIndex = lines.findIndex((line) => SIDE_BY_SIDE_ANCHOR.test(line));
  const anchorLine = lines[anchorIndex] ?? '';
  const fields: PartyFields = { sender: SIDE_BY_SIDE_ANCHOR.exec(anchorLine)?.[1] };
  const senderAddress: string[] = [];
  const recipientAddress: string[] = [];

  for (const line of lines.slice(anchorIndex + 1, anchorIndex + 1 + window)) {
    if (line.length === 0 || HEADER_END.test(line)) {
      break;
    }

    const possessive = POSSESSIVE_EMAIL.exec(line);
    if (possessive) {
      const [, left = '', email = '', workspace = ''] = possessive;
      const [leftEmail] = findEmails(left);
      const leftRest = (leftEmail !== undefined ? left.replace(leftEmail, '') : left).trim();
      if (leftEmail !== undefined) fields.sender_email = leftEmail;
      if (leftRest.length > 0) senderAddress.push(leftRest);
      if (isSenderMailbox(email)) {
        fields.sender_email = email;
      } else {
        fields.recipient_email = email;
        fields.recipient = workspace.trim();
      }
      continue;
    }

    const emails = findEmails(line);
    if (emails.length >= 2) {
      fields.sender_email = emails[0];
      fields.recipient_email = emails[1];
      continue;
    }
    const [email] = emails;
    if (email !== undefined) {
      if (isSenderMailbox(email)) {
        fields.sender_email = email;
      } else {
        fields.recipient_email = email;
      }
      continue;
    }

    const split = secondPostalCodeIndex(line);
    if (split !== undefined) {
      senderAddress.push(line.slice(0, split).trim());
      recipientAddress.push(line.slice(split).trim());
      continue;
    }

    if (containsCountry(line) || senderAddress.length === 0) {
      senderAddress.push(line);
    } else {
      recipientAddress.push(line);
    }
  }

  if (senderAddress.length > 0) fields.sender_address = senderAddress.join(', ');
  if (recipientAddress.length > 0) fields.recipient_address = recipientAddress.join(', ');
  return fields;
}

/**
 * Create the two-column strategy.
 *
 * Labeled headers take precedence; the side-by-side reading is used only
 * when no header label is present.
 *
 * @example
 * ```typescript
 * const strategy = createTwoColumnStrategy();
 * const doc = createDocumentText(['From: Acme GmbH', 'To: Beta Ltd']);
 * strategy.canHandle(doc);                  // true
 * strategy.extract(doc).fieldMap.recipient; // 'Beta Ltd'
 * ```
 */
export function createTwoColumnStrategy(userConfig?: TwoColumnStrategyConfig): ExtractionStrategy {
  const config: Required<TwoColumnStrategyConfig> = { ...DEFAULT_CONFIG, ...userConfig };

  return {
    id: TWO_COLUMN_STRATEGY_ID,
    name: 'Two-column headers',
    version: '1.0.0',

    canHandle(doc: DocumentText): boolean {
      return hasTwoColumnHeaders(doc.lines) || hasSideBySideAnchor(doc.lines);
    },

    extract(doc: DocumentText): StrategyOutput {
      const parties =
        labeledParties(doc.lines, config.maxBlockLines) ?? sideBySideParties(doc.lines, config.sideBySideWindow);
      return buildStrategyOutput(doc, parties);
    },
  };
}

/**
 * Default two-column strategy instance
 */
export const twoColumnStrategy = createTwoColumnStrategy();
