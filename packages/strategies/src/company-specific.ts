/**
 * Company-specific strategy
 *
 * Known vendors whose invoices follow a fixed layout are read through a
 * vendor profile instead of generic label search.
 */

import type { DocumentText, ExtractionStrategy, StrategyOutput } from '@fieldwise/contracts';
import { STREET_PATTERNS } from '@fieldwise/shared';
import { buildStrategyOutput } from './output.js';
import type { CompanySpecificStrategyConfig, PartyFields, VendorProfile } from './types.js';
import { VENDOR_PROFILES, findVendorProfile } from './vendor-profiles.js';

export const COMPANY_SPECIFIC_STRATEGY_ID = 'company_specific';

const ADDRESS_SEPARATOR = ' · ';

function isAddressLine(line: string): boolean {
  return line.includes('·') || STREET_PATTERNS.some((pattern) => pattern.test(line));
}

/** Two or three capitalized words, e.g. `Max Mustermann` */
function isPersonName(line: string): boolean {
  const words = line.split(' ');
  return (
    words.length >= 2 &&
    words.length <= 3 &&
    words.every((word) => word.length <= 1 || /^[A-ZÄÖÜ]/.test(word))
  );
}

function parties(lines: readonly string[], profile: VendorProfile): PartyFields {
  const senderIndex = lines.findIndex((line) => profile.markers.some((marker) => line.includes(marker)));
  const fields: PartyFields = {};

  if (senderIndex >= 0) {
    fields.sender = lines[senderIndex];
    const next = lines[senderIndex + 1];
    if (next !== undefined && isAddressLine(next)) {
      fields.sender_address = next.split(ADDRESS_SEPARATOR).join(', ');
    }
  }

  const [start, end] = profile.recipientWindow;
  fields.recipient = lines
    .slice(start, end)
    .find(
      (line) =>
        line.length > 0 &&
        !profile.recipientSkipWords.some((word) => line.includes(word)) &&
        isPersonName(line),
    );

  return fields;
}

/**
 * Create the company-specific strategy.
 *
 * Applies only when a profile's marker is present. The sender is the first
 * line carrying the marker, its address the line below it when that reads
 * as a street or uses `·` separators, and the recipient the first person
 * name within the profile's line window.
 */
export function createCompanySpecificStrategy(userConfig?: CompanySpecificStrategyConfig): ExtractionStrategy {
  const profiles = userConfig?.profiles ?? VENDOR_PROFILES;

  return {
    id: COMPANY_SPECIFIC_STRATEGY_ID,
    name: 'Company-specific profiles',
    version: '1.0.0',

    canHandle(doc: DocumentText): boolean {
      return findVendorProfile(doc.text, profiles) !== undefined;
    },

    extract(doc: DocumentText): StrategyOutput {
      const profile = findVendorProfile(doc.text, profiles);
      return buildStrategyOutput(doc, profile !== undefined ? parties(doc.lines, profile) : {});
    },
  };
}

/**
 * Default company-specific strategy instance
 */
export const companySpecificStrategy = createCompanySpecificStrategy();
