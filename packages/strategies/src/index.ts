/**
 * @fieldwise/strategies
 *
 * The four rule-based extraction strategies and the routines they share:
 * banking fields, the invoice total and document details.
 *
 * Strategies are pure and synchronous; they never log and never throw for
 * anything a document contains.
 *
 * @packageDocumentation
 */

import type { ExtractionStrategy } from '@fieldwise/contracts';
import { createCompanySpecificStrategy } from './company-specific.js';
import { createPatternFallbackStrategy } from './pattern-fallback.js';
import { createSingleColumnStrategy } from './single-column.js';
import { createTwoColumnStrategy } from './two-column.js';
import type { CompanySpecificStrategyConfig, SingleColumnStrategyConfig, TwoColumnStrategyConfig } from './types.js';

// Strategies
export { createTwoColumnStrategy, twoColumnStrategy, TWO_COLUMN_STRATEGY_ID } from './two-column.js';
export { createSingleColumnStrategy, singleColumnStrategy, SINGLE_COLUMN_STRATEGY_ID } from './single-column.js';
export {
  createCompanySpecificStrategy,
  companySpecificStrategy,
  COMPANY_SPECIFIC_STRATEGY_ID,
} from './company-specific.js';
export {
  createPatternFallbackStrategy,
  patternFallbackStrategy,
  hasStructuredTrigger,
  PATTERN_FALLBACK_STRATEGY_ID,
} from './pattern-fallback.js';
export { VENDOR_PROFILES, DEUTSCHE_BAHN_PROFILE, findVendorProfile } from './vendor-profiles.js';

// Shared routines (for direct use)
export { extractBankingFields, resolvePaymentMethod, trimToValidIban } from './banking.js';
export { extractAmount, amountHints } from './amount.js';
export { extractDocumentDetails } from './details.js';
export { buildStrategyOutput } from './output.js';
export { readLabeledParty, readLabeledSection, emailIn, withoutEmail, nameFromValue } from './parties.js';
export type { PartyBlock } from './parties.js';

// Types
export { BANKING_FIELD_NAMES } from './types.js';
export type {
  BankingFieldName,
  BankingFields,
  PaymentMethod,
  PartyFields,
  TwoColumnStrategyConfig,
  SingleColumnStrategyConfig,
  CompanySpecificStrategyConfig,
  VendorProfile,
} from './types.js';

/**
 * Options for {@link createDefaultStrategies}
 */
export interface DefaultStrategiesConfig {
  twoColumn?: TwoColumnStrategyConfig;
  singleColumn?: SingleColumnStrategyConfig;
  companySpecific?: CompanySpecificStrategyConfig;
}

/**
 * One fresh instance of every strategy, in canonical priority order.
 */
export function createDefaultStrategies(config: DefaultStrategiesConfig = {}): ExtractionStrategy[] {
  return [
    createTwoColumnStrategy(config.twoColumn),
    createSingleColumnStrategy(config.singleColumn),
    createCompanySpecificStrategy(config.companySpecific),
    createPatternFallbackStrategy(),
  ];
}
