/**
 * Types for the extraction strategies
 */

import type { FieldMapInput, FieldValue } from '@fieldwise/contracts';

/**
 * Party fields a strategy locates itself. Everything else comes from the
 * shared routines.
 */
export type PartyFields = Pick<
  FieldMapInput,
  'sender' | 'recipient' | 'sender_address' | 'recipient_address' | 'sender_email' | 'recipient_email'
>;

export const BANKING_FIELD_NAMES = [
  'iban',
  'bic',
  'bank_name',
  'payment_address',
  'routing_number',
  'account_number',
  'sort_code',
  'payment_method',
] as const;

export type BankingFieldName = (typeof BANKING_FIELD_NAMES)[number];

export type BankingFields = Readonly<Record<BankingFieldName, FieldValue>>;

/**
 * Payment rail implied by the banking identifiers found.
 */
export type PaymentMethod = 'SEPA' | 'SEPA_INTERNATIONAL' | 'ACH' | 'BACS';

/**
 * Configuration for the two-column strategy
 */
export interface TwoColumnStrategyConfig {
  /**
   * Lines read below a side-by-side `Bill to` anchor
   * @default 5
   */
  sideBySideWindow?: number;

  /**
   * Lines read below a labeled party header
   * @default 6
   */
  maxBlockLines?: number;
}

/**
 * Configuration for the single-column label strategy
 */
export interface SingleColumnStrategyConfig {
  /**
   * Lines a labeled section may span
   * @default 10
   */
  maxSectionLines?: number;
}

/**
 * Hand-tuned description of one vendor's invoice layout.
 */
export interface VendorProfile {
  readonly id: string;

  /** Any of these in the text selects the profile */
  readonly markers: readonly string[];

  /** Line range, end exclusive, searched for the recipient name */
  readonly recipientWindow: readonly [start: number, end: number];

  /** Lines containing any of these are never the recipient */
  readonly recipientSkipWords: readonly string[];
}

/**
 * Configuration for the company-specific strategy
 */
export interface CompanySpecificStrategyConfig {
  /**
   * Vendor profiles, checked in order
   * @default VENDOR_PROFILES
   */
  profiles?: readonly VendorProfile[];
}
