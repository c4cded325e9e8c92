import { isResolved, type ConfidenceWeights, type FieldMap, type FieldValue } from '@fieldwise/contracts';
import { isValidEmail, looksLikeBic, looksLikeIban, normalizeAmount, validateBic, validateIban } from '@fieldwise/shared';

/**
 * Default weights. Full weights sum to 1.
 */
export const DEFAULT_CONFIDENCE_WEIGHTS: ConfidenceWeights = Object.freeze({
  sender: 0.2,
  recipient: 0.2,
  amount: 0.1,
  iban: 0.15,
  bic: 0.15,
  currency: 0.05,
  senderEmail: 0.05,
  recipientEmail: 0.05,
  addresses: 0.05,
  partyPartial: 0.05,
  amountPartial: 0.02,
  ibanPartial: 0.05,
  bicPartial: 0.05,
});

/**
 * Scored components, one per full weight.
 */
export const CONFIDENCE_COMPONENTS = [
  'sender',
  'recipient',
  'amount',
  'iban',
  'bic',
  'currency',
  'senderEmail',
  'recipientEmail',
  'addresses',
] as const;

export type ConfidenceComponent = (typeof CONFIDENCE_COMPONENTS)[number];

/**
 * Per-component contributions and their rounded total.
 */
export interface ConfidenceBreakdown {
  readonly total: number;
  readonly components: Readonly<Record<ConfidenceComponent, number>>;
}

const PARTIAL_OF: Readonly<Partial<Record<ConfidenceComponent, keyof ConfidenceWeights>>> = {
  sender: 'partyPartial',
  recipient: 'partyPartial',
  amount: 'amountPartial',
  iban: 'ibanPartial',
  bic: 'bicPartial',
};

const round4 = (value: number): number => Math.round(value * 10000) / 10000;

const clamp01 = (value: number): number => Math.max(0, Math.min(1, value));

function scoreParty(value: FieldValue, full: number, partial: number): number {
  if (!isResolved(value)) return 0;
  return isValidEmail(value) || value.length > 3 ? full : partial;
}

function scoreAmount(value: FieldValue, full: number, partial: number): number {
  if (!isResolved(value)) return 0;
  return normalizeAmount(value).valid ? full : partial;
}

function scoreIban(value: FieldValue, full: number, partial: number): number {
  if (!isResolved(value)) return 0;
  if (validateIban(value)) return full;
  return looksLikeIban(value) ? partial : 0;
}

function scoreBic(value: FieldValue, full: number, partial: number): number {
  if (!isResolved(value)) return 0;
  if (validateBic(value)) return full;
  return looksLikeBic(value) ? partial : 0;
}

const scoreWhen = (condition: boolean, weight: number): number => (condition ? weight : 0);

/**
 * Break the confidence of a field map down by component.
 */
export function explainConfidence(
  fieldMap: FieldMap,
  weights: ConfidenceWeights = DEFAULT_CONFIDENCE_WEIGHTS,
): ConfidenceBreakdown {
  const { currency, sender_email, recipient_email } = fieldMap;
  const components: Record<ConfidenceComponent, number> = {
    sender: scoreParty(fieldMap.sender, weights.sender, weights.partyPartial),
    recipient: scoreParty(fieldMap.recipient, weights.recipient, weights.partyPartial),
    amount: scoreAmount(fieldMap.amount, weights.amount, weights.amountPartial),
    iban: scoreIban(fieldMap.iban, weights.iban, weights.ibanPartial),
    bic: scoreBic(fieldMap.bic, weights.bic, weights.bicPartial),
    currency: scoreWhen(isResolved(currency) && /^[A-Z]{3}$/.test(currency), weights.currency),
    senderEmail: scoreWhen(isResolved(sender_email) && isValidEmail(sender_email), weights.senderEmail),
    recipientEmail: scoreWhen(isResolved(recipient_email) && isValidEmail(recipient_email), weights.recipientEmail),
    addresses: scoreWhen(
      isResolved(fieldMap.sender_address) ||
        isResolved(fieldMap.recipient_address) ||
        isResolved(fieldMap.payment_address),
      weights.addresses,
    ),
  };

  const sum = CONFIDENCE_COMPONENTS.reduce((total, component) => total + components[component], 0);
  return { total: round4(clamp01(sum)), components };
}

/**
 * Weighted quality score of a field map, in [0, 1], rounded to 4 decimals.
 *
 * Rewards both completeness and validity: an IBAN that fails its checksum
 * earns only the partial credit.
 *
 * @example
 * ```typescript
 * calculateConfidence(createFieldMap());                      // 0
 * calculateConfidence(createFieldMap({ sender: 'Acme GmbH' })); // 0.2
 * ```
 */
export function calculateConfidence(
  fieldMap: FieldMap,
  weights: ConfidenceWeights = DEFAULT_CONFIDENCE_WEIGHTS,
): number {
  return explainConfidence(fieldMap, weights).total;
}

/**
 * Highest score any field map can reach under the given weights.
 */
export function maxAttainableConfidence(weights: ConfidenceWeights = DEFAULT_CONFIDENCE_WEIGHTS): number {
  return round4(clamp01(CONFIDENCE_COMPONENTS.reduce((total, component) => total + weights[component], 0)));
}

/**
 * Problems with a weight set; empty when the weights are usable.
 */
export function validateConfidenceWeights(weights: ConfidenceWeights): string[] {
  const issues: string[] = [];
  const entries = Object.entries(weights);

  for (const [name, value] of entries) {
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
      issues.push(`weights.${name} must be a non-negative number`);
    }
  }
  if (issues.length > 0) {
    return issues;
  }

  const sum = CONFIDENCE_COMPONENTS.reduce((total, component) => total + weights[component], 0);
  if (round4(sum) > 1) {
    issues.push(`full weights sum to ${round4(sum)}, above 1`);
  }

  for (const component of CONFIDENCE_COMPONENTS) {
    const partial = PARTIAL_OF[component];
    if (partial !== undefined && weights[partial] > weights[component]) {
      issues.push(`weights.${partial} exceeds weights.${component}`);
    }
  }

  return issues;
}

export type ConfidenceCategory = 'high' | 'medium' | 'low' | 'none';

/**
 * Determine the confidence category.
 */
export function getConfidenceCategory(score: number): ConfidenceCategory {
  if (score >= 0.9) return 'high';
  if (score >= 0.6) return 'medium';
  if (score > 0) return 'low';
  return 'none';
}
