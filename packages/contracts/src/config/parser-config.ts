import type { StrategyId } from '../core/result.js';

/**
 * Weights of the confidence model. All values are fractions of 1.
 *
 * Partial credits apply when a field is present but fails its quality
 * check; each must not exceed the matching full weight.
 */
export interface ConfidenceWeights {
  readonly sender: number;
  readonly recipient: number;
  readonly amount: number;
  readonly iban: number;
  readonly bic: number;
  readonly currency: number;
  readonly senderEmail: number;
  readonly recipientEmail: number;
  readonly addresses: number;

  /** Credit for a resolved party that fails the quality check */
  readonly partyPartial: number;

  /** Credit for an unparsable amount */
  readonly amountPartial: number;

  /** Credit for an IBAN-shaped value that fails the checksum */
  readonly ibanPartial: number;

  /** Credit for a BIC-shaped value that fails the format check */
  readonly bicPartial: number;
}

/**
 * Parser configuration
 */
export interface ParserConfig {
  /**
   * Results below this confidence are flagged for review
   * @default 0.9
   */
  confidenceThreshold: number;

  /**
   * Run the learned fallback extractor
   * @default false
   */
  mlEnabled: boolean;

  /**
   * Minimum learned confidence for its values to be used
   * @default 0.5
   */
  mlMinConfidence: number;

  /**
   * Never override a resolved rule-based field with a learned value
   * @default true
   */
  preferRegex: boolean;

  /**
   * Name of the trained layout model expected from the host
   */
  layoutModelRef?: string;

  /**
   * Per-strategy enable flags (all enabled by default)
   */
  strategies: Readonly<Record<StrategyId, boolean>>;

  /**
   * Time limit for the learned extractor
   * @default 2000
   */
  mlTimeoutMs: number;

  /**
   * Documents parsed concurrently by `parseMany`
   * @default 4
   */
  maxParallelism: number;

  weights: ConfidenceWeights;
}

/**
 * Caller-supplied overrides; anything omitted keeps its default.
 */
export interface ParserConfigInput {
  confidenceThreshold?: number;
  mlEnabled?: boolean;
  mlMinConfidence?: number;
  preferRegex?: boolean;
  layoutModelRef?: string;
  strategies?: Partial<Record<string, boolean>>;
  mlTimeoutMs?: number;
  maxParallelism?: number;
  weights?: Partial<ConfidenceWeights>;
}
