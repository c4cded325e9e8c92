import type { DocumentDetails } from './details.js';
import type { FieldMap, FieldName } from './field-map.js';

/**
 * Identifiers of the extraction strategies, in canonical priority order.
 */
export const STRATEGY_PRIORITY = [
  'two_column',
  'single_column',
  'company_specific',
  'pattern_fallback',
] as const;

export type StrategyId = (typeof STRATEGY_PRIORITY)[number];

export function isStrategyId(value: string): value is StrategyId {
  return STRATEGY_PRIORITY.some((id) => id === value);
}

/**
 * Advisory layout category. Only used to reorder strategy evaluation.
 */
export const LAYOUT_CATEGORIES = [
  'two_column',
  'single_column',
  'company_specific',
  'unstructured',
] as const;

export type LayoutCategory = (typeof LAYOUT_CATEGORIES)[number];

export function isLayoutCategory(value: unknown): value is LayoutCategory {
  return LAYOUT_CATEGORIES.some((category) => category === value);
}

/**
 * Where the final field values came from.
 * - a strategy id: the rule-based winner, unchanged by the learned extractor
 * - `ensemble`: at least one field was taken from the learned extractor
 * - `unresolved`: no strategy applied
 */
export type ResultSource = StrategyId | 'ensemble' | 'unresolved';

/**
 * Outcome of the learned fallback for one parse.
 */
export type LearnedStatus = 'disabled' | 'unavailable' | 'applied' | 'failed' | 'timeout';

/**
 * One strategy evaluated by the selector.
 */
export interface StrategyEvaluation {
  readonly strategyId: StrategyId;

  /** Result of `canHandle` */
  readonly applicable: boolean;

  /** Confidence of the produced field map (0 when not applicable) */
  readonly confidence: number;

  /** Number of resolved fields produced */
  readonly resolvedFields: number;

  /** Message of an error thrown while extracting, if any */
  readonly error?: string;
}

/**
 * Result of one parse. Frozen after creation.
 */
export interface ExtractionResult {
  readonly fieldMap: FieldMap;

  /** Weighted score in [0, 1] */
  readonly confidence: number;

  readonly source: ResultSource;

  /** Winning rule-based strategy; undefined when none applied */
  readonly strategyId?: StrategyId;

  readonly details: DocumentDetails;

  /** `confidence` is below the configured threshold */
  readonly needsReview: boolean;

  /** Fields whose value was taken from the learned extractor */
  readonly fieldsFromModel: readonly FieldName[];

  readonly evaluations: readonly StrategyEvaluation[];

  readonly learnedStatus: LearnedStatus;

  /** Hash of the effective configuration */
  readonly configHash: string;

  readonly durationMs: number;
}
