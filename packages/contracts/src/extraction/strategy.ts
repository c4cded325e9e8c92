import type { DocumentDetails } from '../core/details.js';
import type { DocumentText } from '../core/document.js';
import type { FieldMap } from '../core/field-map.js';
import type { StrategyId } from '../core/result.js';

/**
 * Fields produced by one strategy run.
 */
export interface StrategyOutput {
  readonly fieldMap: FieldMap;
  readonly details: DocumentDetails;
}

/**
 * An extraction strategy turns normalized document text into a field map.
 *
 * Strategies are synchronous and pure: the same document always yields the
 * same output, and no state is kept between calls.
 *
 * @example
 * ```typescript
 * const strategy: ExtractionStrategy = {
 *   id: 'pattern_fallback',
 *   name: 'Pattern fallback',
 *   version: '1.0.0',
 *   canHandle: (doc) => doc.text.includes('@'),
 *   extract: (doc) => ({ fieldMap: createFieldMap(), details: createDocumentDetails() }),
 * };
 * ```
 */
export interface ExtractionStrategy {
  readonly id: StrategyId;

  /** Human-readable name */
  readonly name: string;

  /** Semantic version of the strategy's rules */
  readonly version: string;

  /**
   * Structural pre-check. `false` means the strategy is skipped; `true`
   * does not promise that any field resolves.
   */
  canHandle(doc: DocumentText): boolean;

  extract(doc: DocumentText): StrategyOutput;
}
