import type { DocumentText } from '../core/document.js';
import type { FieldMap } from '../core/field-map.js';

/**
 * Field map and confidence produced by a learned extractor. The confidence
 * uses the same weighting as rule-based results, so the two are comparable.
 */
export interface LearnedExtraction {
  readonly fieldMap: FieldMap;
  readonly confidence: number;
}

/**
 * Optional machine-learned extractor.
 *
 * When {@link LearnedExtractor.isAvailable} returns false the pipeline
 * behaves exactly as if ML were disabled.
 */
export interface LearnedExtractor {
  readonly id: string;
  isAvailable(): boolean;
  extract(doc: DocumentText): LearnedExtraction | Promise<LearnedExtraction>;
}

/**
 * Entity labels understood by the entity adapter.
 */
export type EntityLabel = 'ORG' | 'PERSON' | 'MONEY' | 'GPE' | 'EMAIL';

export interface RecognizedEntity {
  /** Label as emitted by the model; labels other than {@link EntityLabel} are ignored */
  readonly label: string;
  readonly text: string;
  readonly start?: number;
  readonly end?: number;
}

/**
 * A loaded named-entity model, owned by the host application.
 */
export interface EntityRecognizer {
  readonly id: string;
  recognize(text: string): readonly RecognizedEntity[] | Promise<readonly RecognizedEntity[]>;
}
