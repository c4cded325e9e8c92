import {
  isResolved,
  mapFieldNames,
  toFieldValue,
  type ConfidenceWeights,
  type FieldMap,
  type FieldName,
  type LearnedExtraction,
} from '@fieldwise/contracts';
import { DEFAULT_CONFIDENCE_WEIGHTS, calculateConfidence } from '../scoring/calculator.js';

export interface MergeOptions {
  /** Never override a resolved rule-based value */
  preferRegex: boolean;

  /** Learned values below this confidence are ignored */
  mlMinConfidence: number;
}

/**
 * Rule-based side of a merge
 */
export interface RuleExtraction {
  readonly fieldMap: FieldMap;
  readonly confidence: number;
}

export interface MergeOutcome {
  readonly fieldMap: FieldMap;

  /** Recomputed over the merged map */
  readonly confidence: number;

  /** Fields whose value came from the learned extractor */
  readonly fieldsFromModel: readonly FieldName[];
}

/**
 * Field-by-field reconciliation of the rule-based and learned field maps.
 *
 * 1. A resolved rule value is kept, unless `preferRegex` is off and the
 *    learned extractor is more confident overall.
 * 2. Otherwise a resolved learned value is taken when the learned
 *    confidence reaches `mlMinConfidence`.
 * 3. Otherwise the rule value stays, resolved or not. A resolved rule
 *    value is never replaced by UNRESOLVED.
 *
 * Learned values are trimmed and blank ones count as UNRESOLVED. A learned
 * confidence outside [0, 1] is not trusted at all.
 */
export function mergeExtractions(
  rule: RuleExtraction,
  learned: LearnedExtraction | undefined,
  options: MergeOptions,
  weights: ConfidenceWeights = DEFAULT_CONFIDENCE_WEIGHTS,
): MergeOutcome {
  if (learned === undefined) {
    return { fieldMap: rule.fieldMap, confidence: calculateConfidence(rule.fieldMap, weights), fieldsFromModel: [] };
  }

  const inRange = Number.isFinite(learned.confidence) && learned.confidence >= 0 && learned.confidence <= 1;
  const learnedTrusted = inRange && learned.confidence >= options.mlMinConfidence;
  const ruleYields = options.preferRegex || !inRange || learned.confidence <= rule.confidence;
  const fieldsFromModel: FieldName[] = [];

  const fieldMap: FieldMap = Object.freeze(
    mapFieldNames((name) => {
      const ruleValue = rule.fieldMap[name];
      const learnedValue = toFieldValue(learned.fieldMap[name]);

      if (isResolved(ruleValue) && ruleYields) {
        return ruleValue;
      }
      if (isResolved(learnedValue) && learnedTrusted) {
        fieldsFromModel.push(name);
        return learnedValue;
      }
      return ruleValue;
    }),
  );

  return { fieldMap, confidence: calculateConfidence(fieldMap, weights), fieldsFromModel };
}
