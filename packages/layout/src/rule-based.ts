import type { DocumentText, LayoutCategory, LayoutClassifier, LayoutPrediction } from '@fieldwise/contracts';
import { extractLayoutFeatures, type LayoutFeatures } from './features.js';

export const RULE_BASED_CLASSIFIER_ID = 'rule-based';

/** Fixed confidence of every rule-based prediction */
export const RULE_BASED_CONFIDENCE = 0.8;

const STRUCTURED_COLON_DENSITY = 0.01;
const STRUCTURED_MAX_VARIANCE = 1000;

/**
 * Category implied by the structural flags, checked from the most to the
 * least specific.
 */
export function classifyFeatures(features: LayoutFeatures): LayoutCategory {
  if (features.has_vendor_fingerprint > 0) {
    return 'company_specific';
  }
  if (features.has_from_to > 0 || features.has_bill_from_to > 0 || features.has_side_by_side_anchor > 0) {
    return 'two_column';
  }
  if (features.has_sender_recipient > 0 || features.has_german_labels > 0) {
    return 'single_column';
  }
  // Label-heavy text with even line lengths still reads top to bottom
  if (
    features.colon_density > STRUCTURED_COLON_DENSITY &&
    features.line_length_variance < STRUCTURED_MAX_VARIANCE
  ) {
    return 'single_column';
  }
  return 'unstructured';
}

/**
 * Layout classifier driven by label and fingerprint rules. Used on its own
 * and as the fallback of {@link TrainedLayoutClassifier}.
 */
export class RuleBasedLayoutClassifier implements LayoutClassifier {
  readonly id = RULE_BASED_CLASSIFIER_ID;

  classify(doc: DocumentText): LayoutPrediction {
    return this.classifyFeatures(extractLayoutFeatures(doc));
  }

  classifyFeatures(features: LayoutFeatures): LayoutPrediction {
    return {
      category: classifyFeatures(features),
      confidence: RULE_BASED_CONFIDENCE,
      classifierId: this.id,
    };
  }
}
