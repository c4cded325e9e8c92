import {
  isLayoutCategory,
  type DocumentText,
  type LayoutClassifier,
  type LayoutModel,
  type LayoutModelOutput,
  type LayoutPrediction,
} from '@fieldwise/contracts';
import { createSafeLogger, type Logger } from '@fieldwise/shared';
import { extractLayoutFeatures, toFeatureVector, type LayoutFeatures } from './features.js';
import { RuleBasedLayoutClassifier } from './rule-based.js';

export interface TrainedLayoutClassifierOptions {
  model: LayoutModel;

  /**
   * Classifier used when the model throws or returns an unusable output
   * @default new RuleBasedLayoutClassifier()
   */
  fallback?: RuleBasedLayoutClassifier;

  logger?: Logger;
}

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Layout classifier backed by a trained model.
 *
 * The model sees the feature vector in `LAYOUT_FEATURE_NAMES` order. Any
 * throw, unknown category or confidence outside [0, 1] is logged and
 * answered by the rule-based fallback instead.
 *
 * @example
 * ```typescript
 * const classifier = new TrainedLayoutClassifier({ model: loadCentroidModel(json) });
 * classifier.classify(doc).category; // 'two_column'
 * ```
 */
export class TrainedLayoutClassifier implements LayoutClassifier {
  readonly id: string;

  private readonly model: LayoutModel;
  private readonly fallback: RuleBasedLayoutClassifier;
  private readonly logger: Logger;

  constructor(options: TrainedLayoutClassifierOptions) {
    this.model = options.model;
    this.id = `trained:${options.model.id}`;
    this.fallback = options.fallback ?? new RuleBasedLayoutClassifier();
    this.logger = options.logger ?? createSafeLogger({ prefix: 'fieldwise:layout' });
  }

  classify(doc: DocumentText): LayoutPrediction {
    const features = extractLayoutFeatures(doc);

    let output: LayoutModelOutput;
    try {
      output = this.model.predict(toFeatureVector(features));
    } catch (error) {
      return this.fallBack(features, `prediction failed: ${errorMessage(error)}`);
    }

    if (!isLayoutCategory(output.category)) {
      return this.fallBack(features, `unknown category '${output.category}'`);
    }
    if (!Number.isFinite(output.confidence) || output.confidence < 0 || output.confidence > 1) {
      return this.fallBack(features, `confidence ${output.confidence} outside [0, 1]`);
    }

    return { category: output.category, confidence: output.confidence, classifierId: this.id };
  }

  private fallBack(features: LayoutFeatures, reason: string): LayoutPrediction {
    this.logger.warn('Layout model output rejected, using rule-based classification', {
      modelId: this.model.id,
      reason,
    });
    return this.fallback.classifyFeatures(features);
  }
}
