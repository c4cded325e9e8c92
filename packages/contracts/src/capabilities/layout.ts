import type { DocumentText } from '../core/document.js';
import type { LayoutCategory } from '../core/result.js';

/**
 * Category predicted for a document, with the predictor's confidence.
 */
export interface LayoutPrediction {
  readonly category: LayoutCategory;
  readonly confidence: number;

  /** Which classifier produced the prediction */
  readonly classifierId: string;
}

/**
 * Predicts a layout category. Advisory only: the prediction may reorder
 * strategy evaluation but never changes which field map wins.
 */
export interface LayoutClassifier {
  readonly id: string;
  classify(doc: DocumentText): LayoutPrediction;
}

/**
 * Output of a trained model for one feature vector.
 */
export interface LayoutModelOutput {
  readonly category: string;
  readonly confidence: number;
}

/**
 * A trained layout model, supplied ready to call by the host application.
 * Receives the feature vector in `LAYOUT_FEATURE_NAMES` order.
 */
export interface LayoutModel {
  readonly id: string;
  predict(features: readonly number[]): LayoutModelOutput;
}
