/**
 * @fieldwise/layout
 *
 * Advisory layout classification: text features, a rule-based classifier,
 * a classifier backed by a trained model, and the strategy order each
 * layout category hints.
 *
 * @packageDocumentation
 */

// Features
export {
  LAYOUT_FEATURE_NAMES,
  extractLayoutFeatures,
  toFeatureVector,
  type LayoutFeatureName,
  type LayoutFeatures,
} from './features.js';

// Classifiers
export {
  RULE_BASED_CLASSIFIER_ID,
  RULE_BASED_CONFIDENCE,
  RuleBasedLayoutClassifier,
  classifyFeatures,
} from './rule-based.js';
export { TrainedLayoutClassifier, type TrainedLayoutClassifierOptions } from './trained.js';

// Trained models
export {
  CENTROID_MODEL_FORMAT,
  CENTROID_MODEL_VERSION,
  CentroidLayoutModel,
  loadCentroidModel,
  trainCentroidModel,
  type CategoryCentroid,
  type CentroidModelData,
  type LayoutSample,
  type TrainCentroidOptions,
} from './centroid.js';

// Strategy ordering
export { STRATEGY_ORDERS, createLayoutHint, strategyOrderFor, type LayoutHint } from './strategy-order.js';
