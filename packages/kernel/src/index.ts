/**
 * @fieldwise/kernel
 *
 * Arbitration engine: confidence scoring, strategy registry and selection,
 * ensemble merge, configuration and the extraction pipeline.
 *
 * Strategies, classifiers and learned extractors are supplied by other
 * packages through the capability interfaces in @fieldwise/contracts.
 *
 * @packageDocumentation
 */

export { ExtractionPipeline } from './pipeline/extraction-pipeline.js';
export type {
  ExtractionPipelineOptions,
  LayoutStage,
  DocumentInput,
  ParseOutcome,
} from './pipeline/extraction-pipeline.js';
export { withTimeout } from './pipeline/timeout.js';

export { StrategyRegistryImpl } from './registry/registry.js';
export { StrategySelector } from './selection/selector.js';
export type { SelectionOutcome, StrategySelectorOptions } from './selection/selector.js';

export {
  DEFAULT_CONFIDENCE_WEIGHTS,
  CONFIDENCE_COMPONENTS,
  calculateConfidence,
  explainConfidence,
  maxAttainableConfidence,
  validateConfidenceWeights,
  getConfidenceCategory,
} from './scoring/calculator.js';
export type { ConfidenceBreakdown, ConfidenceCategory, ConfidenceComponent } from './scoring/calculator.js';

export { mergeExtractions } from './ensemble/merger.js';
export type { MergeOptions, MergeOutcome, RuleExtraction } from './ensemble/merger.js';

export {
  DEFAULT_PARSER_CONFIG,
  MAX_PARALLELISM_LIMIT,
  buildParserConfig,
  validateParserConfig,
} from './config/parser-config.js';

// Event Hooks
export { CompositeEventHooks, NoopEventHooks, LoggingEventHooks } from './events/hooks.js';

export type {
  ExtractionEventHooks,
  ParseStartEvent,
  LayoutClassifiedEvent,
  StrategyEvaluatedEvent,
  LearnedFallbackEvent,
  ParseCompleteEvent,
} from './events/hooks.js';
