/**
 * Extraction event hooks
 *
 * Observation points for hosts that want metrics, tracing or audit
 * records without coupling them to the pipeline.
 *
 * @packageDocumentation
 */

import type {
  FieldName,
  LayoutCategory,
  LearnedStatus,
  ResultSource,
  StrategyEvaluation,
  StrategyId,
} from '@fieldwise/contracts';
import type { Logger } from '@fieldwise/shared';

/**
 * Event emitted when a parse starts.
 */
export interface ParseStartEvent {
  parseId: string;
  timestamp: string;
  lineCount: number;
}

/**
 * Event emitted once the layout classifier has produced an order.
 */
export interface LayoutClassifiedEvent {
  parseId: string;
  category: LayoutCategory;
  confidence: number;
  classifierId: string;
  order: readonly StrategyId[];
}

/**
 * Event emitted for each strategy the selector evaluated.
 */
export interface StrategyEvaluatedEvent {
  parseId: string;
  evaluation: StrategyEvaluation;
}

/**
 * Event emitted after the learned fallback ran, failed or timed out.
 */
export interface LearnedFallbackEvent {
  parseId: string;
  extractorId: string;
  status: LearnedStatus;
  durationMs: number;
  confidence?: number;
  fieldsFromModel: readonly FieldName[];
  error?: string;
}

/**
 * Event emitted when a parse completes.
 */
export interface ParseCompleteEvent {
  parseId: string;
  timestamp: string;
  durationMs: number;
  source: ResultSource;
  strategyId?: StrategyId;
  confidence: number;
  needsReview: boolean;
}

/**
 * Extraction event hooks.
 *
 * All methods are optional and may be async. The pipeline awaits them,
 * and a hook that throws is logged without failing the parse.
 *
 * @example
 * ```typescript
 * class ReviewQueueHooks implements ExtractionEventHooks {
 *   onParseComplete(event: ParseCompleteEvent) {
 *     if (event.needsReview) this.queue.push(event.parseId);
 *   }
 * }
 * ```
 */
export interface ExtractionEventHooks {
  onParseStart?(event: ParseStartEvent): void | Promise<void>;

  onLayoutClassified?(event: LayoutClassifiedEvent): void | Promise<void>;

  onStrategyEvaluated?(event: StrategyEvaluatedEvent): void | Promise<void>;

  onLearnedFallback?(event: LearnedFallbackEvent): void | Promise<void>;

  onParseComplete?(event: ParseCompleteEvent): void | Promise<void>;
}

/**
 * Composite event hooks that dispatches to multiple listeners.
 */
export class CompositeEventHooks implements ExtractionEventHooks {
  private readonly hooks: ExtractionEventHooks[];

  constructor(hooks: ExtractionEventHooks[]) {
    this.hooks = hooks;
  }

  async onParseStart(event: ParseStartEvent): Promise<void> {
    await Promise.all(this.hooks.map((h) => h.onParseStart?.(event)));
  }

  async onLayoutClassified(event: LayoutClassifiedEvent): Promise<void> {
    await Promise.all(this.hooks.map((h) => h.onLayoutClassified?.(event)));
  }

  async onStrategyEvaluated(event: StrategyEvaluatedEvent): Promise<void> {
    await Promise.all(this.hooks.map((h) => h.onStrategyEvaluated?.(event)));
  }

  async onLearnedFallback(event: LearnedFallbackEvent): Promise<void> {
    await Promise.all(this.hooks.map((h) => h.onLearnedFallback?.(event)));
  }

  async onParseComplete(event: ParseCompleteEvent): Promise<void> {
    await Promise.all(this.hooks.map((h) => h.onParseComplete?.(event)));
  }
}

/**
 * No-op event hooks (default when no hooks configured).
 */
export class NoopEventHooks implements ExtractionEventHooks {
  // All methods are no-ops by default (interface methods are optional)
}

/**
 * Event hooks that write each event to a logger at debug level.
 */
export class LoggingEventHooks implements ExtractionEventHooks {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  onParseStart(event: ParseStartEvent): void {
    this.logger.debug('Parse started', { parseId: event.parseId, lineCount: event.lineCount });
  }

  onLayoutClassified(event: LayoutClassifiedEvent): void {
    this.logger.debug('Layout classified', {
      parseId: event.parseId,
      category: event.category,
      confidence: event.confidence,
      classifierId: event.classifierId,
    });
  }

  onStrategyEvaluated(event: StrategyEvaluatedEvent): void {
    this.logger.debug('Strategy evaluated', { parseId: event.parseId, ...event.evaluation });
  }

  onLearnedFallback(event: LearnedFallbackEvent): void {
    this.logger.debug('Learned fallback finished', {
      parseId: event.parseId,
      extractorId: event.extractorId,
      status: event.status,
      durationMs: event.durationMs,
      fieldsFromModel: event.fieldsFromModel,
      error: event.error,
    });
  }

  onParseComplete(event: ParseCompleteEvent): void {
    this.logger.debug('Parse completed', {
      parseId: event.parseId,
      source: event.source,
      strategyId: event.strategyId,
      confidence: event.confidence,
      needsReview: event.needsReview,
      durationMs: event.durationMs,
    });
  }
}
