import {
  createFieldMap,
  type ConfidenceWeights,
  type DocumentText,
  type ExtractionResult,
  type LayoutCategory,
  type LayoutClassifier,
  type LearnedExtraction,
  type LearnedExtractor,
  type LearnedStatus,
  type ParserConfig,
  type ParserConfigInput,
  type ResultSource,
  type StrategyId,
  type StrategyRegistry,
} from '@fieldwise/contracts';
import {
  ConfigurationError,
  TimeoutError,
  computeConfigHash,
  createDocumentText,
  createSafeLogger,
  defaultIdGenerator,
  generateParseId,
  shortHash,
  type IdGenerator,
  type Logger,
} from '@fieldwise/shared';
import { buildParserConfig, MAX_PARALLELISM_LIMIT } from '../config/parser-config.js';
import { calculateConfidence } from '../scoring/calculator.js';
import { mergeExtractions } from '../ensemble/merger.js';
import { NoopEventHooks, type ExtractionEventHooks } from '../events/hooks.js';
import { StrategySelector } from '../selection/selector.js';
import { withTimeout } from './timeout.js';

/**
 * Advisory layout stage: a classifier and the evaluation order it implies.
 */
export interface LayoutStage {
  readonly classifier: LayoutClassifier;
  orderFor(category: LayoutCategory): readonly StrategyId[];
}

export interface ExtractionPipelineOptions {
  registry: StrategyRegistry;

  /** Overrides merged onto the defaults; validated at construction */
  config?: ParserConfigInput;

  layout?: LayoutStage;

  /** Learned fallback; without one, enabling ML has no effect */
  learnedExtractor?: LearnedExtractor;

  hooks?: ExtractionEventHooks;

  /** Defaults to a PII-scrubbing console logger */
  logger?: Logger;

  idGenerator?: IdGenerator;
}

/** Raw document: one string, or its lines */
export type DocumentInput = string | readonly string[];

/**
 * Outcome of one document in a batch.
 */
export type ParseOutcome =
  | { readonly ok: true; readonly result: ExtractionResult }
  | { readonly ok: false; readonly error: Error };

interface LearnedRun {
  readonly status: LearnedStatus;
  readonly durationMs: number;
  readonly extraction?: LearnedExtraction;
}

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

const toError = (error: unknown): Error => (error instanceof Error ? error : new Error(String(error)));

/**
 * Host extractors are not trusted to keep the field map contract: the map
 * is rebuilt and the confidence rescored with the rule-based weights.
 */
function rescoreLearned(extraction: LearnedExtraction, weights: ConfidenceWeights): LearnedExtraction {
  const fieldMap = createFieldMap(extraction.fieldMap);
  return { fieldMap, confidence: calculateConfidence(fieldMap, weights) };
}

/**
 * Extraction pipeline: normalize, classify, select, run the learned
 * fallback, merge.
 *
 * @example
 * ```typescript
 * const pipeline = new ExtractionPipeline({ registry, config: { confidenceThreshold: 0.8 } });
 * const result = await pipeline.parse(['From: Acme GmbH', 'To: Beta Ltd']);
 * result.fieldMap.sender; // 'Acme GmbH'
 * ```
 */
export class ExtractionPipeline {
  readonly config: ParserConfig;
  readonly configHash: string;

  private readonly selector: StrategySelector;
  private readonly layout: LayoutStage | undefined;
  private readonly learnedExtractor: LearnedExtractor | undefined;
  private readonly hooks: ExtractionEventHooks;
  private readonly logger: Logger;
  private readonly idGenerator: IdGenerator;

  constructor(options: ExtractionPipelineOptions) {
    this.config = buildParserConfig(options.config);
    this.configHash = computeConfigHash(this.config);
    this.logger = options.logger ?? createSafeLogger({ prefix: 'fieldwise' });
    this.selector = new StrategySelector(options.registry, {
      weights: this.config.weights,
      strategies: this.config.strategies,
      logger: this.logger,
    });
    this.layout = options.layout;
    this.learnedExtractor = options.learnedExtractor;
    this.hooks = options.hooks ?? new NoopEventHooks();
    this.idGenerator = options.idGenerator ?? defaultIdGenerator;

    if (this.selector.evaluationOrder().length === 0) {
      throw new ConfigurationError('No enabled strategy is registered', [], {
        registered: options.registry.list().map((r) => r.strategy.id),
      });
    }

    this.logger.debug('Extraction pipeline ready', {
      configHash: shortHash(this.configHash),
      order: this.selector.evaluationOrder(),
      learned: this.learnedExtractor?.id,
      layout: this.layout?.classifier.id,
    });
  }

  /**
   * Extract the field map of one document. Never rejects for anything a
   * document contains: unmatched fields are UNRESOLVED, and failures of
   * the optional stages fall back to the rule-based result.
   */
  async parse(input: DocumentInput): Promise<ExtractionResult> {
    const startTime = Date.now();
    const parseId = generateParseId(this.idGenerator);
    const doc = createDocumentText(input);

    await this.notify('onParseStart', (h) =>
      h.onParseStart?.({ parseId, timestamp: new Date(startTime).toISOString(), lineCount: doc.lines.length }),
    );

    const order = await this.classify(doc, parseId);
    const selection = this.selector.select(doc, order);
    for (const evaluation of selection.evaluations) {
      await this.notify('onStrategyEvaluated', (h) => h.onStrategyEvaluated?.({ parseId, evaluation }));
    }

    const learned = await this.runLearned(doc, parseId);
    const merged = mergeExtractions(
      { fieldMap: selection.fieldMap, confidence: selection.confidence },
      learned.extraction,
      { preferRegex: this.config.preferRegex, mlMinConfidence: this.config.mlMinConfidence },
      this.config.weights,
    );

    const source: ResultSource =
      merged.fieldsFromModel.length > 0 ? 'ensemble' : (selection.strategyId ?? 'unresolved');
    const needsReview = merged.confidence < this.config.confidenceThreshold;

    const result: ExtractionResult = Object.freeze({
      fieldMap: merged.fieldMap,
      confidence: merged.confidence,
      source,
      ...(selection.strategyId !== undefined ? { strategyId: selection.strategyId } : {}),
      details: selection.details,
      needsReview,
      fieldsFromModel: Object.freeze([...merged.fieldsFromModel]),
      evaluations: Object.freeze([...selection.evaluations]),
      learnedStatus: learned.status,
      configHash: this.configHash,
      durationMs: Date.now() - startTime,
    });

    const { extraction } = learned;
    if (extraction !== undefined) {
      await this.notify('onLearnedFallback', (h) =>
        h.onLearnedFallback?.({
          parseId,
          extractorId: this.learnedExtractor?.id ?? 'none',
          status: learned.status,
          durationMs: learned.durationMs,
          confidence: extraction.confidence,
          fieldsFromModel: result.fieldsFromModel,
        }),
      );
    }

    this.logger.debug('Parse completed', {
      parseId,
      source,
      confidence: result.confidence,
      needsReview,
      learnedStatus: learned.status,
    });

    await this.notify('onParseComplete', (h) =>
      h.onParseComplete?.({
        parseId,
        timestamp: new Date().toISOString(),
        durationMs: result.durationMs,
        source,
        ...(selection.strategyId !== undefined ? { strategyId: selection.strategyId } : {}),
        confidence: result.confidence,
        needsReview,
      }),
    );

    return result;
  }

  /**
   * Parse independent documents, at most `maxParallelism` at a time.
   * Outcomes keep the input order; one failing document does not affect
   * the others.
   */
  async parseMany(
    documents: readonly DocumentInput[],
    options: { maxParallelism?: number } = {},
  ): Promise<ParseOutcome[]> {
    const maxParallelism = options.maxParallelism ?? this.config.maxParallelism;
    if (!Number.isInteger(maxParallelism) || maxParallelism < 1 || maxParallelism > MAX_PARALLELISM_LIMIT) {
      throw new ConfigurationError(`maxParallelism must be an integer from 1 to ${MAX_PARALLELISM_LIMIT}`, [
        'maxParallelism',
      ]);
    }

    const outcomes: ParseOutcome[] = [];

    // Execute in batches
    for (let i = 0; i < documents.length; i += maxParallelism) {
      const batch = documents.slice(i, i + maxParallelism);
      const results = await Promise.allSettled(batch.map((doc) => this.parse(doc)));

      for (const [offset, settled] of results.entries()) {
        if (settled.status === 'fulfilled') {
          outcomes.push({ ok: true, result: settled.value });
        } else {
          const error = toError(settled.reason);
          this.logger.error('Document parse failed', { index: i + offset, error: error.message });
          outcomes.push({ ok: false, error });
        }
      }
    }

    return outcomes;
  }

  private async classify(doc: DocumentText, parseId: string): Promise<readonly StrategyId[] | undefined> {
    if (this.layout === undefined) {
      return undefined;
    }

    try {
      const prediction = this.layout.classifier.classify(doc);
      const order = this.layout.orderFor(prediction.category);
      await this.notify('onLayoutClassified', (h) =>
        h.onLayoutClassified?.({
          parseId,
          category: prediction.category,
          confidence: prediction.confidence,
          classifierId: prediction.classifierId,
          order,
        }),
      );
      return order;
    } catch (error) {
      this.logger.warn('Layout classification failed, using default order', {
        parseId,
        classifierId: this.layout.classifier.id,
        error: errorMessage(error),
      });
      return undefined;
    }
  }

  private async runLearned(doc: DocumentText, parseId: string): Promise<LearnedRun> {
    if (!this.config.mlEnabled) {
      return { status: 'disabled', durationMs: 0 };
    }

    const extractor = this.learnedExtractor;
    const startTime = Date.now();

    try {
      if (extractor === undefined || !extractor.isAvailable()) {
        return { status: 'unavailable', durationMs: 0 };
      }
      const extraction = await withTimeout(
        Promise.resolve(extractor.extract(doc)),
        this.config.mlTimeoutMs,
        `Learned extractor '${extractor.id}'`,
      );
      return {
        status: 'applied',
        durationMs: Date.now() - startTime,
        extraction: rescoreLearned(extraction, this.config.weights),
      };
    } catch (error) {
      const status: LearnedStatus = error instanceof TimeoutError ? 'timeout' : 'failed';
      const durationMs = Date.now() - startTime;
      const message = errorMessage(error);

      this.logger.warn('Learned fallback failed, using rule-based result', {
        parseId,
        extractorId: extractor?.id,
        status,
        error: message,
      });
      await this.notify('onLearnedFallback', (h) =>
        h.onLearnedFallback?.({
          parseId,
          extractorId: extractor?.id ?? 'none',
          status,
          durationMs,
          fieldsFromModel: [],
          error: message,
        }),
      );
      return { status, durationMs };
    }
  }

  private async notify(
    hook: string,
    invoke: (hooks: ExtractionEventHooks) => void | Promise<void> | undefined,
  ): Promise<void> {
    try {
      await invoke(this.hooks);
    } catch (error) {
      this.logger.warn('Event hook failed', { hook, error: errorMessage(error) });
    }
  }
}
