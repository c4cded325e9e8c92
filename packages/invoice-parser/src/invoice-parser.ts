import type {
  EntityRecognizer,
  ExtractionResult,
  LayoutClassifier,
  LayoutModel,
  LearnedExtractor,
  ParserConfig,
  ParserConfigInput,
  StrategyRegistry,
} from '@fieldwise/contracts';
import {
  CompositeEventHooks,
  ExtractionPipeline,
  StrategyRegistryImpl,
  buildParserConfig,
  type DocumentInput,
  type ExtractionEventHooks,
  type ParseOutcome,
} from '@fieldwise/kernel';
import { RuleBasedLayoutClassifier, TrainedLayoutClassifier, createLayoutHint } from '@fieldwise/layout';
import { EntityLearnedExtractor, NullLearnedExtractor } from '@fieldwise/learned';
import { createSafeLogger, type IdGenerator, type Logger, type LogLevel } from '@fieldwise/shared';
import { createDefaultStrategies, type DefaultStrategiesConfig } from '@fieldwise/strategies';

export interface InvoiceParserOptions {
  /** Parser configuration overrides, validated before anything is built */
  config?: ParserConfigInput;

  /** Tuning of the built-in strategies */
  strategies?: DefaultStrategiesConfig;

  /** Named-entity model backing the learned fallback */
  entityRecognizer?: EntityRecognizer;

  /** Replaces the entity-backed learned fallback */
  learnedExtractor?: LearnedExtractor;

  /** Trained layout model, referred to by `config.layoutModelRef` */
  layoutModel?: LayoutModel;

  /**
   * Layout classifier; `false` evaluates strategies in canonical order
   * @default rule-based, or trained when `layoutModel` is given
   */
  layoutClassifier?: LayoutClassifier | false;

  /** Several listeners are dispatched through one composite */
  hooks?: ExtractionEventHooks | ExtractionEventHooks[];

  logger?: Logger;

  /**
   * Level of the default logger
   * @default 'info'
   */
  logLevel?: LogLevel;

  idGenerator?: IdGenerator;
}

/**
 * A configured parser
 */
export interface InvoiceParser {
  readonly config: ParserConfig;
  readonly configHash: string;
  readonly registry: StrategyRegistry;

  parse(input: DocumentInput): Promise<ExtractionResult>;
  parseMany(documents: readonly DocumentInput[], options?: { maxParallelism?: number }): Promise<ParseOutcome[]>;
}

function resolveLayoutClassifier(
  options: InvoiceParserOptions,
  config: ParserConfig,
  logger: Logger,
): LayoutClassifier | undefined {
  if (options.layoutClassifier === false) {
    return undefined;
  }
  if (options.layoutClassifier !== undefined) {
    return options.layoutClassifier;
  }
  if (options.layoutModel !== undefined) {
    if (config.layoutModelRef !== undefined && config.layoutModelRef !== options.layoutModel.id) {
      logger.warn('Layout model id differs from layoutModelRef', {
        layoutModelRef: config.layoutModelRef,
        modelId: options.layoutModel.id,
      });
    }
    return new TrainedLayoutClassifier({ model: options.layoutModel, logger });
  }
  if (config.layoutModelRef !== undefined) {
    logger.warn('Layout model not supplied, using rule-based classification', {
      layoutModelRef: config.layoutModelRef,
    });
  }
  return new RuleBasedLayoutClassifier();
}

function resolveLearnedExtractor(options: InvoiceParserOptions, config: ParserConfig, logger: Logger): LearnedExtractor {
  if (options.learnedExtractor !== undefined) {
    return options.learnedExtractor;
  }
  if (options.entityRecognizer !== undefined) {
    return new EntityLearnedExtractor({ recognizer: options.entityRecognizer, weights: config.weights, logger });
  }
  if (config.mlEnabled) {
    logger.warn('Learned fallback enabled without a model, running rule-based only');
  }
  return new NullLearnedExtractor();
}

/**
 * Create an invoice parser with the built-in strategies.
 *
 * @throws ConfigurationError when the configuration is invalid
 *
 * @example
 * ```typescript
 * const parser = createInvoiceParser({ config: { confidenceThreshold: 0.8 } });
 * const result = await parser.parse(['From: Acme GmbH', 'To: Beta Ltd']);
 * result.strategyId; // 'two_column'
 * ```
 */
export function createInvoiceParser(options: InvoiceParserOptions = {}): InvoiceParser {
  const config = buildParserConfig(options.config);
  const logger = options.logger ?? createSafeLogger({ prefix: 'fieldwise', level: options.logLevel ?? 'info' });

  const registry = new StrategyRegistryImpl();
  for (const strategy of createDefaultStrategies(options.strategies)) {
    registry.register(strategy);
  }

  const classifier = resolveLayoutClassifier(options, config, logger);
  const hooks = options.hooks;

  const pipeline = new ExtractionPipeline({
    registry,
    config,
    learnedExtractor: resolveLearnedExtractor(options, config, logger),
    logger,
    ...(classifier !== undefined ? { layout: createLayoutHint(classifier) } : {}),
    ...(hooks !== undefined
      ? { hooks: Array.isArray(hooks) ? new CompositeEventHooks(hooks) : hooks }
      : {}),
    ...(options.idGenerator !== undefined ? { idGenerator: options.idGenerator } : {}),
  });

  return {
    config: pipeline.config,
    configHash: pipeline.configHash,
    registry,
    parse: (input) => pipeline.parse(input),
    parseMany: (documents, parseOptions) => pipeline.parseMany(documents, parseOptions),
  };
}

/**
 * Parse one document with a parser built for this call.
 *
 * @example
 * ```typescript
 * const result = await parseInvoiceText(['IBAN: DE89 3704 0044 0532 0130 00']);
 * result.fieldMap.payment_method; // 'SEPA'
 * ```
 */
export async function parseInvoiceText(lines: DocumentInput, config?: ParserConfigInput): Promise<ExtractionResult> {
  return createInvoiceParser(config !== undefined ? { config } : {}).parse(lines);
}
