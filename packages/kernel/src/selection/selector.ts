import {
  STRATEGY_PRIORITY,
  countResolved,
  createDocumentDetails,
  createFieldMap,
  type ConfidenceWeights,
  type DocumentDetails,
  type DocumentText,
  type ExtractionStrategy,
  type FieldMap,
  type StrategyEvaluation,
  type StrategyId,
  type StrategyRegistry,
} from '@fieldwise/contracts';
import type { Logger } from '@fieldwise/shared';
import { DEFAULT_CONFIDENCE_WEIGHTS, calculateConfidence, maxAttainableConfidence } from '../scoring/calculator.js';

/**
 * Result of arbitrating between the rule-based strategies.
 */
export interface SelectionOutcome {
  readonly fieldMap: FieldMap;
  readonly details: DocumentDetails;
  readonly confidence: number;

  /** Winning strategy; undefined when none applied */
  readonly strategyId: StrategyId | undefined;

  /** Evaluated strategies, in evaluation order */
  readonly evaluations: readonly StrategyEvaluation[];

  /** Order the strategies were considered in */
  readonly order: readonly StrategyId[];
}

export interface StrategySelectorOptions {
  weights?: ConfidenceWeights;

  /** Per-strategy flags on top of the registry's own enable state */
  strategies?: Readonly<Partial<Record<StrategyId, boolean>>>;

  logger?: Logger;
}

interface Candidate {
  readonly strategyId: StrategyId;
  readonly fieldMap: FieldMap;
  readonly details: DocumentDetails;
  readonly confidence: number;
}

const priorityOf = (id: StrategyId): number => STRATEGY_PRIORITY.indexOf(id);

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Runs the applicable strategies and picks the winner.
 *
 * The winner has the strictly highest confidence; ties go to the strategy
 * earliest in canonical priority, so the evaluation order never changes
 * the answer.
 */
export class StrategySelector {
  private readonly registry: StrategyRegistry;
  private readonly weights: ConfidenceWeights;
  private readonly flags: Readonly<Partial<Record<StrategyId, boolean>>>;
  private readonly logger: Logger | undefined;
  private readonly maxConfidence: number;

  constructor(registry: StrategyRegistry, options: StrategySelectorOptions = {}) {
    this.registry = registry;
    this.weights = options.weights ?? DEFAULT_CONFIDENCE_WEIGHTS;
    this.flags = options.strategies ?? {};
    this.logger = options.logger;
    this.maxConfidence = maxAttainableConfidence(this.weights);
  }

  /**
   * Strategies to evaluate: the requested order restricted to enabled
   * strategies, then any enabled strategy it omits, in canonical order.
   */
  evaluationOrder(order: readonly StrategyId[] = STRATEGY_PRIORITY): StrategyId[] {
    const enabled = this.enabledStrategies().map((strategy) => strategy.id);
    const result: StrategyId[] = [];
    for (const id of [...order, ...enabled]) {
      if (enabled.includes(id) && !result.includes(id)) {
        result.push(id);
      }
    }
    return result;
  }

  select(doc: DocumentText, order?: readonly StrategyId[]): SelectionOutcome {
    const evaluationOrder = this.evaluationOrder(order);
    const evaluations: StrategyEvaluation[] = [];
    const done = new Set<StrategyId>();
    let best: Candidate | undefined;

    for (const strategyId of evaluationOrder) {
      const strategy = this.registry.require(strategyId).strategy;
      const candidate = this.evaluate(strategy, doc, evaluations);
      done.add(strategyId);

      if (candidate !== undefined && this.beats(candidate, best)) {
        best = candidate;
      }

      if (
        best !== undefined &&
        best.confidence >= this.maxConfidence &&
        this.earlierAllDone(best.strategyId, evaluationOrder, done)
      ) {
        this.logger?.debug('Maximum confidence reached, skipping remaining strategies', {
          strategyId: best.strategyId,
          skipped: evaluationOrder.filter((id) => !done.has(id)),
        });
        break;
      }
    }

    if (best === undefined) {
      return {
        fieldMap: createFieldMap(),
        details: createDocumentDetails(),
        confidence: 0,
        strategyId: undefined,
        evaluations,
        order: evaluationOrder,
      };
    }

    return {
      fieldMap: best.fieldMap,
      details: best.details,
      confidence: best.confidence,
      strategyId: best.strategyId,
      evaluations,
      order: evaluationOrder,
    };
  }

  private enabledStrategies(): ExtractionStrategy[] {
    return this.registry
      .list({ enabled: true })
      .map((registered) => registered.strategy)
      .filter((strategy) => this.flags[strategy.id] !== false);
  }

  private evaluate(
    strategy: ExtractionStrategy,
    doc: DocumentText,
    evaluations: StrategyEvaluation[],
  ): Candidate | undefined {
    let applicable = false;
    try {
      applicable = strategy.canHandle(doc);
      if (!applicable) {
        evaluations.push({ strategyId: strategy.id, applicable: false, confidence: 0, resolvedFields: 0 });
        return undefined;
      }

      const output = strategy.extract(doc);
      const confidence = calculateConfidence(output.fieldMap, this.weights);
      evaluations.push({
        strategyId: strategy.id,
        applicable: true,
        confidence,
        resolvedFields: countResolved(output.fieldMap),
      });
      return { strategyId: strategy.id, fieldMap: output.fieldMap, details: output.details, confidence };
    } catch (error) {
      const message = errorMessage(error);
      this.logger?.warn('Strategy failed, excluded from selection', { strategyId: strategy.id, error: message });
      evaluations.push({ strategyId: strategy.id, applicable, confidence: 0, resolvedFields: 0, error: message });
      return undefined;
    }
  }

  private beats(candidate: Candidate, best: Candidate | undefined): boolean {
    if (best === undefined || candidate.confidence > best.confidence) {
      return true;
    }
    return candidate.confidence === best.confidence && priorityOf(candidate.strategyId) < priorityOf(best.strategyId);
  }

  /**
   * Whether every strategy ahead of `strategyId` in canonical priority has
   * already been considered, so none of the rest can tie-break past it.
   */
  private earlierAllDone(
    strategyId: StrategyId,
    evaluationOrder: readonly StrategyId[],
    done: ReadonlySet<StrategyId>,
  ): boolean {
    return evaluationOrder.every((id) => priorityOf(id) >= priorityOf(strategyId) || done.has(id));
  }
}
