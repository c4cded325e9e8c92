import type { LayoutCategory, LayoutClassifier, StrategyId } from '@fieldwise/contracts';

/**
 * Evaluation order hinted by each layout category. Every order is a
 * permutation of all strategy ids.
 */
export const STRATEGY_ORDERS: Readonly<Record<LayoutCategory, readonly StrategyId[]>> = {
  two_column: ['two_column', 'single_column', 'company_specific', 'pattern_fallback'],
  single_column: ['single_column', 'two_column', 'company_specific', 'pattern_fallback'],
  company_specific: ['company_specific', 'single_column', 'two_column', 'pattern_fallback'],
  unstructured: ['pattern_fallback', 'single_column', 'two_column', 'company_specific'],
};

export function strategyOrderFor(category: LayoutCategory): readonly StrategyId[] {
  return STRATEGY_ORDERS[category];
}

/**
 * A classifier paired with the category to order mapping, in the shape
 * the extraction pipeline takes as its layout stage.
 */
export interface LayoutHint {
  readonly classifier: LayoutClassifier;
  orderFor(category: LayoutCategory): readonly StrategyId[];
}

export function createLayoutHint(classifier: LayoutClassifier): LayoutHint {
  return { classifier, orderFor: strategyOrderFor };
}
