import type { StrategyId } from '../core/result.js';
import type { ExtractionStrategy } from './strategy.js';

/**
 * Strategy registration options
 */
export interface StrategyRegistrationOptions {
  /**
   * Disabled strategies stay registered but are never evaluated
   * @default true
   */
  enabled?: boolean;
}

/**
 * Registered strategy entry
 */
export interface RegisteredStrategy {
  readonly strategy: ExtractionStrategy;
  readonly options: StrategyRegistrationOptions;
  readonly registeredAt: string;
}

/**
 * StrategyRegistry holds the strategies available to the selector.
 *
 * Listing always follows canonical priority order, whatever the
 * registration order was.
 *
 * @example
 * ```typescript
 * registry.register(createTwoColumnStrategy());
 * registry.register(createPatternFallbackStrategy(), { enabled: false });
 *
 * registry.list({ enabled: true }); // [two_column]
 * ```
 */
export interface StrategyRegistry {
  /**
   * Register a strategy. Throws when the id is already registered.
   */
  register(strategy: ExtractionStrategy, options?: StrategyRegistrationOptions): void;

  unregister(strategyId: StrategyId): boolean;

  get(strategyId: StrategyId): RegisteredStrategy | undefined;

  /**
   * Like {@link get}, but throws when the strategy is not registered.
   */
  require(strategyId: StrategyId): RegisteredStrategy;

  has(strategyId: StrategyId): boolean;

  /**
   * Registered strategies in canonical priority order.
   */
  list(options?: { enabled?: boolean }): RegisteredStrategy[];

  setEnabled(strategyId: StrategyId, enabled: boolean): void;

  clear(): void;

  size(): number;
}
