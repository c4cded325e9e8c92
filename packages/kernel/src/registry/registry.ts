import {
  STRATEGY_PRIORITY,
  type ExtractionStrategy,
  type RegisteredStrategy,
  type StrategyId,
  type StrategyRegistrationOptions,
  type StrategyRegistry,
} from '@fieldwise/contracts';
import { StrategyNotFoundError } from '@fieldwise/shared';

const priorityOf = (id: StrategyId): number => STRATEGY_PRIORITY.indexOf(id);

/**
 * Implementation of the strategy registry.
 */
export class StrategyRegistryImpl implements StrategyRegistry {
  private strategies: Map<StrategyId, RegisteredStrategy> = new Map();

  register(strategy: ExtractionStrategy, options: StrategyRegistrationOptions = {}): void {
    if (this.strategies.has(strategy.id)) {
      throw new Error(`Strategy '${strategy.id}' is already registered`);
    }

    this.strategies.set(strategy.id, {
      strategy,
      options,
      registeredAt: new Date().toISOString(),
    });
  }

  unregister(strategyId: StrategyId): boolean {
    return this.strategies.delete(strategyId);
  }

  get(strategyId: StrategyId): RegisteredStrategy | undefined {
    return this.strategies.get(strategyId);
  }

  require(strategyId: StrategyId): RegisteredStrategy {
    const registered = this.strategies.get(strategyId);
    if (!registered) {
      throw new StrategyNotFoundError(strategyId);
    }
    return registered;
  }

  has(strategyId: StrategyId): boolean {
    return this.strategies.has(strategyId);
  }

  list(options?: { enabled?: boolean }): RegisteredStrategy[] {
    let result = Array.from(this.strategies.values());

    if (options?.enabled !== undefined) {
      result = result.filter((r) => (r.options.enabled ?? true) === options.enabled);
    }

    // Canonical priority, whatever the registration order
    return result.sort((a, b) => priorityOf(a.strategy.id) - priorityOf(b.strategy.id));
  }

  setEnabled(strategyId: StrategyId, enabled: boolean): void {
    const registered = this.require(strategyId);
    this.strategies.set(strategyId, {
      ...registered,
      options: { ...registered.options, enabled },
    });
  }

  clear(): void {
    this.strategies.clear();
  }

  size(): number {
    return this.strategies.size;
  }
}
