import { describe, it, expect, beforeEach } from 'vitest';
import {
  createDocumentDetails,
  createFieldMap,
  type ExtractionStrategy,
  type StrategyId,
} from '@fieldwise/contracts';
import { StrategyNotFoundError } from '@fieldwise/shared';
import { StrategyRegistryImpl } from './registry.js';

function createMockStrategy(id: StrategyId): ExtractionStrategy {
  return {
    id,
    name: `Mock ${id}`,
    version: '1.0.0',
    canHandle: () => true,
    extract: () => ({ fieldMap: createFieldMap(), details: createDocumentDetails() }),
  };
}

describe('StrategyRegistryImpl', () => {
  let registry: StrategyRegistryImpl;

  beforeEach(() => {
    registry = new StrategyRegistryImpl();
  });

  it('should register and retrieve a strategy', () => {
    registry.register(createMockStrategy('two_column'));

    expect(registry.has('two_column')).toBe(true);
    expect(registry.get('two_column')?.strategy.name).toBe('Mock two_column');
    expect(registry.size()).toBe(1);
  });

  it('should reject duplicate registration', () => {
    registry.register(createMockStrategy('two_column'));

    expect(() => registry.register(createMockStrategy('two_column'))).toThrow(
      "Strategy 'two_column' is already registered",
    );
  });

  it('should throw StrategyNotFoundError from require', () => {
    expect(() => registry.require('single_column')).toThrow(StrategyNotFoundError);
  });

  it('should list in canonical priority order whatever the registration order', () => {
    registry.register(createMockStrategy('pattern_fallback'));
    registry.register(createMockStrategy('company_specific'));
    registry.register(createMockStrategy('two_column'));
    registry.register(createMockStrategy('single_column'));

    expect(registry.list().map((r) => r.strategy.id)).toEqual([
      'two_column',
      'single_column',
      'company_specific',
      'pattern_fallback',
    ]);
  });

  it('should filter by enabled state', () => {
    registry.register(createMockStrategy('two_column'));
    registry.register(createMockStrategy('pattern_fallback'), { enabled: false });

    expect(registry.list({ enabled: true }).map((r) => r.strategy.id)).toEqual(['two_column']);
    expect(registry.list({ enabled: false }).map((r) => r.strategy.id)).toEqual(['pattern_fallback']);

    registry.setEnabled('pattern_fallback', true);
    expect(registry.list({ enabled: true })).toHaveLength(2);
  });

  it('should unregister and clear', () => {
    registry.register(createMockStrategy('two_column'));
    registry.register(createMockStrategy('single_column'));

    expect(registry.unregister('two_column')).toBe(true);
    expect(registry.unregister('two_column')).toBe(false);

    registry.clear();
    expect(registry.size()).toBe(0);
  });
});
