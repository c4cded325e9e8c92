import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@fieldwise/shared';
import { DEFAULT_CONFIDENCE_WEIGHTS } from '../scoring/calculator.js';
import { buildParserConfig } from './parser-config.js';

function issuesOf(build: () => unknown): readonly string[] {
  try {
    build();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error.issues;
    }
    throw error;
  }
  return [];
}

describe('buildParserConfig', () => {
  it('should apply defaults', () => {
    expect(buildParserConfig()).toEqual({
      confidenceThreshold: 0.9,
      mlEnabled: false,
      mlMinConfidence: 0.5,
      preferRegex: true,
      strategies: {
        two_column: true,
        single_column: true,
        company_specific: true,
        pattern_fallback: true,
      },
      mlTimeoutMs: 2000,
      maxParallelism: 4,
      weights: DEFAULT_CONFIDENCE_WEIGHTS,
    });
  });

  it('should merge overrides onto the defaults', () => {
    const config = buildParserConfig({
      mlEnabled: true,
      strategies: { pattern_fallback: false },
      weights: { sender: 0.15 },
      layoutModelRef: 'layout-v2',
    });

    expect(config.mlEnabled).toBe(true);
    expect(config.strategies.pattern_fallback).toBe(false);
    expect(config.strategies.two_column).toBe(true);
    expect(config.weights.sender).toBe(0.15);
    expect(config.weights.recipient).toBe(0.2);
    expect(config.layoutModelRef).toBe('layout-v2');
  });

  it('should throw ConfigurationError for out-of-range values', () => {
    expect(() => buildParserConfig({ confidenceThreshold: 1.5 })).toThrow(ConfigurationError);
    expect(issuesOf(() => buildParserConfig({ confidenceThreshold: 1.5, mlMinConfidence: -0.1 }))).toEqual([
      'confidenceThreshold must be within [0, 1]',
      'mlMinConfidence must be within [0, 1]',
    ]);
  });

  it('should reject unknown strategy names', () => {
    expect(issuesOf(() => buildParserConfig({ strategies: { two_columns: false } }))).toEqual([
      "unknown strategy 'two_columns'",
    ]);
  });

  it('should require at least one enabled strategy', () => {
    const strategies = { two_column: false, single_column: false, company_specific: false, pattern_fallback: false };
    expect(issuesOf(() => buildParserConfig({ strategies }))).toEqual(['at least one strategy must be enabled']);
  });

  it('should validate timeout and parallelism', () => {
    expect(issuesOf(() => buildParserConfig({ mlTimeoutMs: 0, maxParallelism: 17 }))).toEqual([
      'mlTimeoutMs must be a positive integer',
      'maxParallelism must be an integer from 1 to 16',
    ]);
  });

  it('should validate weights and the layout model reference', () => {
    expect(issuesOf(() => buildParserConfig({ weights: { bicPartial: 0.3 }, layoutModelRef: ' ' }))).toEqual([
      'layoutModelRef must not be blank',
      'weights.bicPartial exceeds weights.bic',
    ]);
  });

  it('should prefix the error message', () => {
    expect(() => buildParserConfig({ mlTimeoutMs: -5 })).toThrow(
      'Invalid parser configuration: mlTimeoutMs must be a positive integer',
    );
  });
});
