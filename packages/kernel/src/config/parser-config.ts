import {
  STRATEGY_PRIORITY,
  isStrategyId,
  type ConfidenceWeights,
  type ParserConfig,
  type ParserConfigInput,
  type StrategyId,
} from '@fieldwise/contracts';
import { ConfigurationError } from '@fieldwise/shared';
import { DEFAULT_CONFIDENCE_WEIGHTS, validateConfidenceWeights } from '../scoring/calculator.js';

/**
 * Default parser configuration.
 */
export const DEFAULT_PARSER_CONFIG = {
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
} as const;

export const MAX_PARALLELISM_LIMIT = 16;

const isFraction = (value: number): boolean => Number.isFinite(value) && value >= 0 && value <= 1;

/**
 * Problems with an effective configuration; empty when it is usable.
 */
export function validateParserConfig(config: ParserConfig): string[] {
  const issues: string[] = [];

  if (!isFraction(config.confidenceThreshold)) {
    issues.push('confidenceThreshold must be within [0, 1]');
  }
  if (!isFraction(config.mlMinConfidence)) {
    issues.push('mlMinConfidence must be within [0, 1]');
  }
  if (!Number.isInteger(config.mlTimeoutMs) || config.mlTimeoutMs <= 0) {
    issues.push('mlTimeoutMs must be a positive integer');
  }
  if (
    !Number.isInteger(config.maxParallelism) ||
    config.maxParallelism < 1 ||
    config.maxParallelism > MAX_PARALLELISM_LIMIT
  ) {
    issues.push(`maxParallelism must be an integer from 1 to ${MAX_PARALLELISM_LIMIT}`);
  }
  if (!STRATEGY_PRIORITY.some((id) => config.strategies[id])) {
    issues.push('at least one strategy must be enabled');
  }
  if (config.layoutModelRef !== undefined && config.layoutModelRef.trim().length === 0) {
    issues.push('layoutModelRef must not be blank');
  }

  issues.push(...validateConfidenceWeights(config.weights));
  return issues;
}

/**
 * Merge overrides onto the defaults and validate the result.
 *
 * @throws ConfigurationError listing every problem found
 *
 * @example
 * ```typescript
 * const config = buildParserConfig({ mlEnabled: true, strategies: { pattern_fallback: false } });
 * config.strategies.pattern_fallback; // false
 * config.confidenceThreshold;         // 0.9
 * ```
 */
export function buildParserConfig(input: ParserConfigInput = {}): ParserConfig {
  const issues: string[] = [];

  for (const key of Object.keys(input.strategies ?? {})) {
    if (!isStrategyId(key)) {
      issues.push(`unknown strategy '${key}'`);
    }
  }

  const flag = (id: StrategyId): boolean => input.strategies?.[id] ?? DEFAULT_PARSER_CONFIG.strategies[id];
  const weights: ConfidenceWeights = { ...DEFAULT_CONFIDENCE_WEIGHTS, ...input.weights };

  const config: ParserConfig = {
    confidenceThreshold: input.confidenceThreshold ?? DEFAULT_PARSER_CONFIG.confidenceThreshold,
    mlEnabled: input.mlEnabled ?? DEFAULT_PARSER_CONFIG.mlEnabled,
    mlMinConfidence: input.mlMinConfidence ?? DEFAULT_PARSER_CONFIG.mlMinConfidence,
    preferRegex: input.preferRegex ?? DEFAULT_PARSER_CONFIG.preferRegex,
    strategies: {
      two_column: flag('two_column'),
      single_column: flag('single_column'),
      company_specific: flag('company_specific'),
      pattern_fallback: flag('pattern_fallback'),
    },
    mlTimeoutMs: input.mlTimeoutMs ?? DEFAULT_PARSER_CONFIG.mlTimeoutMs,
    maxParallelism: input.maxParallelism ?? DEFAULT_PARSER_CONFIG.maxParallelism,
    weights,
  };
  if (input.layoutModelRef !== undefined) {
    config.layoutModelRef = input.layoutModelRef;
  }

  issues.push(...validateParserConfig(config));
  if (issues.length > 0) {
    throw new ConfigurationError(`Invalid parser configuration: ${issues.join('; ')}`, issues);
  }

  return config;
}
