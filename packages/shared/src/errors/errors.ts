/**
 * Base error class for Fieldwise
 */
export class FieldwiseError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'FieldwiseError';
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }

    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/**
 * Error thrown for invalid parser configuration. Raised at construction,
 * before any document is processed.
 */
export class ConfigurationError extends FieldwiseError {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = [], context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', issues.length > 0 ? { ...context, issues } : context);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * Error thrown when a strategy is not registered
 */
export class StrategyNotFoundError extends FieldwiseError {
  readonly strategyId: string;

  constructor(strategyId: string) {
    super(`Strategy '${strategyId}' not found in registry`, 'STRATEGY_NOT_FOUND', { strategyId });
    this.name = 'StrategyNotFoundError';
    this.strategyId = strategyId;
  }
}

/**
 * Error thrown when an awaited operation exceeds its time limit
 */
export class TimeoutError extends FieldwiseError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number, context?: Record<string, unknown>) {
    super(message, 'TIMEOUT_ERROR', { ...context, timeoutMs });
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Error thrown when a serialized model cannot be restored
 */
export class ModelFormatError extends FieldwiseError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'MODEL_FORMAT_ERROR', context);
    this.name = 'ModelFormatError';
  }
}
