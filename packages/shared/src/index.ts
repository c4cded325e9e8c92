/**
 * @fieldwise/shared
 *
 * Validators, the pattern catalog, logging and errors shared by the
 * extraction packages.
 *
 * @packageDocumentation
 */

export { createLogger, type Logger, type LogLevel, type LogSink, type LoggerOptions } from './logging/logger.js';
export { createSafeLogger, scrubString, scrubValue, type SafeLoggerOptions } from './logging/safe-logger.js';
export {
  FieldwiseError,
  ConfigurationError,
  StrategyNotFoundError,
  TimeoutError,
  ModelFormatError,
} from './errors/errors.js';
export { canonicalStringify, computeConfigHash, shortHash } from './crypto/canonical-hash.js';
export { normalizeLines, createDocumentText } from './text/normalize.js';
export { defaultIdGenerator, generateParseId, type IdGenerator } from './utils/ids.js';

// Validators
export * from './validation/index.js';

// Tax identifiers (offline syntax check only)
export * from './tax/index.js';

// Pattern catalog
export * from './patterns/index.js';
