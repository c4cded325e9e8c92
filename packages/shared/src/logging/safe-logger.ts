import { createLogger, type Logger, type LoggerOptions } from './logger.js';

/**
 * Patterns scrubbed from log messages and string context values.
 * Order matters: IBANs are replaced before the shorter tax-id pattern can
 * match their prefix.
 */
const PII_PATTERNS: { pattern: RegExp; replacement: string; name: string }[] = [
  {
    pattern: /\b[A-Z]{2}\d{2}(?:\s?[A-Z0-9]{4}){2,7}(?:\s?[A-Z0-9]{1,4})?\b/g,
    replacement: '[IBAN:REDACTED]',
    name: 'iban',
  },
  {
    pattern: /\b[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}\b/g,
    replacement: '[EMAIL:REDACTED]',
    name: 'email',
  },
  {
    pattern: /\b(?:[A-Z]{2}\d{8,12}|\d{2}-\d{7})\b/g,
    replacement: '[TAXID:REDACTED]',
    name: 'tax-id',
  },
  {
    pattern: /\b\d{2}-\d{2}-\d{2}\b/g,
    replacement: '[SORTCODE:REDACTED]',
    name: 'sort-code',
  },
  {
    pattern: /\b\d{8,17}\b/g,
    replacement: '[NUMBER:REDACTED]',
    name: 'account-number',
  },
];

/**
 * Context keys whose values are always redacted, whatever they contain.
 */
const SENSITIVE_FIELD_NAMES = new Set([
  'iban',
  'bic',
  'account_number',
  'accountnumber',
  'routing_number',
  'routingnumber',
  'sort_code',
  'sortcode',
  'sender_email',
  'recipient_email',
  'email',
  'sender_address',
  'recipient_address',
  'payment_address',
  'address',
  'tax_id',
  'taxid',
  'password',
  'secret',
  'token',
  'apikey',
  'api_key',
]);

/**
 * Scrub PII from a string value
 */
export function scrubString(value: string): string {
  let result = value;
  for (const { pattern, replacement } of PII_PATTERNS) {
    result = result.replace(pattern, replacement);
  }
  return result;
}

/**
 * Recursively scrub PII from a value
 */
export function scrubValue(value: unknown, depth = 0): unknown {
  if (depth > 10) {
    return '[MAX_DEPTH_REACHED]';
  }
  if (value === null || value === undefined) {
    return value;
  }
  if (typeof value === 'string') {
    return scrubString(value);
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'symbol') {
    return value.description ?? value.toString();
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => scrubValue(item, depth + 1));
  }
  if (typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = SENSITIVE_FIELD_NAMES.has(key.toLowerCase())
        ? '[REDACTED]'
        : scrubValue(entry, depth + 1);
    }
    return result;
  }
  return '[UNSUPPORTED_TYPE]';
}

/**
 * Safe logger options
 */
export interface SafeLoggerOptions extends LoggerOptions {
  /**
   * Whether to enable PII scrubbing
   * @default true
   */
  scrubPii?: boolean;
}

/**
 * Create a logger that scrubs banking identifiers, emails and tax ids from
 * messages and context before they reach the sink.
 *
 * @example
 * ```typescript
 * const logger = createSafeLogger({ prefix: 'parser' });
 * logger.debug('IBAN candidate rejected', { iban: 'DE89370400440532013000' });
 * // ... {"iban":"[REDACTED]"}
 * ```
 */
export function createSafeLogger(options: SafeLoggerOptions = {}): Logger {
  const baseLogger = createLogger(options);
  const scrubPii = options.scrubPii ?? true;

  const scrubContext = (context?: Record<string, unknown>): Record<string, unknown> | undefined => {
    if (!scrubPii || context === undefined) {
      return context;
    }
    const scrubbed: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(context)) {
      scrubbed[key] = SENSITIVE_FIELD_NAMES.has(key.toLowerCase())
        ? '[REDACTED]'
        : scrubValue(entry, 1);
    }
    return scrubbed;
  };

  const scrubMessage = (message: string): string => (scrubPii ? scrubString(message) : message);

  return {
    debug: (message, context) => baseLogger.debug(scrubMessage(message), scrubContext(context)),
    info: (message, context) => baseLogger.info(scrubMessage(message), scrubContext(context)),
    warn: (message, context) => baseLogger.warn(scrubMessage(message), scrubContext(context)),
    error: (message, context) => baseLogger.error(scrubMessage(message), scrubContext(context)),

    child(context: Record<string, unknown>): Logger {
      return createSafeLogger({
        ...options,
        context: { ...options.context, ...scrubContext(context) },
      });
    },
  };
}
