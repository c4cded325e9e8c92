/**
 * @fieldwise/invoice-parser
 *
 * Composition root: wires the built-in strategies, layout hinting, the
 * learned fallback, hooks and logging into an extraction pipeline.
 *
 * @packageDocumentation
 */

export {
  createInvoiceParser,
  parseInvoiceText,
  type InvoiceParser,
  type InvoiceParserOptions,
} from './invoice-parser.js';

// Re-exported for callers that only depend on this package
export { UNRESOLVED, isResolved, fieldMapToRecord, detailsToRecord } from '@fieldwise/contracts';
export type { ExtractionResult, FieldMap, FieldName, ParserConfigInput } from '@fieldwise/contracts';
export { ConfigurationError } from '@fieldwise/shared';
