/**
 * @fieldwise/learned
 *
 * Learned fallback extractors. The model itself is a capability owned by
 * the host application; this package only adapts its output to a field
 * map.
 *
 * @packageDocumentation
 */

export {
  EntityLearnedExtractor,
  entitiesToFields,
  groupEntities,
  type EntityLearnedExtractorOptions,
} from './entity-extractor.js';
export { NULL_LEARNED_EXTRACTOR_ID, NullLearnedExtractor } from './null-extractor.js';
