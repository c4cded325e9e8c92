import { createFieldMap, type LearnedExtraction, type LearnedExtractor } from '@fieldwise/contracts';

export const NULL_LEARNED_EXTRACTOR_ID = 'null';

/**
 * Stand-in used when no model is configured. Never available, so the
 * pipeline treats ML as disabled.
 */
export class NullLearnedExtractor implements LearnedExtractor {
  readonly id = NULL_LEARNED_EXTRACTOR_ID;

  isAvailable(): boolean {
    return false;
  }

  extract(): LearnedExtraction {
    return { fieldMap: createFieldMap(), confidence: 0 };
  }
}
