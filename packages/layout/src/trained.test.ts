import { describe, it, expect, vi } from 'vitest';
import type { LayoutModel, LayoutModelOutput } from '@fieldwise/contracts';
import { createDocumentText } from '@fieldwise/shared';
import { LAYOUT_FEATURE_NAMES } from './features.js';
import { TrainedLayoutClassifier } from './trained.js';

const DOC = createDocumentText(['From: Acme', 'To: Beta']);

function createModel(predict: (features: readonly number[]) => LayoutModelOutput): LayoutModel {
  return { id: 'fake-model', predict: vi.fn(predict) };
}

function createLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), child: vi.fn() };
}

describe('TrainedLayoutClassifier', () => {
  it('should return the model prediction', () => {
    const model = createModel(() => ({ category: 'single_column', confidence: 0.93 }));
    const classifier = new TrainedLayoutClassifier({ model, logger: createLogger() });

    expect(classifier.classify(DOC)).toEqual({
      category: 'single_column',
      confidence: 0.93,
      classifierId: 'trained:fake-model',
    });
    expect(model.predict).toHaveBeenCalledWith(expect.any(Array));
    expect(vi.mocked(model.predict).mock.calls[0]?.[0]).toHaveLength(LAYOUT_FEATURE_NAMES.length);
  });

  it('should fall back to rules on an unknown category', () => {
    const logger = createLogger();
    const classifier = new TrainedLayoutClassifier({
      model: createModel(() => ({ category: 'three_column', confidence: 0.9 })),
      logger,
    });

    expect(classifier.classify(DOC)).toEqual({ category: 'two_column', confidence: 0.8, classifierId: 'rule-based' });
    expect(logger.warn).toHaveBeenCalledWith('Layout model output rejected, using rule-based classification', {
      modelId: 'fake-model',
      reason: "unknown category 'three_column'",
    });
  });

  it('should fall back to rules when the model throws', () => {
    const logger = createLogger();
    const classifier = new TrainedLayoutClassifier({
      model: createModel(() => {
        throw new Error('weights missing');
      }),
      logger,
    });

    expect(classifier.classify(DOC).classifierId).toBe('rule-based');
    expect(logger.warn).toHaveBeenCalledWith('Layout model output rejected, using rule-based classification', {
      modelId: 'fake-model',
      reason: 'prediction failed: weights missing',
    });
  });

  it('should reject a confidence outside [0, 1]', () => {
    const classifier = new TrainedLayoutClassifier({
      model: createModel(() => ({ category: 'unstructured', confidence: 1.5 })),
      logger: createLogger(),
    });

    expect(classifier.classify(DOC).category).toBe('two_column');
  });
});
