import { describe, it, expect } from 'vitest';
import { createDocumentText, ModelFormatError } from '@fieldwise/shared';
import { LAYOUT_FEATURE_NAMES, extractLayoutFeatures, toFeatureVector } from './features.js';
import {
  CENTROID_MODEL_FORMAT,
  CENTROID_MODEL_VERSION,
  loadCentroidModel,
  trainCentroidModel,
  type LayoutSample,
} from './centroid.js';
import { TrainedLayoutClassifier } from './trained.js';

const WIDTH = LAYOUT_FEATURE_NAMES.length;
const zeros = (): number[] => new Array<number>(WIDTH).fill(0);

const SAMPLES: LayoutSample[] = [
  { doc: createDocumentText(['From: Acme GmbH', 'To: Beta Ltd']), category: 'two_column' },
  { doc: createDocumentText(['Absender:', 'Acme GmbH', 'Empfänger:', 'Beta AG']), category: 'single_column' },
  { doc: createDocumentText(['Thanks for shopping with us today']), category: 'unstructured' },
];

const vectorOf = (sample: LayoutSample): number[] => toFeatureVector(extractLayoutFeatures(sample.doc));

function handMadeModel() {
  const far = zeros();
  far[0] = 2;
  return {
    format: CENTROID_MODEL_FORMAT,
    version: CENTROID_MODEL_VERSION,
    id: 'hand-made',
    featureNames: [...LAYOUT_FEATURE_NAMES],
    means: zeros(),
    scales: new Array<number>(WIDTH).fill(1),
    centroids: [
      { category: 'two_column', center: zeros() },
      { category: 'unstructured', center: far },
    ],
  };
}

describe('CentroidLayoutModel', () => {
  it('should score by softmax over negative distances', () => {
    const model = loadCentroidModel(handMadeModel());
    const output = model.predict(zeros());

    expect(output.category).toBe('two_column');
    expect(output.confidence).toBeCloseTo(1 / (1 + Math.exp(-2)), 10);
  });

  it('should reject a vector of the wrong length', () => {
    const model = loadCentroidModel(handMadeModel());

    expect(() => model.predict([1, 2])).toThrow(new ModelFormatError(`Expected ${WIDTH} features, got 2`));
  });
});

describe('trainCentroidModel', () => {
  it('should predict the label of each training document', () => {
    const model = trainCentroidModel(SAMPLES, { id: 'layout-v1' });

    expect(model.id).toBe('layout-v1');
    expect(model.categories).toEqual(['two_column', 'single_column', 'unstructured']);
    for (const sample of SAMPLES) {
      const output = model.predict(vectorOf(sample));
      expect(output.category).toBe(sample.category);
      expect(output.confidence).toBeGreaterThan(1 / 3);
    }
  });

  it('should survive a serialize and load round trip', () => {
    const model = trainCentroidModel(SAMPLES);
    const restored = loadCentroidModel(model.serialize());

    expect(restored.id).toBe('centroid');
    for (const sample of SAMPLES) {
      expect(restored.predict(vectorOf(sample))).toEqual(model.predict(vectorOf(sample)));
    }
  });

  it('should refuse to train without samples', () => {
    expect(() => trainCentroidModel([])).toThrow('Cannot train a layout model without samples');
  });

  it('should drive a trained classifier', () => {
    const classifier = new TrainedLayoutClassifier({ model: trainCentroidModel(SAMPLES, { id: 'layout-v1' }) });
    const prediction = classifier.classify(createDocumentText(['From: Acme GmbH', 'To: Beta Ltd']));

    expect(prediction.category).toBe('two_column');
    expect(prediction.classifierId).toBe('trained:layout-v1');
  });
});

describe('loadCentroidModel', () => {
  it('should reject invalid JSON', () => {
    expect(() => loadCentroidModel('{')).toThrow(ModelFormatError);
  });

  it('should reject another format', () => {
    expect(() => loadCentroidModel({ ...handMadeModel(), format: 'sklearn' })).toThrow(
      'Unsupported layout model format',
    );
  });

  it('should reject a model trained on other features', () => {
    const data = { ...handMadeModel(), featureNames: [...LAYOUT_FEATURE_NAMES].reverse() };

    expect(() => loadCentroidModel(data)).toThrow('Layout model was trained on a different feature set');
  });

  it('should reject a centroid of the wrong width', () => {
    const data = { ...handMadeModel(), centroids: [{ category: 'two_column', center: [0, 1] }] };

    expect(() => loadCentroidModel(data)).toThrow(`centroids[0].center must hold ${WIDTH} finite numbers`);
  });

  it('should reject unknown categories and duplicates', () => {
    const unknown = { ...handMadeModel(), centroids: [{ category: 'three_column', center: zeros() }] };
    const duplicate = {
      ...handMadeModel(),
      centroids: [
        { category: 'two_column', center: zeros() },
        { category: 'two_column', center: zeros() },
      ],
    };

    expect(() => loadCentroidModel(unknown)).toThrow('centroids[0] has no valid category');
    expect(() => loadCentroidModel(duplicate)).toThrow("Duplicate centroid for category 'two_column'");
  });

  it('should reject non-positive scales', () => {
    expect(() => loadCentroidModel({ ...handMadeModel(), scales: zeros() })).toThrow('scales must be positive');
  });
});
