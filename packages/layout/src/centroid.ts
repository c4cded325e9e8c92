/**
 * Nearest-centroid layout model
 *
 * Features are z-score scaled with the training means and standard
 * deviations; each category is represented by the mean of its scaled
 * training vectors. The serialized form is plain JSON so that a model
 * trained offline can be shipped with the host application.
 */

import {
  LAYOUT_CATEGORIES,
  isLayoutCategory,
  type DocumentText,
  type LayoutCategory,
  type LayoutModel,
  type LayoutModelOutput,
} from '@fieldwise/contracts';
import { FieldwiseError, ModelFormatError } from '@fieldwise/shared';
import { LAYOUT_FEATURE_NAMES, extractLayoutFeatures, toFeatureVector } from './features.js';

export const CENTROID_MODEL_FORMAT = 'fieldwise.layout-centroid';
export const CENTROID_MODEL_VERSION = 1;

export interface CategoryCentroid {
  readonly category: LayoutCategory;

  /** Mean of the scaled training vectors */
  readonly center: readonly number[];
}

/**
 * Serialized nearest-centroid model
 */
export interface CentroidModelData {
  readonly format: typeof CENTROID_MODEL_FORMAT;
  readonly version: typeof CENTROID_MODEL_VERSION;
  readonly id: string;

  /** Must equal `LAYOUT_FEATURE_NAMES` */
  readonly featureNames: readonly string[];

  readonly means: readonly number[];

  /** Standard deviations; constant features are stored as 1 */
  readonly scales: readonly number[];

  readonly centroids: readonly CategoryCentroid[];
}

/**
 * One labeled training document
 */
export interface LayoutSample {
  readonly doc: DocumentText;
  readonly category: LayoutCategory;
}

export interface TrainCentroidOptions {
  /** @default 'centroid' */
  id?: string;
}

const distance = (a: readonly number[], b: readonly number[]): number =>
  Math.sqrt(a.reduce((sum, value, index) => sum + (value - (b[index] ?? 0)) ** 2, 0));

const columnMeans = (rows: readonly (readonly number[])[], width: number): number[] =>
  Array.from({ length: width }, (_, column) => rows.reduce((sum, row) => sum + (row[column] ?? 0), 0) / rows.length);

export class CentroidLayoutModel implements LayoutModel {
  readonly id: string;

  private readonly data: CentroidModelData;

  constructor(data: CentroidModelData) {
    this.data = data;
    this.id = data.id;
  }

  get categories(): LayoutCategory[] {
    return this.data.centroids.map((centroid) => centroid.category);
  }

  /**
   * Nearest category. The confidence is the softmax over negative
   * distances to every centroid; ties go to the centroid listed first.
   */
  predict(features: readonly number[]): LayoutModelOutput {
    const { means, scales, centroids } = this.data;
    if (features.length !== means.length) {
      throw new ModelFormatError(`Expected ${means.length} features, got ${features.length}`, {
        modelId: this.id,
      });
    }

    const scaled = features.map((value, index) => (value - (means[index] ?? 0)) / (scales[index] ?? 1));
    const distances = centroids.map((centroid) => distance(scaled, centroid.center));
    const nearest = Math.min(...distances);
    const weights = distances.map((d) => Math.exp(nearest - d));
    const total = weights.reduce((sum, weight) => sum + weight, 0);
    const best = distances.indexOf(nearest);

    return {
      category: centroids[best]?.category ?? 'unstructured',
      confidence: (weights[best] ?? 0) / total,
    };
  }

  toJSON(): CentroidModelData {
    return this.data;
  }

  serialize(): string {
    return JSON.stringify(this.data);
  }
}

/**
 * Train a nearest-centroid model from labeled documents. Categories
 * without samples get no centroid and are never predicted.
 */
export function trainCentroidModel(
  samples: readonly LayoutSample[],
  options: TrainCentroidOptions = {},
): CentroidLayoutModel {
  if (samples.length === 0) {
    throw new FieldwiseError('Cannot train a layout model without samples', 'TRAINING_ERROR');
  }

  const width = LAYOUT_FEATURE_NAMES.length;
  const vectors = samples.map((sample) => toFeatureVector(extractLayoutFeatures(sample.doc)));
  const means = columnMeans(vectors, width);
  const scales = means.map((mean, column) => {
    const variance = vectors.reduce((sum, row) => sum + ((row[column] ?? 0) - mean) ** 2, 0) / vectors.length;
    const std = Math.sqrt(variance);
    return std > 0 ? std : 1;
  });
  const scaled = vectors.map((row) => row.map((value, column) => (value - (means[column] ?? 0)) / (scales[column] ?? 1)));

  const centroids: CategoryCentroid[] = [];
  for (const category of LAYOUT_CATEGORIES) {
    const rows = scaled.filter((_, index) => samples[index]?.category === category);
    if (rows.length > 0) {
      centroids.push({ category, center: columnMeans(rows, width) });
    }
  }

  return new CentroidLayoutModel({
    format: CENTROID_MODEL_FORMAT,
    version: CENTROID_MODEL_VERSION,
    id: options.id ?? 'centroid',
    featureNames: [...LAYOUT_FEATURE_NAMES],
    means,
    scales,
    centroids,
  });
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isFiniteVector = (value: unknown, length: number): value is number[] =>
  Array.isArray(value) &&
  value.length === length &&
  value.every((item) => typeof item === 'number' && Number.isFinite(item));

function parseCentroids(value: unknown, width: number): CategoryCentroid[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new ModelFormatError('centroids must be a non-empty array');
  }

  const centroids: CategoryCentroid[] = [];
  for (const [index, entry] of value.entries()) {
    const category = isRecord(entry) ? entry['category'] : undefined;
    if (!isRecord(entry) || !isLayoutCategory(category)) {
      throw new ModelFormatError(`centroids[${index}] has no valid category`);
    }
    const center = entry['center'];
    if (!isFiniteVector(center, width)) {
      throw new ModelFormatError(`centroids[${index}].center must hold ${width} finite numbers`, { category });
    }
    if (centroids.some((centroid) => centroid.category === category)) {
      throw new ModelFormatError(`Duplicate centroid for category '${category}'`);
    }
    centroids.push({ category, center });
  }
  return centroids;
}

/**
 * Restore a model from its serialized form (a JSON string or the parsed
 * object).
 *
 * @throws ModelFormatError when the input is not a model of this format
 * and feature set
 */
export function loadCentroidModel(input: unknown): CentroidLayoutModel {
  let parsed = input;
  if (typeof input === 'string') {
    try {
      parsed = JSON.parse(input);
    } catch (error) {
      throw new ModelFormatError('Layout model is not valid JSON', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  if (!isRecord(parsed)) {
    throw new ModelFormatError('Layout model must be an object');
  }
  if (parsed['format'] !== CENTROID_MODEL_FORMAT || parsed['version'] !== CENTROID_MODEL_VERSION) {
    throw new ModelFormatError('Unsupported layout model format', {
      format: parsed['format'],
      version: parsed['version'],
    });
  }

  const id = parsed['id'];
  if (typeof id !== 'string' || id.length === 0) {
    throw new ModelFormatError('Layout model id must be a non-empty string');
  }

  const width = LAYOUT_FEATURE_NAMES.length;
  const featureNames = parsed['featureNames'];
  if (
    !Array.isArray(featureNames) ||
    featureNames.length !== width ||
    !featureNames.every((name, index) => name === LAYOUT_FEATURE_NAMES[index])
  ) {
    throw new ModelFormatError('Layout model was trained on a different feature set', { modelId: id });
  }

  const means = parsed['means'];
  const scales = parsed['scales'];
  if (!isFiniteVector(means, width) || !isFiniteVector(scales, width)) {
    throw new ModelFormatError(`means and scales must hold ${width} finite numbers`, { modelId: id });
  }
  if (scales.some((scale) => scale <= 0)) {
    throw new ModelFormatError('scales must be positive', { modelId: id });
  }

  return new CentroidLayoutModel({
    format: CENTROID_MODEL_FORMAT,
    version: CENTROID_MODEL_VERSION,
    id,
    featureNames: [...LAYOUT_FEATURE_NAMES],
    means,
    scales,
    centroids: parseCentroids(parsed['centroids'], width),
  });
}
