import { describe, it, expect } from 'vitest';
import { createDocumentText } from '@fieldwise/shared';
import { LAYOUT_FEATURE_NAMES, extractLayoutFeatures, toFeatureVector } from './features.js';

const DOC = createDocumentText(['From: Acme GmbH', 'To: Beta Ltd', '', 'Invoice date: 15.01.2024']);

describe('extractLayoutFeatures', () => {
  it('should compute line statistics over non-empty lines', () => {
    const features = extractLayoutFeatures(DOC);

    expect(features.line_count).toBe(4);
    expect(features.non_empty_line_count).toBe(3);
    expect(features.char_count).toBe(54);
    expect(features.word_count).toBe(9);
    expect(features.avg_line_length).toBe(17);
    expect(features.max_line_length).toBe(24);
    expect(features.min_line_length).toBe(12);
    expect(features.line_length_variance).toBe(26);
  });

  it('should flag labels, keywords and dates', () => {
    const features = extractLayoutFeatures(DOC);

    expect(features.has_from_to).toBe(1);
    expect(features.has_bill_from_to).toBe(0);
    expect(features.has_sender_recipient).toBe(0);
    expect(features.has_german_labels).toBe(0);
    expect(features.has_vendor_fingerprint).toBe(0);
    expect(features.has_side_by_side_anchor).toBe(0);
    expect(features.has_invoice_keyword).toBe(1);
    expect(features.has_date_pattern).toBe(1);
  });

  it('should measure punctuation per character', () => {
    const features = extractLayoutFeatures(DOC);

    expect(features.colon_density).toBeCloseTo(3 / 54, 10);
    expect(features.comma_density).toBe(0);
    expect(features.period_density).toBeCloseTo(2 / 54, 10);
  });

  it('should return zeros for empty text', () => {
    const features = extractLayoutFeatures(createDocumentText(''));

    expect(features.line_count).toBe(1);
    expect(features.non_empty_line_count).toBe(0);
    expect(features.avg_line_length).toBe(0);
    expect(features.max_line_length).toBe(0);
    expect(features.colon_density).toBe(0);
  });

  it('should flag German labels and vendor fingerprints', () => {
    const features = extractLayoutFeatures(createDocumentText(['DB Vertrieb GmbH', 'Empfänger: Max Mustermann']));

    expect(features.has_german_labels).toBe(1);
    expect(features.has_vendor_fingerprint).toBe(1);
  });
});

describe('toFeatureVector', () => {
  it('should order values by LAYOUT_FEATURE_NAMES', () => {
    const vector = toFeatureVector(extractLayoutFeatures(DOC));

    expect(vector).toHaveLength(LAYOUT_FEATURE_NAMES.length);
    expect(vector.slice(0, 8)).toEqual([4, 3, 54, 9, 17, 24, 12, 26]);
    expect(vector[LAYOUT_FEATURE_NAMES.indexOf('has_from_to')]).toBe(1);
  });
});
