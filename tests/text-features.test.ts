/**
 * Tokenizer & Text Feature Extraction Tests
 */

import { describe, it, expect } from 'vitest';
import { classifySentiment, documentTerms, tokenize } from '../src/text/tokenizer.js';
import {
  TextFeatureExtractor,
  aggregateFeatures,
  centroid,
  cosineSimilarity,
} from '../src/text/text-feature-extractor.js';
import { TextBucket, TextDocument } from '../src/anomaly/anomaly-types.js';

function doc(id: string, content: string, category?: string): TextDocument {
  return { id, content, timestamp: 0, category, keywords: [] };
}

describe('tokenizer', () => {
  it('should lower-case and drop stop words and single characters', () => {
    expect(tokenize('The Budget, and the AUDIT-review! 2024 a x')).toEqual(['budget', 'audit', 'review', '2024']);
  });

  it('should keep accented letters inside tokens', () => {
    expect(tokenize('Café résumé')).toEqual(['café', 'résumé']);
  });

  it('should append curated keywords as whole terms', () => {
    const terms = documentTerms({
      id: 'k',
      content: 'Board meeting',
      timestamp: 0,
      keywords: [' Capital Plan ', ''],
    });

    expect(terms).toEqual(['board', 'meeting', 'capital plan']);
  });

  it('should classify sentiment by lexicon hits', () => {
    expect(classifySentiment(['good', 'delay', 'delay'])).toBe('negative');
    expect(classifySentiment(['improved', 'budget'])).toBe('positive');
    expect(classifySentiment(['good', 'delay'])).toBe('neutral');
    expect(classifySentiment([])).toBe('neutral');
  });
});

describe('TextFeatureExtractor', () => {
  const d1 = doc('d1', 'budget audit', 'finance');
  const d2 = doc('d2', 'audit delay', 'ops');
  const d3 = doc('d3', 'budget growth');
  const buckets: TextBucket[] = [
    { start: 0, end: 99, documents: [d1, d2] },
    { start: 100, end: 199, documents: [d3] },
    { start: 200, end: 299, documents: [] },
  ];
  const extractor = TextFeatureExtractor.forBuckets(buckets);

  // 3 documents; audit and budget appear in 2, delay and growth in 1
  const idfShared = Math.log(4 / 3) + 1;
  const idfSingle = Math.log(2) + 1;

  it('should build a sorted corpus vocabulary', () => {
    expect(extractor.vocabulary()).toEqual(['audit', 'budget', 'delay', 'growth']);
    expect(extractor.dimension).toBe(4);
  });

  it('should count terms and documents per bucket', () => {
    const features = extractor.extract(buckets[0]);

    expect(features.window).toEqual({ start: 0, end: 99 });
    expect(features.documentCount).toBe(2);
    expect(features.totalTerms).toBe(4);
    expect(features.termFrequency.get('audit')).toBe(2);
    expect(features.termFrequency.get('delay')).toBe(1);
    expect([...features.vocabulary].sort()).toEqual(['audit', 'budget', 'delay']);
  });

  it('should weight terms by TF-IDF over the corpus vocabulary', () => {
    const vector = extractor.extract(buckets[0]).tfidf.find((v) => v.documentId === 'd2')?.vector;

    expect(vector).toHaveLength(4);
    expect(vector?.[0]).toBeCloseTo(0.5 * idfShared, 10);
    expect(vector?.[1]).toBe(0);
    expect(vector?.[2]).toBeCloseTo(0.5 * idfSingle, 10);
    expect(vector?.[3]).toBe(0);
  });

  it('should compute category proportions over categorized documents', () => {
    const first = extractor.extract(buckets[0]);
    const second = extractor.extract(buckets[1]);

    expect(first.categorizedCount).toBe(2);
    expect(Object.fromEntries(first.categoryProportions)).toEqual({ finance: 0.5, ops: 0.5 });
    expect(second.categorizedCount).toBe(0);
    expect(second.categoryProportions.size).toBe(0);
  });

  it('should compute the sentiment distribution', () => {
    expect(extractor.extract(buckets[0]).sentiment).toEqual({ positive: 0, neutral: 0.5, negative: 0.5 });
    expect(extractor.extract(buckets[1]).sentiment).toEqual({ positive: 1, neutral: 0, negative: 0 });
  });

  it('should give an empty bucket empty features', () => {
    const features = extractor.extract(buckets[2]);

    expect(features.documentCount).toBe(0);
    expect(features.totalTerms).toBe(0);
    expect(features.vocabulary.size).toBe(0);
    expect(features.tfidf).toEqual([]);
    expect(features.sentiment).toEqual({ positive: 0, neutral: 0, negative: 0 });
    expect(centroid(features)).toBeNull();
  });

  it('should pool buckets into one baseline', () => {
    const pooled = aggregateFeatures([extractor.extract(buckets[0]), extractor.extract(buckets[1])]);

    expect(pooled.window).toEqual({ start: 0, end: 199 });
    expect(pooled.documentCount).toBe(3);
    expect(pooled.categorizedCount).toBe(2);
    expect(pooled.totalTerms).toBe(6);
    expect(pooled.termFrequency.get('budget')).toBe(2);
    expect(pooled.tfidf.map((v) => v.documentId)).toEqual(['d1', 'd2', 'd3']);
    expect(pooled.categoryProportions.get('finance')).toBe(0.5);
    expect(pooled.sentiment.positive).toBeCloseTo(1 / 3, 10);
    expect(pooled.sentiment.neutral).toBeCloseTo(1 / 3, 10);
    expect(pooled.sentiment.negative).toBeCloseTo(1 / 3, 10);
  });

  it('should keep every document when pooling buckets that reuse ids', () => {
    const reused: TextBucket[] = [
      { start: 0, end: 99, documents: [doc('d0', 'budget audit')] },
      { start: 100, end: 199, documents: [doc('d0', 'flood repair')] },
    ];
    const fitted = TextFeatureExtractor.forBuckets(reused);

    const pooled = aggregateFeatures(reused.map((b) => fitted.extract(b)));

    expect(pooled.documentCount).toBe(2);
    expect(pooled.tfidf).toHaveLength(2);
    expect(pooled.tfidf.map((v) => v.documentId)).toEqual(['d0', 'd0']);
  });

  it('should average document vectors into a centroid', () => {
    const center = centroid(extractor.extract(buckets[0]));

    expect(center?.[0]).toBeCloseTo(0.5 * idfShared, 10);
    expect(center?.[1]).toBeCloseTo(0.25 * idfShared, 10);
    expect(center?.[2]).toBeCloseTo(0.25 * idfSingle, 10);
    expect(center?.[3]).toBe(0);
  });
});

describe('cosineSimilarity', () => {
  it('should compare direction only', () => {
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1, 10);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it('should return 0 for a zero vector', () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it('should reject vectors of different dimension', () => {
    expect(() => cosineSimilarity([1], [1, 2])).toThrow('dimension mismatch');
  });
});
