/**
 * Text Feature Extraction
 *
 * Turns a bucket of documents into the features the drift checks compare:
 * term counts, TF-IDF vectors, category proportions and a sentiment
 * distribution. IDF and the vector dimensions come from the whole corpus
 * (every bucket of a source), so vectors from different buckets share one space.
 */

import {
  DocumentVector,
  SentimentDistribution,
  TextBucket,
  TextDocument,
  TextFeatures,
} from '../anomaly/anomaly-types.js';
import { TermCache, classifySentiment } from './tokenizer.js';

const EMPTY_SENTIMENT: SentimentDistribution = { positive: 0, neutral: 0, negative: 0 };

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denom = Math.sqrt(normA) * Math.sqrt(normB);
  return denom === 0 ? 0 : dot / denom;
}

/**
 * Mean TF-IDF vector of the features, or null when they hold no documents.
 */
export function centroid(features: TextFeatures): number[] | null {
  let result: number[] | null = null;
  for (const { vector } of features.tfidf) {
    if (result === null) result = new Array<number>(vector.length).fill(0);
    for (let i = 0; i < vector.length; i++) result[i] += vector[i];
  }
  if (result === null) return null;

  const count = features.tfidf.length;
  return result.map((v) => v / count);
}

/**
 * Pool several buckets' features into one baseline.
 */
export function aggregateFeatures(parts: readonly TextFeatures[]): TextFeatures {
  const window = {
    start: Math.min(...parts.map((p) => p.window.start)),
    end: Math.max(...parts.map((p) => p.window.end)),
  };

  const termFrequency = new Map<string, number>();
  const tfidf: DocumentVector[] = [];
  const categoryCounts = new Map<string, number>();
  const sentimentCounts = { ...EMPTY_SENTIMENT };
  let documentCount = 0;
  let categorizedCount = 0;
  let totalTerms = 0;

  for (const part of parts) {
    documentCount += part.documentCount;
    categorizedCount += part.categorizedCount;
    totalTerms += part.totalTerms;

    for (const [term, count] of part.termFrequency) {
      termFrequency.set(term, (termFrequency.get(term) ?? 0) + count);
    }
    tfidf.push(...part.tfidf);
    for (const [category, proportion] of part.categoryProportions) {
      categoryCounts.set(category, (categoryCounts.get(category) ?? 0) + proportion * part.categorizedCount);
    }
    sentimentCounts.positive += part.sentiment.positive * part.documentCount;
    sentimentCounts.neutral += part.sentiment.neutral * part.documentCount;
    sentimentCounts.negative += part.sentiment.negative * part.documentCount;
  }

  const categoryProportions = new Map<string, number>();
  for (const [category, count] of categoryCounts) {
    categoryProportions.set(category, count / categorizedCount);
  }

  return {
    window,
    documentCount,
    categorizedCount,
    totalTerms,
    vocabulary: new Set(termFrequency.keys()),
    termFrequency,
    tfidf,
    categoryProportions,
    sentiment:
      documentCount === 0
        ? { ...EMPTY_SENTIMENT }
        : {
            positive: sentimentCounts.positive / documentCount,
            neutral: sentimentCounts.neutral / documentCount,
            negative: sentimentCounts.negative / documentCount,
          },
  };
}

export class TextFeatureExtractor {
  private terms = new TermCache();
  private vocabularyIndex = new Map<string, number>();
  private idf: number[] = [];

  /**
   * @param corpus every document the extracted buckets will contain
   */
  constructor(corpus: Iterable<TextDocument>) {
    const documentFrequency = new Map<string, number>();
    let corpusSize = 0;

    for (const doc of corpus) {
      corpusSize++;
      for (const term of new Set(this.terms.get(doc))) {
        documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1);
      }
    }

    const vocabulary = [...documentFrequency.keys()].sort();
    vocabulary.forEach((term, index) => {
      this.vocabularyIndex.set(term, index);
      // Smoothed so a term present in every document keeps a positive weight
      const df = documentFrequency.get(term) ?? 0;
      this.idf.push(Math.log((1 + corpusSize) / (1 + df)) + 1);
    });
  }

  static forBuckets(buckets: readonly TextBucket[]): TextFeatureExtractor {
    return new TextFeatureExtractor(buckets.flatMap((bucket) => bucket.documents));
  }

  get dimension(): number {
    return this.idf.length;
  }

  vocabulary(): string[] {
    return [...this.vocabularyIndex.keys()];
  }

  extract(bucket: TextBucket): TextFeatures {
    const termFrequency = new Map<string, number>();
    const tfidf: DocumentVector[] = [];
    const categoryCounts = new Map<string, number>();
    const sentimentCounts = { ...EMPTY_SENTIMENT };
    let categorizedCount = 0;
    let totalTerms = 0;

    for (const doc of bucket.documents) {
      const terms = this.terms.get(doc);
      totalTerms += terms.length;

      const docCounts = new Map<string, number>();
      for (const term of terms) {
        docCounts.set(term, (docCounts.get(term) ?? 0) + 1);
        termFrequency.set(term, (termFrequency.get(term) ?? 0) + 1);
      }
      tfidf.push({ documentId: doc.id, vector: this.vectorize(docCounts, terms.length) });

      if (doc.category !== undefined && doc.category !== '') {
        categorizedCount++;
        categoryCounts.set(doc.category, (categoryCounts.get(doc.category) ?? 0) + 1);
      }

      sentimentCounts[classifySentiment(terms)]++;
    }

    const categoryProportions = new Map<string, number>();
    for (const [category, count] of categoryCounts) {
      categoryProportions.set(category, count / categorizedCount);
    }

    const documentCount = bucket.documents.length;
    return {
      window: { start: bucket.start, end: bucket.end },
      documentCount,
      categorizedCount,
      totalTerms,
      vocabulary: new Set(termFrequency.keys()),
      termFrequency,
      tfidf,
      categoryProportions,
      sentiment:
        documentCount === 0
          ? { ...EMPTY_SENTIMENT }
          : {
              positive: sentimentCounts.positive / documentCount,
              neutral: sentimentCounts.neutral / documentCount,
              negative: sentimentCounts.negative / documentCount,
            },
    };
  }

  private vectorize(counts: Map<string, number>, length: number): number[] {
    const vector = new Array<number>(this.idf.length).fill(0);
    if (length === 0) return vector;

    for (const [term, count] of counts) {
      const index = this.vocabularyIndex.get(term);
      // Terms outside the fitted corpus have no dimension
      if (index === undefined) continue;
      vector[index] = (count / length) * this.idf[index];
    }
    return vector;
  }
}
