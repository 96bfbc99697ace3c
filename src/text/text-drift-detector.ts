/**
 * Text Drift Detector
 *
 * Compares each bucket of a text source against a baseline built from other
 * buckets and emits candidates for four kinds of drift:
 *
 * - keyword frequency: relative change of a term's share of all terms
 * - topic: cosine similarity of the TF-IDF centroids
 * - category: change in the share of each document category
 * - sentiment: change in the positive / neutral / negative distribution
 *
 * textSimilarityThreshold s drives the first two. Keyword frequencies may move
 * by up to 2(1 - s) / s before a term counts as drifted (0.5 at s = 0.8).
 */

import {
  AnomalyType,
  DetectionMethod,
  MethodOutcome,
  TEXT_METHODS,
  TextCandidate,
  TextFeatures,
} from '../anomaly/anomaly-types.js';
import { DegenerateInputError, InsufficientDataError } from '../anomaly/errors.js';
import { AnomalyDetectionParameters, TextDriftOptions } from '../config/detection-parameters.js';
import { Logger } from '../utils/logger.js';
import { aggregateFeatures, centroid, cosineSimilarity } from './text-feature-extractor.js';

export interface KeywordChange {
  term: string;
  baselineFrequency: number;
  observedFrequency: number;
  change: number;
}

interface ProportionDrift {
  shifted: { label: string; delta: number }[];
  oldProportions: Record<string, number>;
  newProportions: Record<string, number>;
}

export function keywordDriftTolerance(similarityThreshold: number): number {
  return (2 * (1 - similarityThreshold)) / similarityThreshold;
}

export class TextDriftDetector {
  private logger: Logger;

  constructor(
    private params: AnomalyDetectionParameters,
    private options: TextDriftOptions,
    private vocabulary: readonly string[] = []
  ) {
    this.logger = new Logger();
  }

  /**
   * Baseline for bucket `index`, or null when it has none (the first bucket in
   * trailing mode, a reference bucket in fixed mode).
   */
  baselineFor(index: number, features: readonly TextFeatures[]): TextFeatures | null {
    const baseline = this.options.baseline;
    let parts: TextFeatures[];

    if (baseline.mode === 'trailing') {
      parts = features.slice(Math.max(0, index - baseline.buckets), index);
    } else {
      if (baseline.referenceBuckets.includes(index)) return null;
      parts = baseline.referenceBuckets.filter((i) => i < features.length).map((i) => features[i]);
    }

    return parts.length === 0 ? null : aggregateFeatures(parts);
  }

  detect(source: string, features: readonly TextFeatures[]): MethodOutcome {
    const outcome: MethodOutcome = { candidates: [], skipped: [] };

    if (features.length < 2) {
      for (const method of TEXT_METHODS) {
        outcome.skipped.push({
          method,
          reason: 'insufficient-data',
          message: `Drift detection needs at least 2 buckets, "${source}" has ${features.length}`,
        });
      }
      return outcome;
    }

    for (const method of TEXT_METHODS) {
      const result = this.runMethod(source, method, features);
      outcome.candidates.push(...result.candidates);
      outcome.skipped.push(...result.skipped);
    }
    return outcome;
  }

  /**
   * One drift check over every bucket that has a baseline.
   */
  runMethod(source: string, method: DetectionMethod, features: readonly TextFeatures[]): MethodOutcome {
    const outcome: MethodOutcome = { candidates: [], skipped: [] };
    let compared = 0;

    features.forEach((target, index) => {
      const baseline = this.baselineFor(index, features);
      if (baseline === null) return;
      compared++;

      try {
        const candidate = this.compare(source, method, index, target, baseline);
        if (candidate) outcome.candidates.push(candidate);
      } catch (error) {
        if (!(error instanceof InsufficientDataError || error instanceof DegenerateInputError)) {
          throw error;
        }
        this.logger.debug('Drift check skipped for bucket', { source, method, bucket: index, code: error.code });
        outcome.skipped.push({
          method,
          reason: error instanceof InsufficientDataError ? 'insufficient-data' : 'degenerate-input',
          message: `Bucket ${index}: ${error.message}`,
        });
      }
    });

    if (compared === 0) {
      outcome.skipped.push({
        method,
        reason: 'insufficient-data',
        message: `No bucket of "${source}" has a baseline to compare against`,
      });
    }
    return outcome;
  }

  compare(
    source: string,
    method: DetectionMethod,
    index: number,
    target: TextFeatures,
    baseline: TextFeatures
  ): TextCandidate | null {
    if (target.documentCount === 0) {
      throw new DegenerateInputError('Bucket holds no documents', 'empty-bucket');
    }
    if (baseline.documentCount === 0) {
      throw new DegenerateInputError('Baseline holds no documents', 'empty-baseline');
    }
    if (target.totalTerms === 0 || baseline.totalTerms === 0) {
      throw new DegenerateInputError('No terms to compare', 'empty-vocabulary');
    }

    switch (method) {
      case DetectionMethod.KEYWORD_FREQUENCY:
        return this.keywordDrift(source, index, target, baseline);
      case DetectionMethod.TOPIC:
        return this.topicDrift(source, index, target, baseline);
      case DetectionMethod.CATEGORY:
        return this.categoryShift(source, index, target, baseline);
      case DetectionMethod.SENTIMENT:
        return this.sentimentShift(source, index, target, baseline);
      default:
        throw new Error(`Method ${method} does not apply to text`);
    }
  }

  keywordChanges(target: TextFeatures, baseline: TextFeatures): KeywordChange[] {
    const terms = new Set([...target.termFrequency.keys(), ...baseline.termFrequency.keys()]);
    const changes: KeywordChange[] = [];

    for (const term of terms) {
      const observedCount = target.termFrequency.get(term) ?? 0;
      const baselineCount = baseline.termFrequency.get(term) ?? 0;
      if (observedCount < this.options.minTermCount && baselineCount < this.options.minTermCount) continue;

      const observedFrequency = observedCount / target.totalTerms;
      const baselineFrequency = baselineCount / baseline.totalTerms;
      // A term absent from the baseline counts as a full doubling
      const change = baselineFrequency > 0 ? (observedFrequency - baselineFrequency) / baselineFrequency : 1;
      changes.push({ term, baselineFrequency, observedFrequency, change });
    }

    return changes.sort((a, b) => Math.abs(b.change) - Math.abs(a.change) || a.term.localeCompare(b.term));
  }

  private keywordDrift(
    source: string,
    index: number,
    target: TextFeatures,
    baseline: TextFeatures
  ): TextCandidate | null {
    const tolerance = keywordDriftTolerance(this.params.textSimilarityThreshold);
    const drifted = this.keywordChanges(target, baseline).filter((c) => Math.abs(c.change) > tolerance);
    if (drifted.length === 0) return null;

    const drivers = drifted.slice(0, this.options.maxDrivingKeywords);
    const top = drivers[0];
    const score = tolerance > 0 ? Math.min(1, Math.abs(top.change) / (2 * tolerance)) : 1;

    return {
      kind: 'text',
      source,
      method: DetectionMethod.KEYWORD_FREQUENCY,
      type: AnomalyType.KEYWORD_DRIFT,
      sequence: index,
      window: target.window,
      score,
      observed: top.observedFrequency,
      baseline: top.baselineFrequency,
      magnitudeKind: 'relative',
      keywords: drivers.map((c) => c.term),
      categories: [],
      details: { tolerance, changes: drivers, driftedTermCount: drifted.length },
    };
  }

  private topicDrift(source: string, index: number, target: TextFeatures, baseline: TextFeatures): TextCandidate | null {
    const current = centroid(target);
    const reference = centroid(baseline);
    if (current === null || reference === null) {
      throw new DegenerateInputError('No document vectors to compare', 'empty-bucket');
    }

    const similarity = cosineSimilarity(current, reference);
    if (similarity === 0 && (isZero(current) || isZero(reference))) {
      throw new DegenerateInputError('Topic centroid has no weight', 'zero-vector');
    }
    if (!(similarity < this.params.textSimilarityThreshold)) return null;

    const distance = 1 - similarity;
    return {
      kind: 'text',
      source,
      method: DetectionMethod.TOPIC,
      type: AnomalyType.KEYWORD_DRIFT,
      sequence: index,
      window: target.window,
      score: Math.min(1, Math.max(0, distance)),
      observed: distance,
      baseline: 0,
      magnitudeKind: 'percentage-point',
      keywords: this.topCentroidShifts(current, reference),
      categories: [],
      details: { similarity, threshold: this.params.textSimilarityThreshold },
    };
  }

  private topCentroidShifts(current: number[], reference: number[]): string[] {
    if (this.vocabulary.length !== current.length) return [];

    return current
      .map((weight, i) => ({ term: this.vocabulary[i], shift: weight - reference[i] }))
      .filter((entry) => entry.shift !== 0)
      .sort((a, b) => Math.abs(b.shift) - Math.abs(a.shift) || a.term.localeCompare(b.term))
      .slice(0, this.options.maxDrivingKeywords)
      .map((entry) => entry.term);
  }

  private categoryShift(
    source: string,
    index: number,
    target: TextFeatures,
    baseline: TextFeatures
  ): TextCandidate | null {
    if (target.categorizedCount === 0 || baseline.categorizedCount === 0) {
      throw new DegenerateInputError('No categorized documents to compare', 'no-categories');
    }

    const drift = this.proportionDrift(target.categoryProportions, baseline.categoryProportions);
    return this.proportionCandidate(source, DetectionMethod.CATEGORY, index, target, drift, 'category');
  }

  private sentimentShift(
    source: string,
    index: number,
    target: TextFeatures,
    baseline: TextFeatures
  ): TextCandidate | null {
    const drift = this.proportionDrift(
      new Map(Object.entries(target.sentiment)),
      new Map(Object.entries(baseline.sentiment))
    );
    return this.proportionCandidate(source, DetectionMethod.SENTIMENT, index, target, drift, 'sentiment');
  }

  private proportionDrift(current: Map<string, number>, reference: Map<string, number>): ProportionDrift {
    const labels = [...new Set([...reference.keys(), ...current.keys()])].sort();
    const oldProportions: Record<string, number> = {};
    const newProportions: Record<string, number> = {};
    const shifted: { label: string; delta: number }[] = [];

    for (const label of labels) {
      const before = reference.get(label) ?? 0;
      const after = current.get(label) ?? 0;
      oldProportions[label] = before;
      newProportions[label] = after;

      const delta = after - before;
      if (Math.abs(delta) > this.options.proportionDelta) {
        shifted.push({ label, delta });
      }
    }

    shifted.sort((a, b) => Math.abs(b.delta) - Math.abs(a.delta) || a.label.localeCompare(b.label));
    return { shifted, oldProportions, newProportions };
  }

  private proportionCandidate(
    source: string,
    method: DetectionMethod,
    index: number,
    target: TextFeatures,
    drift: ProportionDrift,
    dimension: 'category' | 'sentiment'
  ): TextCandidate | null {
    if (drift.shifted.length === 0) return null;

    const top = drift.shifted[0];
    return {
      kind: 'text',
      source,
      method,
      type: AnomalyType.CATEGORY_SHIFT,
      sequence: index,
      window: target.window,
      score: Math.min(1, Math.abs(top.delta) / (2 * this.options.proportionDelta)),
      observed: drift.newProportions[top.label],
      baseline: drift.oldProportions[top.label],
      magnitudeKind: 'percentage-point',
      keywords: [],
      categories: drift.shifted.map((s) => s.label),
      details: {
        dimension,
        oldProportions: drift.oldProportions,
        newProportions: drift.newProportions,
      },
    };
  }
}

function isZero(vector: readonly number[]): boolean {
  return vector.every((v) => v === 0);
}
