/**
 * Anomaly Scorer & Window Resolver Tests
 */

import { describe, it, expect } from 'vitest';
import { AnomalyScorer, SEVERITY_THRESHOLDS, severityForScore, severityRank } from '../src/scoring/anomaly-scorer.js';
import { TimeSeriesDetector } from '../src/timeseries/time-series-detector.js';
import { createTimeSeries } from '../src/timeseries/time-series.js';
import { resolveParameters } from '../src/config/detection-parameters.js';
import {
  AnomalySeverity,
  AnomalyType,
  DetectionMethod,
  TextCandidate,
  TimeSeriesCandidate,
} from '../src/anomaly/anomaly-types.js';

const MINUTE = 60_000;
const DAY = 86_400_000;
const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-5[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

function pointCandidate(sequence: number, score: number, overrides: Partial<TimeSeriesCandidate> = {}): TimeSeriesCandidate {
  return {
    kind: 'time-series',
    source: 'admissions',
    method: DetectionMethod.Z_SCORE,
    type: AnomalyType.SPIKE,
    sequence,
    window: { start: sequence * MINUTE, end: sequence * MINUTE },
    score,
    value: 100,
    expected: 10,
    deviation: 4,
    ...overrides,
  };
}

function bucketCandidate(sequence: number, overrides: Partial<TextCandidate> = {}): TextCandidate {
  return {
    kind: 'text',
    source: 'minutes',
    method: DetectionMethod.KEYWORD_FREQUENCY,
    type: AnomalyType.KEYWORD_DRIFT,
    sequence,
    window: { start: sequence * DAY, end: (sequence + 1) * DAY - 1 },
    score: 0.6,
    observed: 0.3,
    baseline: 0.15,
    magnitudeKind: 'relative',
    keywords: ['audit'],
    categories: [],
    details: {},
    ...overrides,
  };
}

describe('severityForScore', () => {
  it('should bucket scores at the policy boundaries', () => {
    expect(SEVERITY_THRESHOLDS).toEqual({ medium: 0.4, high: 0.7 });
    expect(severityForScore(0)).toBe(AnomalySeverity.LOW);
    expect(severityForScore(0.39)).toBe(AnomalySeverity.LOW);
    expect(severityForScore(0.4)).toBe(AnomalySeverity.MEDIUM);
    expect(severityForScore(0.69)).toBe(AnomalySeverity.MEDIUM);
    expect(severityForScore(0.7)).toBe(AnomalySeverity.HIGH);
    expect(severityForScore(1)).toBe(AnomalySeverity.HIGH);
  });

  it('should never lower severity as the score rises', () => {
    let previous = severityRank(severityForScore(0));
    for (let i = 1; i <= 100; i++) {
      const rank = severityRank(severityForScore(i / 100));
      expect(rank).toBeGreaterThanOrEqual(previous);
      previous = rank;
    }
  });
});

describe('AnomalyScorer', () => {
  describe('merging', () => {
    it('should merge adjacent points into one anomaly', () => {
      const anomalies = new AnomalyScorer().score([pointCandidate(31, 0.62), pointCandidate(30, 0.64)]);

      expect(anomalies).toHaveLength(1);
      const [merged] = anomalies;
      expect(merged.timeWindow).toEqual({ start: 30 * MINUTE, end: 31 * MINUTE });
      expect(merged.score).toBe(0.64);
      expect(merged.severity).toBe(AnomalySeverity.MEDIUM);
      expect(merged.metadata.candidateCount).toBe(2);
    });

    it('should keep separated points apart', () => {
      const anomalies = new AnomalyScorer().score([pointCandidate(5, 0.5), pointCandidate(9, 0.5)]);

      expect(anomalies.map((a) => a.timeWindow.start)).toEqual([5 * MINUTE, 9 * MINUTE]);
    });

    it('should not merge across methods or types', () => {
      const anomalies = new AnomalyScorer().score([
        pointCandidate(5, 0.5),
        pointCandidate(5, 0.5, { method: DetectionMethod.PERCENTILE }),
        pointCandidate(6, 0.5, { type: AnomalyType.DROP }),
      ]);

      expect(anomalies).toHaveLength(3);
    });

    it('should merge overlapping windows regardless of sequence', () => {
      const anomalies = new AnomalyScorer().score([
        pointCandidate(1, 0.3, { window: { start: 0, end: 100 } }),
        pointCandidate(7, 0.8, { window: { start: 50, end: 200 } }),
      ]);

      expect(anomalies).toHaveLength(1);
      expect(anomalies[0].timeWindow).toEqual({ start: 0, end: 200 });
      expect(anomalies[0].severity).toBe(AnomalySeverity.HIGH);
    });

    it('should not merge buckets whose indices are far apart', () => {
      // Buckets supplied out of chronological order: index 5 holds the earlier window
      const anomalies = new AnomalyScorer().score([
        bucketCandidate(5, { window: { start: DAY, end: 2 * DAY - 1 } }),
        bucketCandidate(0, { window: { start: 3 * DAY, end: 4 * DAY - 1 } }),
      ]);

      expect(anomalies.map((a) => a.timeWindow.start)).toEqual([DAY, 3 * DAY]);
    });

    it('should merge drift in consecutive buckets', () => {
      const anomalies = new AnomalyScorer().score([
        bucketCandidate(2, { keywords: ['audit'] }),
        bucketCandidate(3, { score: 0.9, keywords: ['grant', 'audit'] }),
      ]);

      expect(anomalies).toHaveLength(1);
      const [drift] = anomalies;
      expect(drift.timeWindow).toEqual({ start: 2 * DAY, end: 4 * DAY - 1 });
      expect(drift.affectedRegion).toEqual({
        source: 'minutes',
        kind: 'text',
        keywords: ['grant', 'audit'],
        categories: [],
      });
      expect(drift.metadata.details.buckets).toEqual([2, 3]);
    });
  });

  describe('idempotence', () => {
    it('should produce identical anomalies when run twice', () => {
      const candidates = [pointCandidate(3, 0.5), pointCandidate(4, 0.9), bucketCandidate(1)];
      const scorer = new AnomalyScorer();

      const first = scorer.score(candidates);
      const second = scorer.score(candidates);

      expect(second).toEqual(first);
      expect(first.map((a) => a.id)).toEqual(second.map((a) => a.id));
      for (const anomaly of first) {
        expect(anomaly.id).toMatch(UUID_PATTERN);
      }
    });

    it('should derive different ids for different windows', () => {
      const [a] = new AnomalyScorer().score([pointCandidate(3, 0.5)]);
      const [b] = new AnomalyScorer().score([pointCandidate(8, 0.5)]);

      expect(a.id).not.toBe(b.id);
    });
  });

  describe('magnitude', () => {
    it('should report an injected spike as a 900% change', () => {
      const series = createTimeSeries(
        'load',
        Array.from({ length: 20 }, (_, i) => ({ timestamp: i * MINUTE, value: i === 10 ? 1000 : 100 }))
      );
      const { candidates } = new TimeSeriesDetector(resolveParameters()).runMethod(series, DetectionMethod.Z_SCORE);

      const [spike] = new AnomalyScorer({ series: new Map([['load', series]]) }).score(candidates);

      expect(spike.type).toBe(AnomalyType.SPIKE);
      expect(spike.severity).toBe(AnomalySeverity.HIGH);
      expect(spike.dataSource).toBe('load');
      expect(spike.metadata.baseline).toBe(100);
      expect(spike.metadata.observed).toBe(1000);
      expect(spike.metadata.magnitude).toBeCloseTo(900, 10);
      expect(spike.affectedRegion).toEqual({ source: 'load', kind: 'time-series', keywords: [], categories: [] });
    });

    it('should use points after the window when nothing precedes it', () => {
      const series = createTimeSeries('early', [
        { timestamp: 0, value: 50 },
        { timestamp: 1, value: 10 },
        { timestamp: 2, value: 10 },
      ]);
      const candidate = pointCandidate(0, 0.8, { source: 'early', value: 50, window: { start: 0, end: 0 } });

      const [anomaly] = new AnomalyScorer({ series: new Map([['early', series]]) }).score([candidate]);

      expect(anomaly.metadata.baseline).toBe(10);
      expect(anomaly.metadata.magnitude).toBeCloseTo(400, 10);
    });

    it('should take the merged value furthest from the baseline', () => {
      const series = createTimeSeries(
        'admissions',
        [10, 10, 10, 40, 90].map((value, i) => ({ timestamp: i * MINUTE, value }))
      );
      const candidates = [
        pointCandidate(3, 0.9, { value: 40 }),
        pointCandidate(4, 0.5, { value: 90 }),
      ];

      const [anomaly] = new AnomalyScorer({ series: new Map([['admissions', series]]) }).score(candidates);

      expect(anomaly.metadata.observed).toBe(90);
      expect(anomaly.metadata.magnitude).toBeCloseTo(800, 10);
    });

    it('should leave magnitude null without a baseline', () => {
      const [anomaly] = new AnomalyScorer().score([pointCandidate(2, 0.5)]);

      expect(anomaly.metadata.baseline).toBeNull();
      expect(anomaly.metadata.magnitude).toBeNull();
    });

    it('should report keyword drift as relative change', () => {
      const [drift] = new AnomalyScorer().score([bucketCandidate(1)]);

      expect(drift.metadata.magnitude).toBeCloseTo(100, 10);
    });

    it('should report proportion shifts in percentage points', () => {
      const [shift] = new AnomalyScorer().score([
        bucketCandidate(1, {
          method: DetectionMethod.CATEGORY,
          type: AnomalyType.CATEGORY_SHIFT,
          magnitudeKind: 'percentage-point',
          observed: 0.25,
          baseline: 0.75,
          keywords: [],
          categories: ['finance', 'ops'],
        }),
      ]);

      expect(shift.metadata.magnitude).toBeCloseTo(-50, 10);
      expect(shift.affectedRegion.categories).toEqual(['finance', 'ops']);
    });

    it('should leave magnitude null for a term new to the bucket', () => {
      const [drift] = new AnomalyScorer().score([bucketCandidate(1, { observed: 0.2, baseline: 0 })]);

      expect(drift.metadata.magnitude).toBeNull();
    });
  });
});
