/**
 * Time-Series Detector Tests
 */

import { describe, it, expect } from 'vitest';
import { TimeSeriesDetector, isNegligibleSpread, zScoreToScore } from '../src/timeseries/time-series-detector.js';
import { createTimeSeries } from '../src/timeseries/time-series.js';
import { resolveParameters } from '../src/config/detection-parameters.js';
import { AnomalyType, DetectionMethod } from '../src/anomaly/anomaly-types.js';

const MINUTE = 60_000;

function series(column: string, values: number[]) {
  return createTimeSeries(
    column,
    values.map((value, i) => ({ timestamp: i * MINUTE, value }))
  );
}

function alternating(count: number): number[] {
  return Array.from({ length: count }, (_, i) => (i % 2 === 0 ? 10 : 12));
}

describe('TimeSeriesDetector', () => {
  describe('z-score', () => {
    it('should flag an injected spike in a flat series', () => {
      const values = Array.from({ length: 20 }, (_, i) => (i === 10 ? 1000 : 100));
      const detector = new TimeSeriesDetector(resolveParameters());

      const { candidates, skipped } = detector.runMethod(series('load', values), DetectionMethod.Z_SCORE);

      expect(skipped).toEqual([]);
      expect(candidates).toHaveLength(1);
      const [spike] = candidates;
      expect(spike.type).toBe(AnomalyType.SPIKE);
      expect(spike.sequence).toBe(10);
      expect(spike.window).toEqual({ start: 10 * MINUTE, end: 10 * MINUTE });
      // sigma = 45 * sqrt(19), so z = sqrt(19)
      expect(spike.score).toBeCloseTo(Math.sqrt(19) / 6, 10);
    });

    it('should not flag a point exactly on the threshold', () => {
      // mean 1, standard deviation 3: the last point sits at exactly 3 sigma
      const values = [0, 0, 0, 0, 0, 0, 0, 0, 0, 10];

      const atDefault = new TimeSeriesDetector(resolveParameters()).runMethod(
        series('edge', values),
        DetectionMethod.Z_SCORE
      );
      const lowered = new TimeSeriesDetector(resolveParameters({ zScoreThreshold: 2.9 })).runMethod(
        series('edge', values),
        DetectionMethod.Z_SCORE
      );

      expect(atDefault.candidates).toEqual([]);
      expect(lowered.candidates.map((c) => c.sequence)).toEqual([9]);
    });

    it('should classify values below the mean as drops', () => {
      const values = Array.from({ length: 20 }, (_, i) => (i === 4 ? -800 : 100));

      const { candidates } = new TimeSeriesDetector(resolveParameters()).runMethod(
        series('drop', values),
        DetectionMethod.Z_SCORE
      );

      expect(candidates.map((c) => [c.sequence, c.type])).toEqual([[4, AnomalyType.DROP]]);
    });
  });

  describe('moving average', () => {
    it('should compare each point with the preceding window', () => {
      const detector = new TimeSeriesDetector(resolveParameters({ movingAverageWindow: 3 }));

      const { candidates } = detector.runMethod(
        series('ma', [10, 12, 10, 12, 10, 12, 50]),
        DetectionMethod.MOVING_AVERAGE
      );

      expect(candidates).toHaveLength(1);
      const [flag] = candidates;
      expect(flag.sequence).toBe(6);
      expect(flag.type).toBe(AnomalyType.SPIKE);
      expect(flag.score).toBe(1);
      if (flag.kind === 'time-series') {
        expect(flag.expected).toBeCloseTo(34 / 3, 10);
      }
    });

    it('should skip a series no longer than the window', () => {
      const { candidates, skipped } = new TimeSeriesDetector(resolveParameters()).runMethod(
        series('short', [1, 2, 3, 4, 5]),
        DetectionMethod.MOVING_AVERAGE
      );

      expect(candidates).toEqual([]);
      expect(skipped).toHaveLength(1);
      expect(skipped[0].method).toBe(DetectionMethod.MOVING_AVERAGE);
      expect(skipped[0].reason).toBe('insufficient-data');
    });
  });

  describe('percentile', () => {
    it('should flag values strictly outside the percentile band', () => {
      const values = Array.from({ length: 20 }, (_, i) => i + 1);
      const detector = new TimeSeriesDetector(resolveParameters({ percentileThresholds: [10, 90] }));

      const { candidates } = detector.runMethod(series('pct', values), DetectionMethod.PERCENTILE);

      // band is [2.5, 18.5], span 16
      expect(candidates.map((c) => [c.sequence, c.type])).toEqual([
        [0, AnomalyType.DROP],
        [1, AnomalyType.DROP],
        [18, AnomalyType.SPIKE],
        [19, AnomalyType.SPIKE],
      ]);
      expect(candidates[0].score).toBeCloseTo(1.5 / 16, 10);
      expect(candidates[3].score).toBeCloseTo(1.5 / 16, 10);
    });
  });

  describe('seasonal residual', () => {
    it('should flag a spike against the seasonal pattern', () => {
      const values = Array.from({ length: 6 }, () => [0, 10, 0, -10]).flat();
      values[13] += 60;
      const detector = new TimeSeriesDetector(resolveParameters(), { seasonalPeriod: 4 });

      const { candidates, skipped } = detector.runMethod(series('weekly', values), DetectionMethod.SEASONAL_RESIDUAL);

      expect(skipped).toEqual([]);
      expect(candidates.map((c) => [c.sequence, c.type])).toEqual([[13, AnomalyType.SPIKE]]);
    });

    it('should fall back to raw values without a period', () => {
      const values = Array.from({ length: 20 }, (_, i) => (i === 10 ? 1000 : 100));

      const { candidates, skipped } = new TimeSeriesDetector(resolveParameters()).runMethod(
        series('load', values),
        DetectionMethod.SEASONAL_RESIDUAL
      );

      expect(skipped.map((s) => s.reason)).toEqual(['fallback']);
      expect(candidates.map((c) => c.sequence)).toEqual([10]);
      const [flag] = candidates;
      if (flag.kind === 'time-series') {
        expect(flag.expected).toBeCloseTo(145, 10);
      }
    });
  });

  describe('degenerate input', () => {
    it('should produce nothing for an all-zero series', () => {
      const zeros = new Array<number>(20).fill(0);

      const { candidates, skipped } = new TimeSeriesDetector(resolveParameters()).detect(series('zeros', zeros));

      expect(candidates).toEqual([]);
      expect(skipped.filter((s) => s.reason === 'degenerate-input').map((s) => s.method)).toEqual([
        DetectionMethod.Z_SCORE,
        DetectionMethod.MOVING_AVERAGE,
        DetectionMethod.SEASONAL_RESIDUAL,
      ]);
    });

    it('should treat floating-point noise as zero spread', () => {
      expect(isNegligibleSpread(1e-12, 100)).toBe(true);
      expect(isNegligibleSpread(0.01, 100)).toBe(false);
    });
  });

  describe('minimum duration', () => {
    it('should discard an isolated flagged point', () => {
      const values = [...alternating(30), 100];
      const detector = new TimeSeriesDetector(resolveParameters({ minimumAnomalyDuration: 2 }));

      const { candidates } = detector.runMethod(series('jitter', values), DetectionMethod.Z_SCORE);

      expect(candidates).toEqual([]);
    });

    it('should keep two consecutive flagged points', () => {
      const values = [...alternating(30), 100, 100];
      const detector = new TimeSeriesDetector(resolveParameters({ minimumAnomalyDuration: 2 }));

      const { candidates } = detector.runMethod(series('sustained', values), DetectionMethod.Z_SCORE);

      expect(candidates.map((c) => c.sequence)).toEqual([30, 31]);
    });

    it('should flag the isolated point when no duration is required', () => {
      const values = [...alternating(30), 100];

      const { candidates } = new TimeSeriesDetector(resolveParameters()).runMethod(
        series('jitter', values),
        DetectionMethod.Z_SCORE
      );

      expect(candidates.map((c) => c.sequence)).toEqual([30]);
    });
  });

  it('should cap scores at 1', () => {
    expect(zScoreToScore(3.6, 3)).toBeCloseTo(0.6, 10);
    expect(zScoreToScore(-9, 3)).toBe(1);
  });
});
