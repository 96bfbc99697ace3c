/**
 * Time Series & Seasonal Decomposition Tests
 */

import { describe, it, expect } from 'vitest';
import { createTimeSeries, markAnomalies, withPoints } from '../src/timeseries/time-series.js';
import { SeasonalDecomposer, autocorrelation, inferPeriod } from '../src/timeseries/seasonal-decomposer.js';
import {
  Anomaly,
  AnomalySeverity,
  AnomalyType,
  DetectionMethod,
} from '../src/anomaly/anomaly-types.js';
import { DegenerateInputError, InsufficientDataError, InvalidSeriesError } from '../src/anomaly/errors.js';

const MINUTE = 60_000;

function points(values: number[]) {
  return values.map((value, i) => ({ timestamp: i * MINUTE, value }));
}

function repeat(pattern: number[], times: number): number[] {
  return Array.from({ length: times }, () => pattern).flat();
}

describe('TimeSeries', () => {
  describe('createTimeSeries', () => {
    it('should compute summary statistics', () => {
      const series = createTimeSeries('enrollment', points([1, 2, 3, 4]));
      const stats = series.statistics;

      expect(stats.count).toBe(4);
      expect(stats.mean).toBe(2.5);
      expect(stats.standardDeviation).toBeCloseTo(Math.sqrt(1.25), 10);
      expect(stats.median).toBe(2.5);
      expect(stats.trend).toBe('increasing');
    });

    it('should call a flat series stable', () => {
      const series = createTimeSeries('flat', points([5, 5, 5, 5, 5]));

      expect(series.statistics.standardDeviation).toBe(0);
      expect(series.statistics.trend).toBe('stable');
      expect(series.statistics.seasonality).toEqual({ detected: false, period: null, strength: 0 });
    });

    it('should call a falling series decreasing', () => {
      expect(createTimeSeries('falling', points([9, 7, 5, 3, 1])).statistics.trend).toBe('decreasing');
    });

    it('should reset detector-owned fields', () => {
      const raw = [{ timestamp: 0, value: 1, isAnomaly: true, anomalyScore: 0.9 }];
      const series = createTimeSeries('x', raw);

      expect(series.points[0]).toEqual({ timestamp: 0, value: 1, isAnomaly: false });
    });

    it('should reject non-increasing timestamps', () => {
      const raw = [
        { timestamp: 2, value: 1 },
        { timestamp: 2, value: 3 },
      ];

      expect(() => createTimeSeries('dup', raw)).toThrow(InvalidSeriesError);
    });

    it('should reject non-finite values', () => {
      expect(() => createTimeSeries('nan', [{ timestamp: 0, value: Number.NaN }])).toThrow(InvalidSeriesError);
    });

    it('should handle an empty series', () => {
      const series = createTimeSeries('empty', []);

      expect(series.statistics.count).toBe(0);
      expect(series.statistics.mean).toBe(0);
    });

    it('should recompute statistics on withPoints', () => {
      const series = createTimeSeries('x', points([1, 1, 1]));
      const updated = withPoints(series, points([2, 4]));

      expect(updated.column).toBe('x');
      expect(updated.statistics.mean).toBe(3);
      expect(series.statistics.mean).toBe(1);
    });
  });

  describe('markAnomalies', () => {
    it('should flag points inside an anomaly window of the same column', () => {
      const series = createTimeSeries('visits', points([1, 2, 3, 4]));
      const anomaly: Anomaly = {
        id: 'a-1',
        type: AnomalyType.SPIKE,
        severity: AnomalySeverity.HIGH,
        dataSource: 'visits',
        timeWindow: { start: MINUTE, end: 2 * MINUTE },
        affectedRegion: { source: 'visits', kind: 'time-series', keywords: [], categories: [] },
        score: 0.8,
        metadata: {
          method: DetectionMethod.Z_SCORE,
          candidateCount: 2,
          magnitude: null,
          baseline: null,
          observed: 3,
          details: {},
        },
      };
      const other: Anomaly = { ...anomaly, id: 'a-2', dataSource: 'other', timeWindow: { start: 0, end: 0 } };

      const marked = markAnomalies(series, [anomaly, other]);

      expect(marked.points.map((p) => p.isAnomaly)).toEqual([false, true, true, false]);
      expect(marked.points[1].anomalyScore).toBe(0.8);
      expect(marked.points[0].anomalyScore).toBeUndefined();
      expect(series.points[1].isAnomaly).toBe(false);
    });
  });
});

describe('Seasonal decomposition', () => {
  const seasonal = repeat([0, 10, 0, -10], 5);

  it('should return null autocorrelation for a constant series', () => {
    expect(autocorrelation([3, 3, 3, 3], 1)).toBeNull();
  });

  it('should measure autocorrelation at the period', () => {
    expect(autocorrelation(seasonal, 4)).toBeCloseTo(0.8, 10);
    expect(autocorrelation(seasonal, 1)).toBe(0);
  });

  it('should infer the period from the autocorrelation peak', () => {
    expect(inferPeriod(seasonal)).toEqual({ period: 4, strength: 0.8 });
  });

  it('should find no period in a constant series', () => {
    expect(inferPeriod([1, 1, 1, 1, 1, 1])).toBeNull();
  });

  it('should split the series into trend, seasonal and residual', () => {
    const result = new SeasonalDecomposer().decompose(seasonal, 4);

    expect(result.period).toBe(4);
    expect(result.trend).toHaveLength(20);
    seasonal.forEach((value, i) => {
      expect(result.trend[i] + result.seasonal[i] + result.residual[i]).toBeCloseTo(value, 10);
    });

    const oneCycle = result.seasonal.slice(0, 4).reduce((a, b) => a + b, 0);
    expect(oneCycle).toBeCloseTo(0, 10);
  });

  it('should remove an even-period cycle from the trend', () => {
    const { trend } = new SeasonalDecomposer().decompose(seasonal, 4);

    // Interior points see a full 2 x 4 window; the edges are truncated
    expect(trend.slice(2, 18)).toEqual(new Array<number>(16).fill(0));
    expect(trend[0]).toBeCloseTo(4, 10);
    expect(trend[19]).toBeCloseTo(-2, 10);
  });

  it('should infer the period when none is given', () => {
    expect(new SeasonalDecomposer().decompose(seasonal).period).toBe(4);
  });

  it('should need two full periods', () => {
    expect(() => new SeasonalDecomposer().decompose([1, 2, 3], 2)).toThrow(InsufficientDataError);
  });

  it('should reject a series without seasonality', () => {
    expect(() => new SeasonalDecomposer().decompose([4, 4, 4, 4, 4, 4])).toThrow(DegenerateInputError);
  });

  it('should reject a period below 2', () => {
    expect(() => new SeasonalDecomposer().decompose(seasonal, 1)).toThrow(DegenerateInputError);
  });
});
