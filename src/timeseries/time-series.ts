/**
 * TimeSeries construction and statistics
 *
 * Series are immutable values: any change to the points goes through
 * withPoints(), which recomputes the statistics.
 */

import { mean, median, quantile, standardDeviation, linearRegression } from 'simple-statistics';
import {
  Anomaly,
  PercentileKey,
  TimeSeries,
  TimeSeriesPoint,
  TimeSeriesStatistics,
  TrendDirection,
} from '../anomaly/anomaly-types.js';
import { InvalidSeriesError } from '../anomaly/errors.js';
import { inferPeriod } from './seasonal-decomposer.js';

export interface RawPoint {
  timestamp: number;
  value: number;
}

const PERCENTILE_KEYS: readonly PercentileKey[] = [5, 25, 75, 95];

// Fitted change over the whole series, relative to its scale, below which the trend is "stable"
const TREND_TOLERANCE = 0.1;

function classifyTrend(values: number[], mu: number, sigma: number): TrendDirection {
  if (values.length < 2) return 'stable';

  const scale = Math.max(Math.abs(mu), sigma);
  if (scale === 0) return 'stable';

  const { m } = linearRegression(values.map((v, i) => [i, v]));
  const fittedChange = m * (values.length - 1);

  if (Math.abs(fittedChange) < TREND_TOLERANCE * scale) return 'stable';
  return fittedChange > 0 ? 'increasing' : 'decreasing';
}

export function computeStatistics(points: readonly TimeSeriesPoint[]): TimeSeriesStatistics {
  const values = points.map((p) => p.value);

  if (values.length === 0) {
    return {
      count: 0,
      mean: 0,
      standardDeviation: 0,
      median: 0,
      percentiles: { 5: 0, 25: 0, 75: 0, 95: 0 },
      trend: 'stable',
      seasonality: { detected: false, period: null, strength: 0 },
    };
  }

  const mu = mean(values);
  const sigma = standardDeviation(values);

  const percentiles: Record<PercentileKey, number> = { 5: 0, 25: 0, 75: 0, 95: 0 };
  for (const key of PERCENTILE_KEYS) {
    percentiles[key] = quantile(values, key / 100);
  }

  const period = inferPeriod(values);

  return {
    count: values.length,
    mean: mu,
    standardDeviation: sigma,
    median: median(values),
    percentiles,
    trend: classifyTrend(values, mu, sigma),
    seasonality: period
      ? { detected: true, period: period.period, strength: period.strength }
      : { detected: false, period: null, strength: 0 },
  };
}

/**
 * Build a series from cleaned points. Detector-owned fields are reset.
 * @throws InvalidSeriesError on non-finite values or non-increasing timestamps
 */
export function createTimeSeries(column: string, raw: readonly RawPoint[]): TimeSeries {
  const points: TimeSeriesPoint[] = [];

  raw.forEach((point, index) => {
    if (!Number.isFinite(point.timestamp) || !Number.isFinite(point.value)) {
      throw new InvalidSeriesError(`Point ${index} of column "${column}" is not finite`, column);
    }
    if (index > 0 && point.timestamp <= raw[index - 1].timestamp) {
      throw new InvalidSeriesError(
        `Timestamps of column "${column}" must be strictly increasing (index ${index})`,
        column
      );
    }
    points.push({ timestamp: point.timestamp, value: point.value, isAnomaly: false });
  });

  return Object.freeze({ column, points: Object.freeze(points), statistics: computeStatistics(points) });
}

export function withPoints(series: TimeSeries, raw: readonly RawPoint[]): TimeSeries {
  return createTimeSeries(series.column, raw);
}

/**
 * Copy of `series` with isAnomaly/anomalyScore set from the anomalies resolved for its column.
 */
export function markAnomalies(series: TimeSeries, anomalies: readonly Anomaly[]): TimeSeries {
  const own = anomalies.filter((a) => a.dataSource === series.column && a.affectedRegion.kind === 'time-series');

  const points = series.points.map((point): TimeSeriesPoint => {
    let score: number | undefined;
    for (const anomaly of own) {
      const { start, end } = anomaly.timeWindow;
      if (point.timestamp >= start && point.timestamp <= end) {
        score = score === undefined ? anomaly.score : Math.max(score, anomaly.score);
      }
    }
    return score === undefined
      ? { timestamp: point.timestamp, value: point.value, isAnomaly: false }
      : { timestamp: point.timestamp, value: point.value, isAnomaly: true, anomalyScore: score };
  });

  // Values are unchanged, so the statistics still hold
  return Object.freeze({ column: series.column, points: Object.freeze(points), statistics: series.statistics });
}
