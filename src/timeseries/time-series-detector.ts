/**
 * Time-Series Anomaly Detector
 *
 * Runs z-score, moving-average deviation, percentile and seasonal-residual checks
 * over one numeric column. Each sub-method emits candidates with a score in [0, 1];
 * severity and merging belong to the scorer.
 *
 * All thresholds are exclusive: a point exactly on a threshold is not flagged.
 */

import { mean, quantile, standardDeviation } from 'simple-statistics';
import {
  AnomalyType,
  DetectionMethod,
  MethodOutcome,
  MethodSkip,
  TIME_SERIES_METHODS,
  TimeSeries,
  TimeSeriesCandidate,
} from '../anomaly/anomaly-types.js';
import { DegenerateInputError, InsufficientDataError } from '../anomaly/errors.js';
import { AnomalyDetectionParameters } from '../config/detection-parameters.js';
import { Logger } from '../utils/logger.js';
import { SeasonalDecomposer } from './seasonal-decomposer.js';

interface Flag {
  index: number;
  type: AnomalyType.SPIKE | AnomalyType.DROP;
  score: number;
  expected: number;
  deviation: number;
}

export interface TimeSeriesDetectorOptions {
  // Overrides the period inferred from the series statistics
  seasonalPeriod?: number;
}

/**
 * Spread this small relative to the level is floating-point noise, not variance.
 */
export function isNegligibleSpread(sigma: number, center: number): boolean {
  return sigma <= 1e-9 * Math.max(1, Math.abs(center));
}

export function zScoreToScore(z: number, threshold: number): number {
  return Math.min(1, Math.abs(z) / (2 * threshold));
}

export class TimeSeriesDetector {
  private logger: Logger;
  private decomposer = new SeasonalDecomposer();

  constructor(
    private params: AnomalyDetectionParameters,
    private options: TimeSeriesDetectorOptions = {}
  ) {
    this.logger = new Logger();
  }

  /**
   * Run every requested sub-method. Engine callers go through runMethod()
   * so they can check for cancellation in between.
   */
  detect(series: TimeSeries, methods: readonly DetectionMethod[] = TIME_SERIES_METHODS): MethodOutcome {
    const outcome: MethodOutcome = { candidates: [], skipped: [] };
    for (const method of methods) {
      const result = this.runMethod(series, method);
      outcome.candidates.push(...result.candidates);
      outcome.skipped.push(...result.skipped);
    }
    return outcome;
  }

  runMethod(series: TimeSeries, method: DetectionMethod): MethodOutcome {
    const skipped: MethodSkip[] = [];

    try {
      let flags: Flag[];
      switch (method) {
        case DetectionMethod.Z_SCORE:
          flags = this.zScoreFlags(series);
          break;
        case DetectionMethod.MOVING_AVERAGE:
          flags = this.movingAverageFlags(series);
          break;
        case DetectionMethod.PERCENTILE:
          flags = this.percentileFlags(series);
          break;
        case DetectionMethod.SEASONAL_RESIDUAL:
          flags = this.residualFlags(series, skipped);
          break;
        default:
          throw new Error(`Method ${method} does not apply to time series`);
      }

      const kept = this.applyMinimumDuration(flags);
      return { candidates: kept.map((flag) => this.toCandidate(series, method, flag)), skipped };
    } catch (error) {
      if (error instanceof InsufficientDataError || error instanceof DegenerateInputError) {
        this.logger.debug('Sub-method skipped', {
          column: series.column,
          method,
          code: error.code,
          message: error.message,
        });
        skipped.push({
          method,
          reason: error instanceof InsufficientDataError ? 'insufficient-data' : 'degenerate-input',
          message: error.message,
        });
        return { candidates: [], skipped };
      }
      throw error;
    }
  }

  private zScoreFlags(series: TimeSeries): Flag[] {
    const { mean: mu, standardDeviation: sigma, count } = series.statistics;
    if (count === 0) {
      throw new InsufficientDataError('Z-score needs at least one point', 1, 0);
    }
    if (isNegligibleSpread(sigma, mu)) {
      throw new DegenerateInputError(`Column "${series.column}" has zero variance`, 'zero-variance');
    }

    return this.thresholdFlags(
      series.points.map((p) => p.value),
      () => mu,
      sigma
    );
  }

  private movingAverageFlags(series: TimeSeries): Flag[] {
    const window = this.params.movingAverageWindow;
    const values = series.points.map((p) => p.value);
    if (values.length <= window) {
      throw new InsufficientDataError(
        `Moving average needs more than ${window} points`,
        window + 1,
        values.length
      );
    }

    const threshold = this.params.zScoreThreshold;
    const flags: Flag[] = [];
    let comparableWindows = 0;

    for (let i = window; i < values.length; i++) {
      const preceding = values.slice(i - window, i);
      const rollingMean = mean(preceding);
      const rollingStd = standardDeviation(preceding);
      if (isNegligibleSpread(rollingStd, rollingMean)) continue;

      comparableWindows++;
      const z = (values[i] - rollingMean) / rollingStd;
      if (Math.abs(z) > threshold) {
        flags.push({
          index: i,
          type: z > 0 ? AnomalyType.SPIKE : AnomalyType.DROP,
          score: zScoreToScore(z, threshold),
          expected: rollingMean,
          deviation: z,
        });
      }
    }

    if (comparableWindows === 0) {
      throw new DegenerateInputError(`Every rolling window of "${series.column}" is constant`, 'zero-variance');
    }
    return flags;
  }

  private percentileFlags(series: TimeSeries): Flag[] {
    const values = series.points.map((p) => p.value);
    if (values.length < 2) {
      throw new InsufficientDataError('Percentile thresholds need at least two points', 2, values.length);
    }

    const [low, high] = this.params.percentileThresholds;
    const lower = quantile(values, low / 100);
    const upper = quantile(values, high / 100);
    const span = upper - lower;

    const flags: Flag[] = [];
    values.forEach((value, index) => {
      if (value > upper) {
        const distance = value - upper;
        flags.push({
          index,
          type: AnomalyType.SPIKE,
          score: span > 0 ? Math.min(1, distance / span) : 1,
          expected: upper,
          deviation: distance,
        });
      } else if (value < lower) {
        const distance = lower - value;
        flags.push({
          index,
          type: AnomalyType.DROP,
          score: span > 0 ? Math.min(1, distance / span) : 1,
          expected: lower,
          deviation: -distance,
        });
      }
    });
    return flags;
  }

  private residualFlags(series: TimeSeries, notes: MethodSkip[]): Flag[] {
    const values = series.points.map((p) => p.value);
    if (values.length === 0) {
      throw new InsufficientDataError('Residual check needs at least one point', 1, 0);
    }

    let residual: number[];
    try {
      const period = this.options.seasonalPeriod ?? series.statistics.seasonality.period ?? undefined;
      residual = this.decomposer.decompose(values, period).residual;
    } catch (error) {
      if (!(error instanceof InsufficientDataError || error instanceof DegenerateInputError)) {
        throw error;
      }
      // No decomposition: raw values stand in for the residuals
      notes.push({
        method: DetectionMethod.SEASONAL_RESIDUAL,
        reason: 'fallback',
        message: `Decomposition unavailable (${error.message}); using raw values`,
      });
      residual = values;
    }

    // trend + seasonal; zero in the fallback, where the residual mean is the expectation
    const fitted = values.map((v, i) => v - residual[i]);

    const mu = mean(residual);
    const sigma = standardDeviation(residual);
    const level = series.statistics.mean;
    if (isNegligibleSpread(sigma, level)) {
      throw new DegenerateInputError(`Residuals of "${series.column}" are constant`, 'zero-variance');
    }

    return this.thresholdFlags(residual, (i) => fitted[i] + mu, sigma, mu);
  }

  private thresholdFlags(
    values: readonly number[],
    expectedAt: (index: number) => number,
    sigma: number,
    center?: number
  ): Flag[] {
    const threshold = this.params.zScoreThreshold;
    const flags: Flag[] = [];

    values.forEach((value, index) => {
      const reference = center ?? expectedAt(index);
      const z = (value - reference) / sigma;
      if (Math.abs(z) > threshold) {
        flags.push({
          index,
          type: z > 0 ? AnomalyType.SPIKE : AnomalyType.DROP,
          score: zScoreToScore(z, threshold),
          expected: expectedAt(index),
          deviation: z,
        });
      }
    });
    return flags;
  }

  /**
   * Drop contiguous same-direction runs shorter than minimumAnomalyDuration points.
   */
  private applyMinimumDuration(flags: Flag[]): Flag[] {
    const minimum = this.params.minimumAnomalyDuration;
    if (minimum <= 1) return flags;

    const kept: Flag[] = [];
    let run: Flag[] = [];

    const closeRun = () => {
      if (run.length >= minimum) kept.push(...run);
      run = [];
    };

    for (const flag of flags) {
      const last = run[run.length - 1];
      if (last && (flag.index !== last.index + 1 || flag.type !== last.type)) {
        closeRun();
      }
      run.push(flag);
    }
    closeRun();

    return kept;
  }

  private toCandidate(series: TimeSeries, method: DetectionMethod, flag: Flag): TimeSeriesCandidate {
    const point = series.points[flag.index];
    return {
      kind: 'time-series',
      source: series.column,
      method,
      type: flag.type,
      sequence: flag.index,
      window: { start: point.timestamp, end: point.timestamp },
      score: flag.score,
      value: point.value,
      expected: flag.expected,
      deviation: flag.deviation,
    };
  }
}
