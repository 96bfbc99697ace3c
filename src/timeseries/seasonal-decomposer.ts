/**
 * Seasonal Decomposition
 *
 * Y = trend + seasonal + residual, with the trend a centered moving average
 * over one period and the seasonal term the mean detrended value at each phase.
 */

import { mean, sum } from 'simple-statistics';
import { InsufficientDataError, DegenerateInputError } from '../anomaly/errors.js';

export interface Decomposition {
  period: number;
  trend: number[];
  seasonal: number[];
  residual: number[];
}

// Autocorrelation required at the peak lag before a period is accepted
export const MIN_SEASONAL_AUTOCORRELATION = 0.3;

/**
 * Sample autocorrelation at `lag`. Null for a constant series.
 */
export function autocorrelation(values: readonly number[], lag: number): number | null {
  const n = values.length;
  if (n === 0 || lag <= 0 || lag >= n) return null;

  const mu = mean([...values]);
  let denominator = 0;
  for (const v of values) {
    denominator += (v - mu) * (v - mu);
  }
  if (denominator === 0) return null;

  let numerator = 0;
  for (let i = 0; i < n - lag; i++) {
    numerator += (values[i] - mu) * (values[i + lag] - mu);
  }
  return numerator / denominator;
}

/**
 * Lag in [2, n/2] with the highest autocorrelation, or null when no lag
 * reaches MIN_SEASONAL_AUTOCORRELATION.
 */
export function inferPeriod(values: readonly number[]): { period: number; strength: number } | null {
  const maxLag = Math.floor(values.length / 2);
  let best: { period: number; strength: number } | null = null;

  for (let lag = 2; lag <= maxLag; lag++) {
    const r = autocorrelation(values, lag);
    if (r === null) return null;
    if (r >= MIN_SEASONAL_AUTOCORRELATION && (best === null || r > best.strength)) {
      best = { period: lag, strength: r };
    }
  }

  return best;
}

/**
 * Centered moving average spanning one period. An even period uses the
 * 2 x p average: the two end points carry half weight. Near the edges the
 * window is truncated and the weights renormalized.
 */
function centeredMovingAverage(values: readonly number[], period: number): number[] {
  const n = values.length;
  const half = Math.floor(period / 2);
  const endWeight = period % 2 === 0 ? 0.5 : 1;
  const result = new Array<number>(n);

  for (let i = 0; i < n; i++) {
    let weighted = 0;
    let totalWeight = 0;
    for (let k = -half; k <= half; k++) {
      const j = i + k;
      if (j < 0 || j >= n) continue;
      const weight = Math.abs(k) === half ? endWeight : 1;
      weighted += weight * values[j];
      totalWeight += weight;
    }
    result[i] = weighted / totalWeight;
  }
  return result;
}

export class SeasonalDecomposer {
  /**
   * @param period seasonal period; inferred from the autocorrelation peak when omitted
   * @throws InsufficientDataError when fewer than 2 × period values exist
   * @throws DegenerateInputError when no period is supplied and none can be inferred
   */
  decompose(values: readonly number[], period?: number): Decomposition {
    let p = period;
    if (p === undefined) {
      const inferred = inferPeriod(values);
      if (inferred === null) {
        throw new DegenerateInputError('No seasonal period found in series', 'no-seasonality');
      }
      p = inferred.period;
    }

    if (!Number.isInteger(p) || p < 2) {
      throw new DegenerateInputError(`Seasonal period must be an integer >= 2, got ${p}`, 'invalid-period');
    }

    const n = values.length;
    if (n < 2 * p) {
      throw new InsufficientDataError(`Decomposition with period ${p} needs at least ${2 * p} points`, 2 * p, n);
    }

    const trend = centeredMovingAverage(values, p);

    const phaseSums = new Array<number>(p).fill(0);
    const phaseCounts = new Array<number>(p).fill(0);
    for (let i = 0; i < n; i++) {
      phaseSums[i % p] += values[i] - trend[i];
      phaseCounts[i % p]++;
    }
    const phaseMeans = phaseSums.map((s, phase) => s / phaseCounts[phase]);

    // Center so the seasonal term carries no level
    const offset = sum(phaseMeans) / p;
    const seasonalPattern = phaseMeans.map((m) => m - offset);

    const seasonal = new Array<number>(n);
    const residual = new Array<number>(n);
    for (let i = 0; i < n; i++) {
      seasonal[i] = seasonalPattern[i % p];
      residual[i] = values[i] - trend[i] - seasonal[i];
    }

    return { period: p, trend, seasonal, residual };
  }
}
