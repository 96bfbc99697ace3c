/**
 * Detection Parameters
 *
 * The per-run configuration surface. Resolved and validated once, before any
 * detector starts, then frozen for the duration of the run.
 */

import { InvalidParameterError, ParameterValidationError } from '../anomaly/errors.js';

export interface AnomalyDetectionParameters {
  readonly zScoreThreshold: number;
  readonly movingAverageWindow: number;
  readonly percentileThresholds: readonly [number, number];
  readonly textSimilarityThreshold: number;
  readonly minimumAnomalyDuration: number;
}

export type TextBaseline =
  | { mode: 'trailing'; buckets: number }
  | { mode: 'fixed'; referenceBuckets: number[] };

export interface TextDriftOptions {
  readonly baseline: TextBaseline;
  // max tolerated change of any single category/sentiment proportion
  readonly proportionDelta: number;
  readonly maxDrivingKeywords: number;
  readonly minTermCount: number;
}

const DEFAULT_PERCENTILES: readonly [number, number] = [5, 95];

export const DEFAULT_DETECTION_PARAMETERS: AnomalyDetectionParameters = Object.freeze({
  zScoreThreshold: 3.0,
  movingAverageWindow: 10,
  percentileThresholds: Object.freeze(DEFAULT_PERCENTILES),
  textSimilarityThreshold: 0.8,
  minimumAnomalyDuration: 1,
});

export const DEFAULT_TEXT_DRIFT_OPTIONS: TextDriftOptions = Object.freeze({
  baseline: Object.freeze({ mode: 'trailing', buckets: 3 }),
  proportionDelta: 0.15,
  maxDrivingKeywords: 5,
  minTermCount: 2,
});

export interface DetectionParametersInput {
  zScoreThreshold?: number;
  movingAverageWindow?: number;
  percentileThresholds?: readonly number[];
  textSimilarityThreshold?: number;
  minimumAnomalyDuration?: number;
}

function isPositiveNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0;
}

function isPositiveInteger(value: unknown): value is number {
  return isPositiveNumber(value) && Number.isInteger(value);
}

/**
 * Collect every violation rather than stopping at the first.
 */
export function validateParameters(input: DetectionParametersInput): ParameterValidationError[] {
  const errors: ParameterValidationError[] = [];

  if (input.zScoreThreshold !== undefined && !isPositiveNumber(input.zScoreThreshold)) {
    errors.push({
      path: 'zScoreThreshold',
      message: 'Z-score threshold must be a positive number',
      value: input.zScoreThreshold,
    });
  }

  if (input.movingAverageWindow !== undefined && !isPositiveInteger(input.movingAverageWindow)) {
    errors.push({
      path: 'movingAverageWindow',
      message: 'Moving average window must be a positive integer',
      value: input.movingAverageWindow,
    });
  }

  if (input.minimumAnomalyDuration !== undefined && !isPositiveInteger(input.minimumAnomalyDuration)) {
    errors.push({
      path: 'minimumAnomalyDuration',
      message: 'Minimum anomaly duration must be a positive integer',
      value: input.minimumAnomalyDuration,
    });
  }

  if (input.textSimilarityThreshold !== undefined) {
    const s = input.textSimilarityThreshold;
    if (!isPositiveNumber(s) || s > 1) {
      errors.push({
        path: 'textSimilarityThreshold',
        message: 'Text similarity threshold must be in (0, 1]',
        value: s,
      });
    }
  }

  if (input.percentileThresholds !== undefined) {
    const thresholds = input.percentileThresholds;
    if (thresholds.length !== 2) {
      errors.push({
        path: 'percentileThresholds',
        message: 'Percentile thresholds must be a pair [low, high]',
        value: thresholds,
      });
    } else {
      const [low, high] = thresholds;
      thresholds.forEach((value, index) => {
        if (!isPositiveNumber(value) || value >= 100) {
          errors.push({
            path: `percentileThresholds[${index}]`,
            message: 'Percentile must be in (0, 100)',
            value,
          });
        }
      });
      if (typeof low === 'number' && typeof high === 'number' && !(low < high)) {
        errors.push({
          path: 'percentileThresholds',
          message: 'Lower percentile must be strictly less than upper percentile',
          value: thresholds,
        });
      }
    }
  }

  return errors;
}

/**
 * Merge onto defaults, validate, freeze. Throws InvalidParameterError.
 */
export function resolveParameters(input: DetectionParametersInput = {}): AnomalyDetectionParameters {
  const errors = validateParameters(input);
  if (errors.length > 0) {
    throw new InvalidParameterError(errors);
  }

  const [low, high] = input.percentileThresholds ?? DEFAULT_DETECTION_PARAMETERS.percentileThresholds;
  const percentileThresholds: readonly [number, number] = [low, high];

  return Object.freeze({
    zScoreThreshold: input.zScoreThreshold ?? DEFAULT_DETECTION_PARAMETERS.zScoreThreshold,
    movingAverageWindow: input.movingAverageWindow ?? DEFAULT_DETECTION_PARAMETERS.movingAverageWindow,
    percentileThresholds: Object.freeze(percentileThresholds),
    textSimilarityThreshold:
      input.textSimilarityThreshold ?? DEFAULT_DETECTION_PARAMETERS.textSimilarityThreshold,
    minimumAnomalyDuration:
      input.minimumAnomalyDuration ?? DEFAULT_DETECTION_PARAMETERS.minimumAnomalyDuration,
  });
}

export interface TextDriftOptionsInput {
  baseline?: TextBaseline;
  proportionDelta?: number;
  maxDrivingKeywords?: number;
  minTermCount?: number;
}

export function validateTextDriftOptions(input: TextDriftOptionsInput): ParameterValidationError[] {
  const errors: ParameterValidationError[] = [];

  if (input.proportionDelta !== undefined) {
    const delta = input.proportionDelta;
    if (!isPositiveNumber(delta) || delta > 1) {
      errors.push({ path: 'textDrift.proportionDelta', message: 'Proportion delta must be in (0, 1]', value: delta });
    }
  }

  if (input.maxDrivingKeywords !== undefined && !isPositiveInteger(input.maxDrivingKeywords)) {
    errors.push({
      path: 'textDrift.maxDrivingKeywords',
      message: 'Driving keyword count must be a positive integer',
      value: input.maxDrivingKeywords,
    });
  }

  if (input.minTermCount !== undefined && !isPositiveInteger(input.minTermCount)) {
    errors.push({
      path: 'textDrift.minTermCount',
      message: 'Minimum term count must be a positive integer',
      value: input.minTermCount,
    });
  }

  const baseline = input.baseline;
  if (baseline !== undefined) {
    if (baseline.mode === 'trailing') {
      if (!isPositiveInteger(baseline.buckets)) {
        errors.push({
          path: 'textDrift.baseline.buckets',
          message: 'Trailing baseline must span a positive integer number of buckets',
          value: baseline.buckets,
        });
      }
    } else if (baseline.mode === 'fixed') {
      const refs = baseline.referenceBuckets;
      if (refs.length === 0 || !refs.every((i) => Number.isInteger(i) && i >= 0)) {
        errors.push({
          path: 'textDrift.baseline.referenceBuckets',
          message: 'Fixed baseline needs at least one non-negative bucket index',
          value: refs,
        });
      }
    } else {
      errors.push({ path: 'textDrift.baseline.mode', message: "Baseline mode must be 'trailing' or 'fixed'" });
    }
  }

  return errors;
}

export function resolveTextDriftOptions(input: TextDriftOptionsInput = {}): TextDriftOptions {
  const errors = validateTextDriftOptions(input);
  if (errors.length > 0) {
    throw new InvalidParameterError(errors);
  }

  const baseline: TextBaseline =
    input.baseline?.mode === 'fixed'
      ? { mode: 'fixed', referenceBuckets: [...new Set(input.baseline.referenceBuckets)].sort((a, b) => a - b) }
      : input.baseline ?? DEFAULT_TEXT_DRIFT_OPTIONS.baseline;

  return Object.freeze({
    baseline: Object.freeze(baseline),
    proportionDelta: input.proportionDelta ?? DEFAULT_TEXT_DRIFT_OPTIONS.proportionDelta,
    maxDrivingKeywords: input.maxDrivingKeywords ?? DEFAULT_TEXT_DRIFT_OPTIONS.maxDrivingKeywords,
    minTermCount: input.minTermCount ?? DEFAULT_TEXT_DRIFT_OPTIONS.minTermCount,
  });
}
