/**
 * Error classes raised by detectors and the run orchestrator
 */

import { EngineError } from '../types/index.js';

export interface ParameterValidationError {
  path: string;
  message: string;
  value?: unknown;
}

/**
 * A sub-method needs more points or documents than it was given. Non-fatal.
 */
export class InsufficientDataError extends EngineError {
  constructor(
    message: string,
    public required: number,
    public actual: number
  ) {
    super(message, 'INSUFFICIENT_DATA', { required, actual });
    this.name = 'InsufficientDataError';
  }
}

/**
 * Zero variance, empty vocabulary, empty bucket. Non-fatal: "no anomaly possible".
 */
export class DegenerateInputError extends EngineError {
  constructor(
    message: string,
    public reason: string
  ) {
    super(message, 'DEGENERATE_INPUT', { reason });
    this.name = 'DegenerateInputError';
  }
}

/**
 * Configuration outside the documented ranges. Fatal for the run.
 */
export class InvalidParameterError extends EngineError {
  constructor(public errors: ParameterValidationError[]) {
    super(
      `Invalid detection parameters: ${errors.map((e) => `${e.path}: ${e.message}`).join('; ')}`,
      'INVALID_PARAMETER',
      { errors }
    );
    this.name = 'InvalidParameterError';
  }
}

export class InvalidSeriesError extends EngineError {
  constructor(message: string, column: string) {
    super(message, 'INVALID_SERIES', { column });
    this.name = 'InvalidSeriesError';
  }
}

/**
 * A dataset whose columns cannot be told apart. Fatal for the run.
 */
export class InvalidDatasetError extends EngineError {
  constructor(public errors: ParameterValidationError[]) {
    super(
      `Invalid dataset: ${errors.map((e) => `${e.path}: ${e.message}`).join('; ')}`,
      'INVALID_DATASET',
      { errors }
    );
    this.name = 'InvalidDatasetError';
  }
}

export type CancellationReason = 'timeout' | 'cancelled';

export class RunCancelledError extends EngineError {
  constructor(public reason: CancellationReason) {
    super(
      reason === 'timeout' ? 'Detection run exceeded its time budget' : 'Detection run was cancelled',
      'RUN_CANCELLED',
      { reason }
    );
    this.name = 'RunCancelledError';
  }
}
