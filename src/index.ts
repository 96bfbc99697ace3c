/**
 * anomaly-lens
 *
 * Statistical anomaly detection over numeric time series and bucketed text.
 */

export { AnomalyType, AnomalySeverity, DetectionMethod, TIME_SERIES_METHODS, TEXT_METHODS } from './anomaly/anomaly-types.js';
export type {
  AffectedRegion,
  Anomaly,
  AnomalyCandidate,
  AnomalyMetadata,
  DocumentVector,
  MethodOutcome,
  MethodSkip,
  MethodSkipReason,
  PercentileKey,
  SentimentDistribution,
  SeasonalityDescriptor,
  TextBucket,
  TextCandidate,
  TextDocument,
  TextFeatures,
  TextSource,
  TimeSeries,
  TimeSeriesCandidate,
  TimeSeriesPoint,
  TimeSeriesStatistics,
  TimeWindow,
  TrendDirection,
} from './anomaly/anomaly-types.js';

export {
  DegenerateInputError,
  InsufficientDataError,
  InvalidDatasetError,
  InvalidParameterError,
  InvalidSeriesError,
  RunCancelledError,
} from './anomaly/errors.js';
export type { CancellationReason, ParameterValidationError } from './anomaly/errors.js';
export { EngineError, LogLevel } from './types/index.js';

export {
  DEFAULT_DETECTION_PARAMETERS,
  DEFAULT_TEXT_DRIFT_OPTIONS,
  resolveParameters,
  resolveTextDriftOptions,
  validateParameters,
  validateTextDriftOptions,
} from './config/detection-parameters.js';
export type {
  AnomalyDetectionParameters,
  DetectionParametersInput,
  TextBaseline,
  TextDriftOptions,
  TextDriftOptionsInput,
} from './config/detection-parameters.js';
export { loadEnvConfig } from './config/env-config.js';
export type { EnvConfig } from './config/env-config.js';

export { computeStatistics, createTimeSeries, markAnomalies, withPoints } from './timeseries/time-series.js';
export type { RawPoint } from './timeseries/time-series.js';
export { SeasonalDecomposer, autocorrelation, inferPeriod } from './timeseries/seasonal-decomposer.js';
export type { Decomposition } from './timeseries/seasonal-decomposer.js';
export { TimeSeriesDetector } from './timeseries/time-series-detector.js';
export type { TimeSeriesDetectorOptions } from './timeseries/time-series-detector.js';

export { tokenize, classifySentiment } from './text/tokenizer.js';
export { TextFeatureExtractor, aggregateFeatures, centroid, cosineSimilarity } from './text/text-feature-extractor.js';
export { TextDriftDetector, keywordDriftTolerance } from './text/text-drift-detector.js';
export type { KeywordChange } from './text/text-drift-detector.js';

export { AnomalyScorer, SEVERITY_THRESHOLDS, severityForScore } from './scoring/anomaly-scorer.js';
export type { ScoringContext } from './scoring/anomaly-scorer.js';
export { compareAnomalies, prioritize } from './scoring/prioritizer.js';

export { AnomalyDetectionEngine, validateDataset } from './engine/detection-engine.js';
export type {
  ColumnKind,
  ColumnReport,
  ColumnSkipReason,
  DetectionDataset,
  DetectionEngineConfig,
  DetectionRunOptions,
  DetectionRunResult,
} from './engine/detection-engine.js';

export { DetectionAPI } from './api/detection-api.js';
export type { DetectionAPIConfig } from './api/detection-api.js';

export { Logger, logger } from './utils/logger.js';
export { MetricsCollector, metrics } from './utils/metrics.js';
