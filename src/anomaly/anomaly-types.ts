/**
 * Anomaly Detection Types
 *
 * Data model shared by the time-series and text detectors, the scorer and the prioritizer.
 * Timestamps are epoch milliseconds throughout.
 */

export enum AnomalyType {
  SPIKE = 'SPIKE',
  DROP = 'DROP',
  KEYWORD_DRIFT = 'KEYWORD_DRIFT',
  CATEGORY_SHIFT = 'CATEGORY_SHIFT',
}

export enum AnomalySeverity {
  LOW = 'LOW',
  MEDIUM = 'MEDIUM',
  HIGH = 'HIGH',
}

export enum DetectionMethod {
  Z_SCORE = 'z_score',
  MOVING_AVERAGE = 'moving_average',
  PERCENTILE = 'percentile',
  SEASONAL_RESIDUAL = 'seasonal_residual',
  KEYWORD_FREQUENCY = 'keyword_frequency',
  TOPIC = 'topic',
  CATEGORY = 'category',
  SENTIMENT = 'sentiment',
}

export const TIME_SERIES_METHODS: readonly DetectionMethod[] = [
  DetectionMethod.Z_SCORE,
  DetectionMethod.MOVING_AVERAGE,
  DetectionMethod.PERCENTILE,
  DetectionMethod.SEASONAL_RESIDUAL,
];

export const TEXT_METHODS: readonly DetectionMethod[] = [
  DetectionMethod.KEYWORD_FREQUENCY,
  DetectionMethod.TOPIC,
  DetectionMethod.CATEGORY,
  DetectionMethod.SENTIMENT,
];

export interface TimeWindow {
  readonly start: number;
  readonly end: number;
}

// ============================================================================
// Time series
// ============================================================================

export interface TimeSeriesPoint {
  timestamp: number;
  value: number;
  // Written by the detector only
  isAnomaly: boolean;
  anomalyScore?: number;
}

export type TrendDirection = 'increasing' | 'decreasing' | 'stable';

export interface SeasonalityDescriptor {
  detected: boolean;
  period: number | null;
  strength: number; // autocorrelation at `period`, 0 when none
}

export type PercentileKey = 5 | 25 | 75 | 95;

export interface TimeSeriesStatistics {
  count: number;
  mean: number;
  standardDeviation: number;
  median: number;
  percentiles: Record<PercentileKey, number>;
  trend: TrendDirection;
  seasonality: SeasonalityDescriptor;
}

export interface TimeSeries {
  readonly column: string;
  readonly points: readonly TimeSeriesPoint[];
  readonly statistics: TimeSeriesStatistics;
}

// ============================================================================
// Text
// ============================================================================

export interface TextDocument {
  readonly id: string;
  readonly content: string;
  readonly timestamp: number;
  readonly category?: string;
  readonly keywords: readonly string[];
}

export interface TextBucket {
  start: number;
  end: number;
  documents: readonly TextDocument[];
}

export interface TextSource {
  source: string;
  buckets: readonly TextBucket[];
}

export interface SentimentDistribution {
  positive: number;
  neutral: number;
  negative: number;
}

// One per document, in bucket order; ids may repeat across buckets
export interface DocumentVector {
  documentId: string;
  vector: number[];
}

export interface TextFeatures {
  window: TimeWindow;
  documentCount: number;
  categorizedCount: number;
  totalTerms: number;
  vocabulary: Set<string>;
  termFrequency: Map<string, number>;
  // TF-IDF vectors over the corpus vocabulary
  tfidf: DocumentVector[];
  categoryProportions: Map<string, number>;
  sentiment: SentimentDistribution;
}

// ============================================================================
// Candidates (detector output) and anomalies (scorer output)
// ============================================================================

interface CandidateBase {
  source: string;
  method: DetectionMethod;
  type: AnomalyType;
  // point index (time series) or bucket index (text); adjacency drives merging
  sequence: number;
  window: TimeWindow;
  // normalized to [0, 1] by the detector
  score: number;
}

export interface TimeSeriesCandidate extends CandidateBase {
  kind: 'time-series';
  value: number;
  expected: number;
  deviation: number;
}

export interface TextCandidate extends CandidateBase {
  kind: 'text';
  observed: number;
  baseline: number;
  magnitudeKind: 'relative' | 'percentage-point';
  keywords: string[];
  categories: string[];
  details: Record<string, unknown>;
}

export type AnomalyCandidate = TimeSeriesCandidate | TextCandidate;

export interface AffectedRegion {
  readonly source: string;
  readonly kind: 'time-series' | 'text';
  readonly keywords: readonly string[];
  readonly categories: readonly string[];
}

export interface AnomalyMetadata {
  readonly method: DetectionMethod;
  readonly candidateCount: number;
  // percent (time series, keyword drift) or percentage points (proportions); null without a baseline
  readonly magnitude: number | null;
  readonly baseline: number | null;
  readonly observed: number;
  readonly details: Readonly<Record<string, unknown>>;
}

export interface Anomaly {
  readonly id: string;
  readonly type: AnomalyType;
  readonly severity: AnomalySeverity;
  readonly dataSource: string;
  readonly timeWindow: TimeWindow;
  readonly affectedRegion: AffectedRegion;
  readonly score: number;
  readonly metadata: AnomalyMetadata;
}

// ============================================================================
// Run reporting
// ============================================================================

export type MethodSkipReason = 'insufficient-data' | 'degenerate-input' | 'fallback';

export interface MethodSkip {
  method: DetectionMethod;
  reason: MethodSkipReason;
  message: string;
}

export interface MethodOutcome {
  candidates: AnomalyCandidate[];
  skipped: MethodSkip[];
}
